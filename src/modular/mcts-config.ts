/**
 * How a rollout score is credited to the nodes above the rolled-out one.
 * - `uniform`: the same score at every ancestor
 * - `negamax`: `1 - score` at every step up, so each node holds the score of
 *   the side that moved into it
 */
export type BackpropagationMode = 'uniform' | 'negamax';

export interface MCTSConfig {
    iterations: number;
    explorationConstant: number;
    backpropagation: BackpropagationMode;
    /** Optional wall-clock cap; training stops at whichever budget runs out first */
    timeLimitMs?: number;
}

export const DEFAULT_MCTS_CONFIG: MCTSConfig = {
    iterations: 10000,
    explorationConstant: Math.sqrt(100),
    backpropagation: 'uniform',
};

export function resolveConfig(overrides: Partial<MCTSConfig> = {}): MCTSConfig {
    const config: MCTSConfig = { ...DEFAULT_MCTS_CONFIG, ...overrides };

    if (!Number.isInteger(config.iterations) || config.iterations < 0) {
        throw new Error(`iterations must be a non-negative integer, got ${config.iterations}`);
    }
    if (!Number.isFinite(config.explorationConstant) || config.explorationConstant < 0) {
        throw new Error(`explorationConstant must be a non-negative number, got ${config.explorationConstant}`);
    }
    if (config.backpropagation !== 'uniform' && config.backpropagation !== 'negamax') {
        throw new Error(`Unknown backpropagation mode '${String(config.backpropagation)}'`);
    }
    if (config.timeLimitMs !== undefined && !(config.timeLimitMs > 0)) {
        throw new Error(`timeLimitMs must be positive, got ${config.timeLimitMs}`);
    }

    return config;
}
