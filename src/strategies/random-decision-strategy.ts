import { GameState, getLegalMoves, Move } from '../game-state.js';
import { defaultRandom, pickRandom, RandomSource } from '../utils/random.js';
import { DecisionStrategy } from './decision-strategy.js';

/**
 * Random Decision Strategy
 *
 * Chooses uniformly from legal moves.
 *
 * Used for:
 * - Baseline comparison (MCTS vs Random)
 * - Testing
 */
export class RandomDecisionStrategy implements DecisionStrategy {
    constructor(
        private random: RandomSource = defaultRandom,
    ) {}

    getMove(state: GameState): Move | null {
        const legalMoves = getLegalMoves(state);

        if (legalMoves.length === 0) {
            return null;
        }

        return pickRandom(legalMoves, this.random);
    }
}
