import { GameState } from './game-state.js';

/**
 * Represents a node in the MCTS search tree.
 *
 * A parent owns its children; `parent` is only a back reference walked by
 * backpropagation, and is cleared when the node is promoted to root.
 *
 * `children` distinguishes two kinds of leaves:
 * - `undefined`: never expanded
 * - `[]`: expanded, but the board had no legal moves left
 */
export type MCTSNode = {
    /** Parent node in the search tree, absent for the root */
    parent?: MCTSNode;

    /** Position this node stands for */
    state: GameState;

    /** Number of rollouts whose path passed through this node */
    simulations: number;

    /** Cumulative rollout score (1 per win, 0.5 per draw) */
    wins: number;

    /** Child nodes, one per legal move, in row-major order */
    children?: MCTSNode[];
};

export function createNode(state: GameState, parent?: MCTSNode): MCTSNode {
    return {
        parent,
        state,
        simulations: 0,
        wins: 0,
        children: undefined,
    };
}
