import { applyMove, boardsEqual, createInitialState, GameState, Move, Turn } from './game-state.js';
import { createNode, MCTSNode } from './mcts-node.js';

/**
 * Owns the root of the search tree and follows the real game.
 *
 * Advancing keeps the subtree under the move actually played so its
 * statistics carry over; the old root and the other siblings become
 * unreachable along with their subtrees.
 */
export class SearchTree {
    public root: MCTSNode;

    constructor(state: GameState) {
        this.root = createNode(state);
    }

    static fromInitialState(firstMover: Turn = Turn.X): SearchTree {
        return new SearchTree(createInitialState(firstMover));
    }

    get state(): GameState {
        return this.root.state;
    }

    /**
     * Plays a move from the root position, by either side.
     *
     * @throws InvalidMoveError if the move is not legal at the root
     * @returns The new root
     */
    advance(move: Move): MCTSNode {
        const nextState = applyMove(move, this.root.state);

        const match = this.root.children?.find(child => boardsEqual(child.state.board, nextState.board));

        if (match) {
            match.parent = undefined;
            this.root = match;
        } else {
            this.root = createNode(nextState);
        }

        return this.root;
    }
}
