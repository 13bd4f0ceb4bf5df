import { boardsEqual, EMPTY, GameState, isOnBoard, isTerminal, Move } from '../game-state.js';
import { MCTS } from '../modular/mcts.js';
import { MCTSConfig } from '../modular/mcts-config.js';
import { SearchTree } from '../search-tree.js';
import { defaultRandom, RandomSource } from '../utils/random.js';
import { DecisionStrategy } from './decision-strategy.js';

export interface MCTSStrategyOptions {
    /** Iterations run before every decision, on top of any upfront training */
    iterationsPerMove: number;
}

/**
 * MCTS Decision Strategy
 *
 * Keeps one search tree for the whole game. The tree is trained up front
 * with `train()`, then follows every move played through `observeMove`,
 * so statistics gathered for the surviving subtree carry over.
 */
export class MCTSDecisionStrategy implements DecisionStrategy {
    public readonly mcts: MCTS;

    public tree: SearchTree;

    private options: MCTSStrategyOptions;

    constructor(
        initialState: GameState,
        config: Partial<MCTSConfig> = {},
        random: RandomSource = defaultRandom,
        options: Partial<MCTSStrategyOptions> = {},
    ) {
        this.mcts = new MCTS(config, random);
        this.tree = new SearchTree(initialState);
        this.options = { iterationsPerMove: 0, ...options };
    }

    train(iterations?: number): number {
        return this.mcts.train(this.tree, iterations);
    }

    getMove(state: GameState): Move | null {
        if (isTerminal(state)) {
            return null;
        }

        // Position reached outside observeMove: start over from it
        if (!this.isTracking(state)) {
            this.tree = new SearchTree(state);
        }

        if (this.options.iterationsPerMove > 0) {
            this.mcts.train(this.tree, this.options.iterationsPerMove);
        }

        return this.mcts.chooseMove(this.tree);
    }

    /**
     * Advances the tree past a played move. If the tree had drifted from the
     * game, it is rebuilt from the position reported after the move.
     */
    observeMove(move: Move, state: GameState): void {
        const root = this.tree.state;
        if (isOnBoard(move) && root.board[move.row][move.column] === EMPTY) {
            this.tree.advance(move);
        }

        if (!this.isTracking(state)) {
            this.tree = new SearchTree(state);
        }
    }

    private isTracking(state: GameState): boolean {
        return boardsEqual(this.tree.state.board, state.board) && this.tree.state.turn === state.turn;
    }
}
