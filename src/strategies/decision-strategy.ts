import { GameState, Move } from '../game-state.js';

/**
 * Decision Strategy Interface
 *
 * Any player (MCTS, Random, or an interactive front end) implements this
 * interface so a game driver can alternate between them.
 */
export interface DecisionStrategy {
    /**
     * Decide which move to play in the given position.
     *
     * @returns A legal move, or null if the position has none
     */
    getMove(state: GameState): Move | null;

    /**
     * Called after every move actually played, by either side.
     */
    observeMove?(move: Move, state: GameState): void;
}
