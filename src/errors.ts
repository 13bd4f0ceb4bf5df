import type { Move } from './game-state.js';

export type InvalidMoveReason = 'out-of-range' | 'occupied';

/**
 * Thrown when a move targets a cell that is off the board or already taken.
 * The board is never modified when this is raised.
 */
export class InvalidMoveError extends Error {
    constructor(
        public readonly move: Move,
        public readonly reason: InvalidMoveReason,
    ) {
        super(reason === 'occupied'
            ? `Cell (${move.row}, ${move.column}) is already occupied`
            : `Move (${move.row}, ${move.column}) is outside the 3x3 board`);
        this.name = 'InvalidMoveError';
    }
}

/**
 * Thrown when the search engine is driven outside its contract,
 * e.g. re-expanding a node or choosing a move on a finished board.
 */
export class SearchError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SearchError';
    }
}
