import { InvalidMoveError } from './errors.js';

/**
 * Tic-tac-toe Game State Model
 *
 * Positions are immutable: every transition copies the board, so sibling
 * nodes in the search tree can hold states derived from a shared ancestor
 * without aliasing each other.
 */

export const BOARD_SIZE = 3;

export enum Turn {
    X = 1,
    O = 2,
}

export const EMPTY = 0;

export type Cell = typeof EMPTY | Turn;

export type Board = readonly (readonly Cell[])[];

export type Move = {
    row: number;
    column: number;
};

export type GameState = {
    readonly board: Board;
    /** The side that places the next mark */
    readonly turn: Turn;
};

export type GameOutcome = { winner: Turn } | 'draw';

const SYMBOLS: Record<Cell, string> = {
    [EMPTY]: '.',
    [Turn.X]: 'X',
    [Turn.O]: 'O',
};

export function otherTurn(turn: Turn): Turn {
    return turn === Turn.X ? Turn.O : Turn.X;
}

export function createInitialState(firstMover: Turn = Turn.X): GameState {
    const board: Cell[][] = [];
    for (let row = 0; row < BOARD_SIZE; row++) {
        board.push(new Array<Cell>(BOARD_SIZE).fill(EMPTY));
    }
    return { board, turn: firstMover };
}

/**
 * Returns every empty cell in row-major order.
 * The result is empty exactly when the board is full.
 */
export function getLegalMoves(state: GameState): Move[] {
    const moves: Move[] = [];
    for (let row = 0; row < BOARD_SIZE; row++) {
        for (let column = 0; column < BOARD_SIZE; column++) {
            if (state.board[row][column] === EMPTY) {
                moves.push({ row, column });
            }
        }
    }
    return moves;
}

export function isOnBoard(move: Move): boolean {
    return Number.isInteger(move.row) && Number.isInteger(move.column)
        && move.row >= 0 && move.row < BOARD_SIZE
        && move.column >= 0 && move.column < BOARD_SIZE;
}

/**
 * Places the mark of the side to move and hands the turn over.
 *
 * @throws InvalidMoveError if the move is off the board or the cell is taken
 */
export function applyMove(move: Move, state: GameState): GameState {
    if (!isOnBoard(move)) {
        throw new InvalidMoveError(move, 'out-of-range');
    }
    if (state.board[move.row][move.column] !== EMPTY) {
        throw new InvalidMoveError(move, 'occupied');
    }

    const board = state.board.map(row => [ ...row ]);
    board[move.row][move.column] = state.turn;

    return { board, turn: otherTurn(state.turn) };
}

function getLines(board: Board): Cell[][] {
    const lines: Cell[][] = [];
    for (let i = 0; i < BOARD_SIZE; i++) {
        lines.push([ ...board[i] ]);
        lines.push(board.map(row => row[i]));
    }
    lines.push(board.map((row, i) => row[i]));
    lines.push(board.map((row, i) => row[BOARD_SIZE - 1 - i]));
    return lines;
}

/**
 * Reports the side owning a completed row, column or diagonal.
 * In regular play this is the side that has just moved.
 */
export function getWinner(state: GameState): Turn | undefined {
    for (const line of getLines(state.board)) {
        const first = line[0];
        if (first !== EMPTY && line.every(cell => cell === first)) {
            return first;
        }
    }
    return undefined;
}

export function isTerminal(state: GameState): boolean {
    return getWinner(state) !== undefined || getLegalMoves(state).length === 0;
}

/** Outcome of a finished game, or undefined while it is still running */
export function getOutcome(state: GameState): GameOutcome | undefined {
    const winner = getWinner(state);
    if (winner !== undefined) {
        return { winner };
    }
    return getLegalMoves(state).length === 0 ? 'draw' : undefined;
}

export function boardsEqual(a: Board, b: Board): boolean {
    for (let row = 0; row < BOARD_SIZE; row++) {
        for (let column = 0; column < BOARD_SIZE; column++) {
            if (a[row][column] !== b[row][column]) {
                return false;
            }
        }
    }
    return true;
}

/**
 * Finds the single cell that was filled between two consecutive boards.
 * Returns undefined when the boards do not differ.
 */
export function findMoveBetween(before: Board, after: Board): Move | undefined {
    for (let row = 0; row < BOARD_SIZE; row++) {
        for (let column = 0; column < BOARD_SIZE; column++) {
            if (before[row][column] !== after[row][column]) {
                return { row, column };
            }
        }
    }
    return undefined;
}

/**
 * Builds a board from rows such as `'XO.'`. `.` marks an empty cell.
 */
export function parseBoard(rows: readonly string[]): Board {
    if (rows.length !== BOARD_SIZE || rows.some(row => row.length !== BOARD_SIZE)) {
        throw new Error(`Board must be ${BOARD_SIZE} rows of ${BOARD_SIZE} cells`);
    }
    return rows.map(row => [ ...row ].map((symbol): Cell => {
        switch (symbol) {
            case 'X':
                return Turn.X;
            case 'O':
                return Turn.O;
            case '.':
                return EMPTY;
            default:
                throw new Error(`Unknown cell symbol '${symbol}'`);
        }
    }));
}

export function formatBoard(board: Board): string[] {
    return board.map(row => row.map(cell => SYMBOLS[cell]).join(''));
}

export function formatMove(move: Move): string {
    return `(${move.row}, ${move.column})`;
}
