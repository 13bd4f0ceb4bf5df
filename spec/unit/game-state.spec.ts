import { expect } from 'chai';
import {
    applyMove,
    boardsEqual,
    createInitialState,
    EMPTY,
    findMoveBetween,
    formatBoard,
    getLegalMoves,
    getOutcome,
    getWinner,
    isTerminal,
    Move,
    parseBoard,
    Turn,
} from '../../src/game-state.js';
import { InvalidMoveError } from '../../src/errors.js';
import { stateOf } from '../helpers/node-factory.js';

describe('Game State Model', () => {
    describe('getLegalMoves', () => {
        it('should list all nine cells in row-major order on an empty board', () => {
            const moves = getLegalMoves(createInitialState());

            expect(moves).to.have.length(9);
            expect(moves[0]).to.deep.equal({ row: 0, column: 0 });
            expect(moves[1]).to.deep.equal({ row: 0, column: 1 });
            expect(moves[3]).to.deep.equal({ row: 1, column: 0 });
            expect(moves[8]).to.deep.equal({ row: 2, column: 2 });
        });

        it('should return exactly the empty cells', () => {
            const state = stateOf([ 'XX.', '.O.', '..O' ], Turn.X);

            expect(getLegalMoves(state)).to.deep.equal([
                { row: 0, column: 2 },
                { row: 1, column: 0 },
                { row: 1, column: 2 },
                { row: 2, column: 0 },
                { row: 2, column: 1 },
            ]);
        });

        it('should return no moves on a full board', () => {
            const state = stateOf([ 'XOX', 'XOO', 'OXX' ], Turn.O);
            expect(getLegalMoves(state)).to.deep.equal([]);
        });

        it('should shrink by exactly one after each move', () => {
            let state = createInitialState();
            for (let expected = 9; expected > 0; expected--) {
                const moves = getLegalMoves(state);
                expect(moves).to.have.length(expected);
                state = applyMove(moves[moves.length - 1], state);
            }
            expect(getLegalMoves(state)).to.have.length(0);
        });
    });

    describe('applyMove', () => {
        it('should place the mover\'s mark and flip the turn', () => {
            const next = applyMove({ row: 1, column: 2 }, createInitialState(Turn.O));

            expect(next.board[1][2]).to.equal(Turn.O);
            expect(next.turn).to.equal(Turn.X);
            expect(formatBoard(next.board)).to.deep.equal([ '...', '..O', '...' ]);
        });

        it('should not mutate the input state', () => {
            const state = createInitialState();
            applyMove({ row: 0, column: 0 }, state);

            expect(state.board[0][0]).to.equal(EMPTY);
            expect(state.turn).to.equal(Turn.X);
        });

        it('should give equal results when applied twice to the same state', () => {
            const state = stateOf([ 'X..', '.O.', '...' ], Turn.X);
            const first = applyMove({ row: 2, column: 2 }, state);
            const second = applyMove({ row: 2, column: 2 }, state);

            expect(first).to.deep.equal(second);
            expect(first.board).to.not.equal(second.board);
        });

        it('should reject an occupied cell', () => {
            const state = stateOf([ 'X..', '...', '...' ], Turn.O);

            try {
                applyMove({ row: 0, column: 0 }, state);
                expect.fail('applyMove should throw');
            } catch (error) {
                expect(error).to.be.instanceOf(InvalidMoveError);
                if (error instanceof InvalidMoveError) {
                    expect(error.reason).to.equal('occupied');
                    expect(error.move).to.deep.equal({ row: 0, column: 0 });
                    expect(error.message).to.equal('Cell (0, 0) is already occupied');
                }
            }
            expect(state.board[0][0]).to.equal(Turn.X);
        });

        it('should reject moves outside the board', () => {
            const outside: Move[] = [
                { row: -1, column: 0 },
                { row: 3, column: 0 },
                { row: 0, column: 3 },
                { row: 0.5, column: 1 },
            ];
            for (const move of outside) {
                expect(() => applyMove(move, createInitialState())).to.throw(InvalidMoveError, 'outside the 3x3 board');
            }
        });
    });

    describe('getWinner', () => {
        const lines: [string, Move[]][] = [
            [ 'top row', [ { row: 0, column: 0 }, { row: 0, column: 1 }, { row: 0, column: 2 } ] ],
            [ 'middle row', [ { row: 1, column: 0 }, { row: 1, column: 1 }, { row: 1, column: 2 } ] ],
            [ 'bottom row', [ { row: 2, column: 0 }, { row: 2, column: 1 }, { row: 2, column: 2 } ] ],
            [ 'left column', [ { row: 0, column: 0 }, { row: 1, column: 0 }, { row: 2, column: 0 } ] ],
            [ 'middle column', [ { row: 0, column: 1 }, { row: 1, column: 1 }, { row: 2, column: 1 } ] ],
            [ 'right column', [ { row: 0, column: 2 }, { row: 1, column: 2 }, { row: 2, column: 2 } ] ],
            [ 'main diagonal', [ { row: 0, column: 0 }, { row: 1, column: 1 }, { row: 2, column: 2 } ] ],
            [ 'anti diagonal', [ { row: 0, column: 2 }, { row: 1, column: 1 }, { row: 2, column: 0 } ] ],
        ];

        for (const [ name, cells ] of lines) {
            it(`should detect the ${name}`, () => {
                const board = [ '...', '...', '...' ].map(row => [ ...row ]);
                for (const { row, column } of cells) {
                    board[row][column] = 'O';
                }
                const state = stateOf(board.map(row => row.join('')), Turn.X);

                expect(getWinner(state)).to.equal(Turn.O);
            });
        }

        it('should return undefined on an empty board', () => {
            expect(getWinner(createInitialState())).to.equal(undefined);
        });

        it('should return undefined on a full board without a line', () => {
            expect(getWinner(stateOf([ 'XOX', 'XOO', 'OXX' ], Turn.O))).to.equal(undefined);
        });

        it('should report the side that just completed a line', () => {
            const state = stateOf([ 'XX.', '.O.', '..O' ], Turn.X);

            expect(getLegalMoves(state)).to.deep.include({ row: 0, column: 2 });

            const next = applyMove({ row: 0, column: 2 }, state);
            expect(next.turn).to.equal(Turn.O);
            expect(getWinner(next)).to.equal(Turn.X);
        });
    });

    describe('isTerminal / getOutcome', () => {
        it('should report a running game', () => {
            const state = stateOf([ 'X..', '.O.', '...' ], Turn.X);
            expect(isTerminal(state)).to.equal(false);
            expect(getOutcome(state)).to.equal(undefined);
        });

        it('should report a win', () => {
            const state = stateOf([ 'XXX', 'OO.', '...' ], Turn.O);
            expect(isTerminal(state)).to.equal(true);
            expect(getOutcome(state)).to.deep.equal({ winner: Turn.X });
        });

        it('should report a full board without a line as a draw', () => {
            const state = stateOf([ 'XOX', 'XOO', 'OXX' ], Turn.O);
            expect(isTerminal(state)).to.equal(true);
            expect(getOutcome(state)).to.equal('draw');
        });
    });

    describe('board helpers', () => {
        it('should compare boards by value', () => {
            expect(boardsEqual(parseBoard([ 'X..', '...', '..O' ]), parseBoard([ 'X..', '...', '..O' ]))).to.equal(true);
            expect(boardsEqual(parseBoard([ 'X..', '...', '..O' ]), parseBoard([ 'X..', '...', '.O.' ]))).to.equal(false);
        });

        it('should find the cell filled between two boards', () => {
            const before = parseBoard([ 'X..', '...', '...' ]);
            const after = parseBoard([ 'X..', '.O.', '...' ]);

            expect(findMoveBetween(before, after)).to.deep.equal({ row: 1, column: 1 });
            expect(findMoveBetween(before, before)).to.equal(undefined);
        });

        it('should reject malformed board rows', () => {
            expect(() => parseBoard([ 'X..', '...' ])).to.throw('Board must be 3 rows of 3 cells');
            expect(() => parseBoard([ 'X..', '.Q.', '...' ])).to.throw('Unknown cell symbol \'Q\'');
        });
    });
});
