import { applyMove, createInitialState, formatMove, GameOutcome, GameState, getOutcome, isTerminal, Move, Turn } from '../game-state.js';
import { DecisionStrategy } from '../strategies/decision-strategy.js';

export type GameRecord = {
    moves: Move[];
    finalState: GameState;
    outcome: GameOutcome;
};

export type Players = Record<Turn, DecisionStrategy>;

/**
 * Plays a headless game to completion, asking each side's strategy for its
 * move and notifying every strategy of each move played.
 * The same strategy instance may play both sides; it is notified once per move.
 */
export function playGame(players: Players, initialState: GameState = createInitialState()): GameRecord {
    const observers = new Set<DecisionStrategy>([ players[Turn.X], players[Turn.O] ]);
    const moves: Move[] = [];
    let state = initialState;

    while (!isTerminal(state)) {
        const move = players[state.turn].getMove(state);
        if (move === null) {
            throw new Error(`Strategy for ${Turn[state.turn]} returned no move in a running game`);
        }

        const nextState = applyMove(move, state);
        moves.push(move);

        if (process.env.LOG_GAME_MOVES === 'true') {
            console.log(`[GAME] ${Turn[state.turn]} plays ${formatMove(move)}`);
        }

        observers.forEach(observer => observer.observeMove?.(move, nextState));
        state = nextState;
    }

    const outcome = getOutcome(state);
    if (outcome === undefined) {
        throw new Error('Game loop ended before the game was over');
    }

    return { moves, finalState: state, outcome };
}
