import { applyMove, GameState, getLegalMoves, getWinner, Turn } from '../game-state.js';
import { pickRandom, RandomSource } from '../utils/random.js';

/**
 * MCTS Simulation Phase Implementation
 *
 * Plays uniformly random legal moves from a position until someone
 * completes a line or the board fills up.
 *
 * REWARD PERSPECTIVE:
 * The side to move at the starting position is captured before the rollout.
 * - 1.0 = that side completed a line
 * - 0.5 = board filled with no winner
 * - 0.0 = the opponent completed a line
 */
export class MCTSSimulation {
    constructor(
        private random: RandomSource,
    ) {}

    simulate(state: GameState): number {
        const initialTurn = state.turn;
        const finalState = this.playout(state);
        const winner = getWinner(finalState);

        const reward = winner === undefined ? 0.5 : winner === initialTurn ? 1 : 0;

        if (process.env.LOG_ROLLOUTS === 'true') {
            console.log(`[SIMULATE] Turn ${Turn[initialTurn]}: Reward ${reward}, Winner: ${winner === undefined ? 'none' : Turn[winner]}`);
        }

        return reward;
    }

    playout(state: GameState): GameState {
        let current = state;

        while (getWinner(current) === undefined) {
            const moves = getLegalMoves(current);
            if (moves.length === 0) {
                break;
            }
            current = applyMove(pickRandom(moves, this.random), current);
        }

        return current;
    }
}
