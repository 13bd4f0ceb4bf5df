import { MCTSNode } from '../mcts-node.js';
import { BackpropagationMode } from './mcts-config.js';

/**
 * MCTS Backpropagation Phase Implementation
 *
 * Takes the result of a rollout and propagates it up the tree, from the
 * rolled-out node to the root inclusive.
 *
 * STATISTICS UPDATED:
 * - simulations: Incremented for each node on the path
 * - wins: Accumulated rollout score
 *
 * The score is computed once, relative to the side to move at the
 * rolled-out node. In `uniform` mode it is added unchanged at every
 * ancestor. In `negamax` mode each node is credited from the perspective of
 * the side that moved into it: the rolled-out node gets 1 - score, and the
 * score flips again at each step up since the sides alternate every ply.
 */
export class MCTSBackpropagation {
    constructor(
        private mode: BackpropagationMode = 'uniform',
    ) {}

    /**
     * @param node - The node the rollout started from
     * @param reward - 0.0 for loss, 0.5 for draw, 1.0 for win
     */
    backpropagate(node: MCTSNode, reward: number): void {
        let current: MCTSNode | undefined = node;
        let currentReward = this.mode === 'negamax' ? 1 - reward : reward;

        while (current !== undefined) {
            current.simulations++;
            current.wins += currentReward;

            if (this.mode === 'negamax') {
                currentReward = 1 - currentReward;
            }
            current = current.parent;
        }
    }
}
