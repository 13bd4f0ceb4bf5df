import { MCTSNode } from '../mcts-node.js';

export function calculateAvgScore(node: MCTSNode): number {
    return node.simulations > 0 ? node.wins / node.simulations : 0;
}

/**
 * Calculates the UCB1 (Upper Confidence Bound) score for a node.
 * UCB1 = exploitation + exploration = (wins / simulations) + C * sqrt(ln(parent_simulations) / simulations)
 * Unvisited nodes return Infinity to ensure they are selected first.
 *
 * @param node - The node to calculate UCB1 score for
 * @param parentSimulations - Simulations recorded at the node's parent
 * @param explorationConstant - Weight of the exploration term (C)
 */
export function getUCB1Score(node: MCTSNode, parentSimulations: number, explorationConstant: number): number {
    if (node.simulations === 0) {
        return Infinity;
    }

    const exploitation = calculateAvgScore(node);
    const exploration = explorationConstant * Math.sqrt(Math.log(parentSimulations) / node.simulations);

    return exploitation + exploration;
}
