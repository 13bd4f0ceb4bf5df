import { SearchError } from '../errors.js';
import { MCTSNode } from '../mcts-node.js';
import { getUCB1Score } from '../utils/mcts-node-utils.js';

/**
 * MCTS Selection Phase Implementation
 *
 * Walks from the root towards a leaf. At every level:
 * 1. If any child has never been simulated, stop at the first such child
 *    (row-major order, so early cells are tried first).
 * 2. Otherwise descend into the child with the highest UCB1 score.
 * 3. Stop at a node without children (unexpanded or terminal).
 *
 * The root must already be expanded by the caller.
 */
export class MCTSSelection {
    constructor(
        private explorationConstant: number,
    ) {}

    select(root: MCTSNode): MCTSNode {
        let currentNode = root;

        while (currentNode.children && currentNode.children.length > 0) {
            const unvisited = currentNode.children.find(child => child.simulations === 0);
            if (unvisited) {
                return unvisited;
            }
            currentNode = this.selectBestChild(currentNode);
        }

        return currentNode;
    }

    /**
     * Selects the child with the highest UCB1 score; the first one wins ties.
     */
    selectBestChild(node: MCTSNode): MCTSNode {
        const children = node.children;
        if (!children || children.length === 0) {
            throw new SearchError('selectBestChild called on a node without children');
        }

        let bestChild = children[0];
        let bestScore = getUCB1Score(bestChild, node.simulations, this.explorationConstant);

        for (const child of children) {
            const score = getUCB1Score(child, node.simulations, this.explorationConstant);
            if (score > bestScore) {
                bestScore = score;
                bestChild = child;
            }
        }

        return bestChild;
    }
}
