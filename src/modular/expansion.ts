import { applyMove, getLegalMoves } from '../game-state.js';
import { SearchError } from '../errors.js';
import { createNode, MCTSNode } from '../mcts-node.js';
import { pickRandom, RandomSource } from '../utils/random.js';

/**
 * MCTS Expansion Phase Implementation
 *
 * Grows the tree one ply at a time. A node is only expanded after its own
 * first rollout, so the tree grows in step with the search budget:
 * - a node reached with zero simulations is rolled out as it is
 * - a node reached again while still unexpanded gets one child per legal
 *   move, and one of them is picked uniformly for the rollout
 */
export class MCTSExpansion {
    constructor(
        private random: RandomSource,
    ) {}

    /**
     * Creates one zero-statistic child per legal move, in row-major order.
     * A full board leaves the node with an empty child list.
     *
     * @throws SearchError if the node has already been expanded
     */
    expand(node: MCTSNode): MCTSNode[] {
        if (node.children !== undefined) {
            throw new SearchError('Node has already been expanded');
        }

        const children = getLegalMoves(node.state).map(move => createNode(applyMove(move, node.state), node));
        node.children = children;

        return children;
    }

    /**
     * Picks the node to roll out from the node selection stopped at.
     */
    expandLeaf(node: MCTSNode): MCTSNode {
        if (node.simulations === 0 || node.children !== undefined) {
            return node;
        }

        const children = this.expand(node);
        return children.length > 0 ? pickRandom(children, this.random) : node;
    }
}
