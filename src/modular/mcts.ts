import { findMoveBetween, formatMove, isTerminal, Move } from '../game-state.js';
import { SearchError } from '../errors.js';
import { MCTSNode } from '../mcts-node.js';
import { SearchTree } from '../search-tree.js';
import { calculateAvgScore } from '../utils/mcts-node-utils.js';
import { defaultRandom, RandomSource } from '../utils/random.js';
import { printTree } from '../utils/tree-debug.js';
import { MCTSBackpropagation } from './backpropagation.js';
import { MCTSSimulation } from './simulation.js';
import { MCTSExpansion } from './expansion.js';
import { MCTSSelection } from './selection.js';
import { MCTSConfig, resolveConfig } from './mcts-config.js';

export type MoveStatistics = {
    move: Move;
    simulations: number;
    score: number;
};

export class MCTS {
    public readonly config: MCTSConfig;

    private selection: MCTSSelection;

    private expansion: MCTSExpansion;

    private simulation: MCTSSimulation;

    private backpropagation: MCTSBackpropagation;

    constructor(
        config: Partial<MCTSConfig> = {},
        random: RandomSource = defaultRandom,
    ) {
        this.config = resolveConfig(config);

        this.selection = new MCTSSelection(this.config.explorationConstant);
        this.expansion = new MCTSExpansion(random);
        this.simulation = new MCTSSimulation(random);
        this.backpropagation = new MCTSBackpropagation(this.config.backpropagation);
    }

    /**
     * Runs the search loop in place on the tree's current root.
     * Stops after `iterations` or once `timeLimitMs` has elapsed, whichever comes first.
     *
     * @returns The number of iterations actually run
     */
    train(tree: SearchTree, iterations: number = this.config.iterations): number {
        if (!Number.isInteger(iterations) || iterations < 0) {
            throw new Error(`iterations must be a non-negative integer, got ${iterations}`);
        }

        const deadline = this.config.timeLimitMs !== undefined ? Date.now() + this.config.timeLimitMs : Infinity;

        let completed = 0;
        while (completed < iterations && Date.now() < deadline) {
            this.runSingleIteration(tree.root);
            completed++;
        }
        return completed;
    }

    runSingleIteration(root: MCTSNode): void {
        if (root.children === undefined) {
            this.expansion.expand(root);
        }

        // SELECTION: first unvisited child, UCB1 otherwise
        const selectedNode = this.selection.select(root);

        // EXPANSION: only nodes seen before grow a ply
        const rolloutNode = this.expansion.expandLeaf(selectedNode);

        // SIMULATION
        const reward = this.simulation.simulate(rolloutNode.state);

        // BACKPROPAGATION
        this.backpropagation.backpropagate(rolloutNode, reward);
    }

    /**
     * Picks the most simulated root child (robust child); the first one wins ties.
     *
     * @throws SearchError if the game at the root is already over
     */
    chooseMove(tree: SearchTree): Move {
        const root = tree.root;
        if (isTerminal(root.state)) {
            throw new SearchError('Cannot choose a move: the game is already over');
        }
        const children = this.ensureExpanded(root);

        let bestChild = children[0];
        for (const child of children) {
            if (child.simulations > bestChild.simulations) {
                bestChild = child;
            }
        }

        if (process.env.DEBUG_TREE === 'true') {
            console.log('\n[TREE-STRUCTURE] Final MCTS tree:');
            printTree(root, 2);
        }

        if (process.env.LOG_MCTS_SCORES === 'true') {
            const statistics = this.getMoveStatistics(tree);
            console.log(`[MCTS] ${statistics.length} moves evaluated:`);
            statistics.slice(0, 5).forEach((entry, i) => {
                console.log(`  ${i + 1}. ${formatMove(entry.move)} | score=${entry.score.toFixed(4)} | simulations=${entry.simulations}`);
            });
        }

        return this.moveTo(root, bestChild);
    }

    /**
     * Lists every root child's move with its statistics, most simulated first.
     *
     * @throws SearchError if the game at the root is already over
     */
    getMoveStatistics(tree: SearchTree): MoveStatistics[] {
        const root = tree.root;
        if (isTerminal(root.state)) {
            throw new SearchError('Cannot list moves: the game is already over');
        }
        const children = this.ensureExpanded(root);

        return children
            .map(child => ({
                move: this.moveTo(root, child),
                simulations: child.simulations,
                score: calculateAvgScore(child),
            }))
            .sort((a, b) => b.simulations - a.simulations);
    }

    private ensureExpanded(root: MCTSNode): MCTSNode[] {
        const children = root.children ?? this.expansion.expand(root);
        if (children.length === 0) {
            throw new SearchError('Root has no legal moves');
        }
        return children;
    }

    private moveTo(parent: MCTSNode, child: MCTSNode): Move {
        const move = findMoveBetween(parent.state.board, child.state.board);
        if (!move) {
            throw new SearchError('Child board does not differ from its parent');
        }
        return move;
    }
}
