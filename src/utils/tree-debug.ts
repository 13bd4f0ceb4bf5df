import { findMoveBetween, formatBoard, formatMove, Move, Turn } from '../game-state.js';
import { MCTSNode } from '../mcts-node.js';
import { calculateAvgScore } from './mcts-node-utils.js';

const moveLabel = (move: Move | undefined): string => (move ? formatMove(move) : '?');

export const describeNode = (node: MCTSNode): string => {
    const children = node.children === undefined ? 'unexpanded' : String(node.children.length);
    const header = node.parent
        ? `move=${moveLabel(findMoveBetween(node.parent.state.board, node.state.board))}`
        : `ROOT ${formatBoard(node.state.board).join('/')}`;
    return `${header}: simulations=${node.simulations}, avg=${calculateAvgScore(node).toFixed(4)}, children=${children}`;
};

export const printTree = (node: MCTSNode, maxDepth: number = Infinity, depth: number = 0, prefix: string = ''): void => {
    const indent = '  '.repeat(depth);
    console.log(`${indent}${prefix}${describeNode(node)}`);

    if (depth >= maxDepth) {
        return;
    }

    node.children?.forEach((child, idx) => {
        printTree(child, maxDepth, depth + 1, `[${idx}] `);
    });
};

/**
 * Build the path from root to a given node, returning a readable string.
 * @returns String like "X (1, 1) → O (0, 0) → X (2, 2)"
 */
export const getNodePath = (node: MCTSNode): string => {
    const steps: string[] = [];
    let current: MCTSNode = node;

    while (current.parent) {
        const move = findMoveBetween(current.parent.state.board, current.state.board);
        const mover = current.parent.state.turn === Turn.X ? 'X' : 'O';
        steps.unshift(`${mover} ${moveLabel(move)}`);
        current = current.parent;
    }

    return steps.join(' → ');
};
