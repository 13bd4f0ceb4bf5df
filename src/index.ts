/*
 * Main entry point for the tic-tac-toe MCTS package
 * Re-exports all public APIs
 */

export * from './game-state.js';
export * from './errors.js';
export * from './search-tree.js';
export * from './strategies/index.js';
export * from './modular/index.js';
export * from './utils/random.js';
export * from './utils/game-driver.js';
export { printTree, getNodePath } from './utils/tree-debug.js';
