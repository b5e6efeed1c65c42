/**
 * Solver module exports
 */

export * from './frontier.js';
export * from './move-generator.js';
export * from './bfs.js';
export * from './solver.js';
