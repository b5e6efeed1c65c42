/**
 * Missionaries and Cannibals Solver
 *
 * Breadth-first search over river crossing states.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// State exports
export * from './state/river-state.js';
export * from './state/state-hash.js';

// Constraint exports
export * from './constraints/safety.js';

// Solver exports
export * from './solver/index.js';

// I/O exports
export * from './io/state-formatter.js';
export * from './io/args-parser.js';
