/**
 * Constants for the river crossing solver
 */

// Initial head counts when none are given
export const DEFAULT_MISSIONARIES = 3;
export const DEFAULT_CANNIBALS = 3;

// Boat limits (a trip always carries someone)
export const BOAT_MIN_OCCUPANTS = 1;
export const BOAT_CAPACITY = 2;

// Final CLI messages
export const RESULT_MESSAGES = {
  SOLVED: 'Solution found!',
  UNSOLVED: 'No solution exists.',
};
