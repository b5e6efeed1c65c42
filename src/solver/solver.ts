/**
 * Main Solver Interface
 */

import type { RiverState, SearchResult, SolverOptions } from '../domain/types.js';
import { DEFAULT_CANNIBALS, DEFAULT_MISSIONARIES } from '../domain/constants.js';
import { createInitialState } from '../state/river-state.js';
import { bfsSearch } from './bfs.js';

/**
 * River crossing solver
 */
export class RiverSolver {
  constructor(private readonly options: Partial<SolverOptions> = {}) {}

  /**
   * Whether everyone can be ferried to the right bank
   */
  solve(initialState: RiverState): boolean {
    return this.search(initialState).found;
  }

  /**
   * Run the search and report statistics
   */
  search(initialState: RiverState): SearchResult {
    return bfsSearch(initialState, this.options);
  }

  /**
   * The classic three missionaries, three cannibals setup
   */
  static createClassicState(): RiverState {
    return createInitialState(DEFAULT_MISSIONARIES, DEFAULT_CANNIBALS);
  }
}

/**
 * Quick solve function for a fresh puzzle with everyone on the left bank
 */
export function quickSolve(
  missionaries: number = DEFAULT_MISSIONARIES,
  cannibals: number = DEFAULT_CANNIBALS,
  options: Partial<SolverOptions> = {}
): SearchResult {
  const solver = new RiverSolver(options);
  return solver.search(createInitialState(missionaries, cannibals));
}
