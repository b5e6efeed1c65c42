/**
 * Breadth-first search over river states
 */

import type { RiverState, SearchResult, SolverOptions } from '../domain/types.js';
import { StateSet } from '../state/state-hash.js';
import { generateMoves } from './move-generator.js';
import { Frontier } from './frontier.js';
import { formatStateTrace } from '../io/state-formatter.js';

export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  onVisit: state => console.log(formatStateTrace(state)),
};

/**
 * Everyone is on the right bank and the boat made its last trip there
 */
export function isGoalState(state: RiverState): boolean {
  return state.leftMissionaries === 0 && state.leftCannibals === 0 && state.boatSide !== 'LEFT';
}

/**
 * Run BFS from the initial state
 *
 * Duplicates may sit in the frontier; they are discarded when dequeued.
 * Each distinct state is expanded at most once, so the search always ends.
 */
export function bfsSearch(
  initialState: RiverState,
  options: Partial<SolverOptions> = {}
): SearchResult {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };

  const visited = new StateSet();
  const frontier = new Frontier<RiverState>();
  frontier.push(initialState);

  let maxFrontierSize = frontier.size();

  while (!frontier.isEmpty()) {
    const current = frontier.pop();
    if (current === undefined) break;

    if (!visited.add(current)) continue;

    opts.onVisit(current);

    if (isGoalState(current)) {
      return {
        found: true,
        goalState: current,
        statesExplored: visited.size(),
        maxFrontierSize,
      };
    }

    for (const next of generateMoves(current)) {
      if (!visited.has(next)) {
        frontier.push(next);
      }
    }

    maxFrontierSize = Math.max(maxFrontierSize, frontier.size());
  }

  return {
    found: false,
    goalState: null,
    statesExplored: visited.size(),
    maxFrontierSize,
  };
}

/**
 * Whether the goal is reachable from the initial state
 */
export function solve(initialState: RiverState, options: Partial<SolverOptions> = {}): boolean {
  return bfsSearch(initialState, options).found;
}
