/**
 * Format states and results for console output
 */

import type { RiverState, SearchResult } from '../domain/types.js';
import { RESULT_MESSAGES } from '../domain/constants.js';

/**
 * Trace block printed for every expanded state
 */
export function formatStateTrace(state: RiverState): string {
  const lines = [
    'Current State: ',
    `\tMissionaries on the left: ${state.leftMissionaries}`,
    `\tCannibals on the left: ${state.leftCannibals}`,
    `\tMissionaries on the right: ${state.rightMissionaries}`,
    `\tCannibals on the right: ${state.rightCannibals}`,
    `\tBoat on the left: ${state.boatSide === 'LEFT'}`,
  ];

  return lines.join('\n');
}

/**
 * Final one-line verdict
 */
export function formatResult(found: boolean): string {
  return found ? RESULT_MESSAGES.SOLVED : RESULT_MESSAGES.UNSOLVED;
}

/**
 * Compact one-line summary, e.g. `3M 3C | boat | 0M 0C`
 */
export function formatCompactState(state: RiverState): string {
  const left = `${state.leftMissionaries}M ${state.leftCannibals}C`;
  const right = `${state.rightMissionaries}M ${state.rightCannibals}C`;

  return state.boatSide === 'LEFT' ? `${left} boat| ${right}` : `${left} |boat ${right}`;
}

export function formatSearchStats(result: SearchResult): string {
  return `States explored: ${result.statesExplored}, peak frontier: ${result.maxFrontierSize}`;
}
