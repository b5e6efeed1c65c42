/**
 * Safety rules: missionaries may never be outnumbered where they stand
 */

import type { RiverState } from '../domain/types.js';

/**
 * A bank is unsafe when missionaries are present and cannibals outnumber them
 */
export function isBankSafe(missionaries: number, cannibals: number): boolean {
  return !(missionaries !== 0 && missionaries < cannibals);
}

/**
 * Check both banks of a state
 */
export function isSafe(state: RiverState): boolean {
  return (
    isBankSafe(state.leftMissionaries, state.leftCannibals) &&
    isBankSafe(state.rightMissionaries, state.rightCannibals)
  );
}
