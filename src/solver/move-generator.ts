/**
 * Generate legal successor states from the current state
 */

import type { Crossing, RiverState } from '../domain/types.js';
import { BOAT_CAPACITY, BOAT_MIN_OCCUPANTS } from '../domain/constants.js';
import { applyCrossing, departureBank } from '../state/river-state.js';
import { isSafe } from '../constraints/safety.js';

/**
 * Every boat load that fits on the boat and is available on the departure bank.
 * Ordered by missionaries ascending, then cannibals ascending.
 */
export function enumerateCrossings(state: RiverState): Crossing[] {
  const crossings: Crossing[] = [];
  const bank = departureBank(state);

  for (let m = 0; m <= bank.missionaries; m++) {
    for (let c = 0; c <= bank.cannibals; c++) {
      const load = m + c;
      if (load >= BOAT_MIN_OCCUPANTS && load <= BOAT_CAPACITY) {
        crossings.push({ missionaries: m, cannibals: c });
      }
    }
  }

  return crossings;
}

/**
 * Generate all safe states reachable by one crossing
 */
export function generateMoves(state: RiverState): RiverState[] {
  const moves: RiverState[] = [];

  for (const crossing of enumerateCrossings(state)) {
    const next = applyCrossing(state, crossing);
    if (isSafe(next)) {
      moves.push(next);
    }
  }

  return moves;
}
