/**
 * River state representation and management
 */

import type { BankCounts, Crossing, RiverState } from '../domain/types.js';
import { oppositeSide } from '../domain/types.js';

/**
 * Create a state with nobody anywhere and the boat on the left
 */
export function createEmptyState(): RiverState {
  return createState({});
}

/**
 * Create a state from explicit counts; missing counts are zero
 */
export function createState(counts: BankCounts): RiverState {
  return {
    leftMissionaries: counts.leftMissionaries ?? 0,
    leftCannibals: counts.leftCannibals ?? 0,
    rightMissionaries: counts.rightMissionaries ?? 0,
    rightCannibals: counts.rightCannibals ?? 0,
    boatSide: counts.boatSide ?? 'LEFT',
  };
}

/**
 * Create the starting state: everyone and the boat on the left bank
 */
export function createInitialState(missionaries: number, cannibals: number): RiverState {
  return createState({ leftMissionaries: missionaries, leftCannibals: cannibals });
}

/**
 * Copy a state
 */
export function cloneState(state: RiverState): RiverState {
  return { ...state };
}

/**
 * Ferry a load from the boat's bank to the other one.
 * Safety is not checked here.
 */
export function applyCrossing(state: RiverState, crossing: Crossing): RiverState {
  const { missionaries, cannibals } = crossing;

  if (state.boatSide === 'LEFT') {
    return {
      leftMissionaries: state.leftMissionaries - missionaries,
      leftCannibals: state.leftCannibals - cannibals,
      rightMissionaries: state.rightMissionaries + missionaries,
      rightCannibals: state.rightCannibals + cannibals,
      boatSide: oppositeSide(state.boatSide),
    };
  }

  return {
    leftMissionaries: state.leftMissionaries + missionaries,
    leftCannibals: state.leftCannibals + cannibals,
    rightMissionaries: state.rightMissionaries - missionaries,
    rightCannibals: state.rightCannibals - cannibals,
    boatSide: oppositeSide(state.boatSide),
  };
}

/**
 * Head counts on the bank the boat is currently at
 */
export function departureBank(state: RiverState): Crossing {
  return state.boatSide === 'LEFT'
    ? { missionaries: state.leftMissionaries, cannibals: state.leftCannibals }
    : { missionaries: state.rightMissionaries, cannibals: state.rightCannibals };
}

export function totalMissionaries(state: RiverState): number {
  return state.leftMissionaries + state.rightMissionaries;
}

export function totalCannibals(state: RiverState): number {
  return state.leftCannibals + state.rightCannibals;
}
