/**
 * Core type definitions for the river crossing solver
 */

// Which bank the boat is moored at
export type BoatSide = 'LEFT' | 'RIGHT';

// Which group a count refers to
export type PassengerRole = 'missionary' | 'cannibal';

// A snapshot of the puzzle: head counts on each bank plus the boat
export interface RiverState {
  readonly leftMissionaries: number;
  readonly leftCannibals: number;
  readonly rightMissionaries: number;
  readonly rightCannibals: number;
  readonly boatSide: BoatSide;
}

// Head counts used to build a state; boat defaults to the left bank
export interface BankCounts {
  leftMissionaries?: number;
  leftCannibals?: number;
  rightMissionaries?: number;
  rightCannibals?: number;
  boatSide?: BoatSide;
}

// One boat load
export interface Crossing {
  missionaries: number;
  cannibals: number;
}

// Solver configuration
export interface SolverOptions {
  // Called once per expanded state, in expansion order
  onVisit: (state: RiverState) => void;
}

// Search outcome with statistics
export interface SearchResult {
  found: boolean;
  goalState: RiverState | null;
  statesExplored: number;
  maxFrontierSize: number;
}

/**
 * The bank opposite the given one
 */
export function oppositeSide(side: BoatSide): BoatSide {
  return side === 'LEFT' ? 'RIGHT' : 'LEFT';
}
