/**
 * State hashing and equality for duplicate detection during search
 */

import type { RiverState } from '../domain/types.js';

/**
 * Structural equality over all five fields
 */
export function statesEqual(a: RiverState, b: RiverState): boolean {
  return (
    a.leftMissionaries === b.leftMissionaries &&
    a.leftCannibals === b.leftCannibals &&
    a.rightMissionaries === b.rightMissionaries &&
    a.rightCannibals === b.rightCannibals &&
    a.boatSide === b.boatSide
  );
}

/**
 * Combine the four counts and the boat flag into a 32-bit integer.
 * Different states may collide; equal states never differ.
 */
export function hashState(state: RiverState): number {
  const boatOnLeft = state.boatSide === 'LEFT' ? 1 : 0;

  return (
    state.leftMissionaries ^
    (state.leftCannibals << 1) ^
    (state.rightMissionaries << 2) ^
    (state.rightCannibals << 3) ^
    (boatOnLeft << 4)
  );
}

/**
 * Set of states keyed by hashState, with collisions resolved by statesEqual
 */
export class StateSet implements Iterable<RiverState> {
  private buckets = new Map<number, RiverState[]>();
  private count = 0;

  add(state: RiverState): boolean {
    const hash = hashState(state);
    const bucket = this.buckets.get(hash);

    if (!bucket) {
      this.buckets.set(hash, [state]);
    } else if (bucket.some(s => statesEqual(s, state))) {
      return false;
    } else {
      bucket.push(state);
    }

    this.count++;
    return true;
  }

  has(state: RiverState): boolean {
    const bucket = this.buckets.get(hashState(state));
    return bucket !== undefined && bucket.some(s => statesEqual(s, state));
  }

  size(): number {
    return this.count;
  }

  *[Symbol.iterator](): Iterator<RiverState> {
    for (const bucket of this.buckets.values()) {
      yield* bucket;
    }
  }
}
