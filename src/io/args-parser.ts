/**
 * Parse head counts from command line arguments
 */

import type { PassengerRole } from '../domain/types.js';
import { DEFAULT_CANNIBALS, DEFAULT_MISSIONARIES } from '../domain/constants.js';
import { InvalidCountError, MalformedCountError } from '../domain/errors.js';

export interface InitialCounts {
  missionaries: number;
  cannibals: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse one non-negative head count
 *
 * @throws MalformedCountError when the input is not an integer
 * @throws InvalidCountError when the value is negative
 */
export function parseCount(role: PassengerRole, input: string): number {
  const trimmed = input.trim();

  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new MalformedCountError(role, input);
  }

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedCountError(role, input);
  }

  if (value < 0) {
    throw new InvalidCountError(role, value);
  }

  // "-0" parses to negative zero
  return value === 0 ? 0 : value;
}

/**
 * Turn positional arguments into initial counts.
 *
 * One argument sets the missionaries (no cannibals). Two set missionaries then
 * cannibals; the cannibal count is checked first. Anything else falls back to
 * the defaults.
 */
export function parseCounts(args: string[]): InitialCounts {
  switch (args.length) {
    case 1:
      return {
        missionaries: parseCount('missionary', args[0]),
        cannibals: 0,
      };

    case 2: {
      const cannibals = parseCount('cannibal', args[1]);
      const missionaries = parseCount('missionary', args[0]);
      return { missionaries, cannibals };
    }

    default:
      return {
        missionaries: DEFAULT_MISSIONARIES,
        cannibals: DEFAULT_CANNIBALS,
      };
  }
}
