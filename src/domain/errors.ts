import type { PassengerRole } from './types.js';

/**
 * Thrown when a head count is negative.
 *
 * @example
 * ```ts
 * try {
 *   parseCounts(['-1']);
 * } catch (err) {
 *   if (err instanceof InvalidCountError) {
 *     console.error(err.message); // "Missionary count cannot be negative."
 *   }
 * }
 * ```
 */
export class InvalidCountError extends Error {
  readonly role: PassengerRole;
  readonly value: number;

  constructor(role: PassengerRole, value: number) {
    const label = role === 'missionary' ? 'Missionary' : 'Cannibal';
    super(`${label} count cannot be negative.`);
    this.name = 'InvalidCountError';
    this.role = role;
    this.value = value;
  }
}

/**
 * Thrown when a head count argument is not an integer literal, or does not
 * fit in a safe integer.
 */
export class MalformedCountError extends Error {
  /** The raw argument as given on the command line. */
  readonly input: string;

  constructor(role: PassengerRole, input: string) {
    super(`Invalid ${role} count "${input}": expected an integer.`);
    this.name = 'MalformedCountError';
    this.input = input;
  }
}
