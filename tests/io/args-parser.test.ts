/**
 * Tests for command line count parsing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseCount, parseCounts } from '../../src/io/args-parser.js';
import { InvalidCountError, MalformedCountError } from '../../src/domain/errors.js';

function isInvalid(role: string, value: number) {
  return (err: unknown): boolean =>
    err instanceof InvalidCountError && err.role === role && err.value === value;
}

describe('Single Count Parsing', () => {
  it('should accept plain and signed integers', () => {
    assert.equal(parseCount('missionary', '7'), 7);
    assert.equal(parseCount('missionary', '+2'), 2);
    assert.equal(parseCount('cannibal', ' 4 '), 4);
  });

  it('should normalise negative zero', () => {
    assert.ok(Object.is(parseCount('missionary', '-0'), 0));
  });

  it('should reject non-integers as malformed', () => {
    for (const input of ['abc', '', '3.5', '1e3', '0x10', '2abc']) {
      assert.throws(() => parseCount('missionary', input), MalformedCountError, `accepted "${input}"`);
    }
  });

  it('should reject values beyond the safe integer range', () => {
    assert.throws(() => parseCount('cannibal', '99999999999999999999'), MalformedCountError);
  });

  it('should name the argument in the malformed message', () => {
    assert.throws(() => parseCount('cannibal', 'lots'), {
      name: 'MalformedCountError',
      message: 'Invalid cannibal count "lots": expected an integer.',
    });
  });

  it('should reject negative counts', () => {
    assert.throws(() => parseCount('missionary', '-1'), {
      name: 'InvalidCountError',
      message: 'Missionary count cannot be negative.',
    });
  });
});

describe('Argument Parsing', () => {
  it('should default to three and three with no arguments', () => {
    assert.deepEqual(parseCounts([]), { missionaries: 3, cannibals: 3 });
  });

  it('should fall back to the defaults for three or more arguments', () => {
    assert.deepEqual(parseCounts(['1', '2', '3']), { missionaries: 3, cannibals: 3 });
    assert.deepEqual(parseCounts(['-1', 'x', '3', '4']), { missionaries: 3, cannibals: 3 });
  });

  it('should set only missionaries with one argument', () => {
    assert.deepEqual(parseCounts(['5']), { missionaries: 5, cannibals: 0 });
  });

  it('should set missionaries then cannibals with two arguments', () => {
    assert.deepEqual(parseCounts(['4', '2']), { missionaries: 4, cannibals: 2 });
  });

  it('should check the cannibal count first', () => {
    assert.throws(() => parseCounts(['-1', '-2']), isInvalid('cannibal', -2));
    assert.throws(() => parseCounts(['oops', '-2']), isInvalid('cannibal', -2));
  });

  it('should still check the missionary count when cannibals are valid', () => {
    assert.throws(() => parseCounts(['-3', '2']), isInvalid('missionary', -3));
    assert.throws(() => parseCounts(['-3']), isInvalid('missionary', -3));
  });

  it('should surface malformed input separately from negative counts', () => {
    assert.throws(() => parseCounts(['-1', 'x']), MalformedCountError);
    assert.throws(() => parseCounts(['three']), MalformedCountError);
  });
});
