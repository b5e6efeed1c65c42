/**
 * Integration tests for the command line runner
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { runCli } from '../../src/cli/run.js';
import type { OutputPort } from '../../src/cli/run.js';
import { MalformedCountError } from '../../src/domain/errors.js';
import { formatStateTrace } from '../../src/io/state-formatter.js';
import { createState, createInitialState } from '../../src/state/river-state.js';

function captureOutput(): OutputPort & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];

  return {
    logs,
    errors,
    log: message => logs.push(message),
    error: message => errors.push(message),
  };
}

describe('CLI Runner', () => {
  it('should solve the default puzzle', () => {
    const output = captureOutput();

    assert.equal(runCli([], output), 0);
    assert.equal(output.logs.length, 16);
    assert.equal(output.logs[0], formatStateTrace(createInitialState(3, 3)));
    assert.equal(output.logs[15], 'Solution found!');
    assert.deepEqual(output.errors, []);
  });

  it('should trace each state then report a single missionary solved', () => {
    const output = captureOutput();

    assert.equal(runCli(['1'], output), 0);
    assert.deepEqual(output.logs, [
      formatStateTrace(createInitialState(1, 0)),
      formatStateTrace(createState({ rightMissionaries: 1, boatSide: 'RIGHT' })),
      'Solution found!',
    ]);
  });

  it('should report no solution for an empty river', () => {
    const output = captureOutput();

    assert.equal(runCli(['0', '0'], output), 0);
    assert.equal(output.logs.length, 2);
    assert.equal(output.logs[1], 'No solution exists.');
  });

  it('should report no solution for four pairs', () => {
    const output = captureOutput();

    assert.equal(runCli(['4', '4'], output), 0);
    assert.equal(output.logs.length, 12);
    assert.equal(output.logs[11], 'No solution exists.');
  });

  it('should fail on a negative count without searching', () => {
    const output = captureOutput();

    assert.equal(runCli(['-1'], output), 1);
    assert.deepEqual(output.logs, []);
    assert.deepEqual(output.errors, ['Missionary count cannot be negative.']);
  });

  it('should name the cannibals when both counts are negative', () => {
    const output = captureOutput();

    assert.equal(runCli(['-1', '-1'], output), 1);
    assert.deepEqual(output.errors, ['Cannibal count cannot be negative.']);
  });

  it('should throw on malformed numbers', () => {
    const output = captureOutput();

    assert.throws(() => runCli(['many'], output), MalformedCountError);
    assert.deepEqual(output.logs, []);
  });
});
