/**
 * River crossing solver - CLI runner
 */

import { InvalidCountError } from '../domain/errors.js';
import { createInitialState } from '../state/river-state.js';
import { RiverSolver } from '../solver/solver.js';
import { parseCounts } from '../io/args-parser.js';
import type { InitialCounts } from '../io/args-parser.js';
import { formatResult, formatStateTrace } from '../io/state-formatter.js';

// Where the CLI writes; defaults to the console
export interface OutputPort {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: OutputPort = {
  log(message: string): void {
    console.log(message);
  },

  error(message: string): void {
    console.error(message);
  },
};

/**
 * Run the solver for the given arguments and return the exit status.
 * Malformed numbers are thrown to the caller.
 */
export function runCli(args: string[], output: OutputPort = consoleOutput): number {
  let counts: InitialCounts;

  try {
    counts = parseCounts(args);
  } catch (err) {
    if (err instanceof InvalidCountError) {
      output.error(err.message);
      return 1;
    }
    throw err;
  }

  const solver = new RiverSolver({
    onVisit: state => output.log(formatStateTrace(state)),
  });

  const found = solver.solve(createInitialState(counts.missionaries, counts.cannibals));
  output.log(formatResult(found));

  return 0;
}
