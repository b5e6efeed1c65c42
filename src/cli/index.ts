#!/usr/bin/env node
/**
 * River crossing solver - CLI entry point
 *
 * Usage: river-solver [missionaries] [cannibals]
 */

import { runCli } from './run.js';

function main(): void {
  process.exitCode = runCli(process.argv.slice(2));
}

try {
  main();
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
}
