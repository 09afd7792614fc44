#!/usr/bin/env node
/**
 * CLI entry point for run-ledger.
 *
 * @module
 */

import { processIo } from './io.js';
import { createProgram } from './program.js';

createProgram(processIo())
  .parseAsync()
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
