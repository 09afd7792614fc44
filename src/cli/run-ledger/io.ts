/**
 * Console and process bindings for the CLI, kept behind an interface so
 * commands can run in-process under test.
 *
 * @module
 */

import type { Logger } from 'pino';

import { createLogger } from '../../lib/logger.js';
import type { RegistryConfig } from '../../schemas/config.js';

export interface CliIo {
  /** Write a line of command output (stdout). */
  out(line: string): void;
  /** Write a line of diagnostics (stderr). */
  err(line: string): void;
  /** Record the process exit status. */
  setExitCode(code: number): void;
  /** Environment used for config lookup and `$VAR` path expansion. */
  env: Readonly<Record<string, string | undefined>>;
  /** Build the logger for a loaded config. */
  createLogger(log: RegistryConfig['log']): Logger;
}

/** IO bound to the real console and process. */
export function processIo(): CliIo {
  return {
    out: (line) => {
      console.log(line);
    },
    err: (line) => {
      console.error(line);
    },
    setExitCode: (code) => {
      process.exitCode = code;
    },
    env: process.env,
    createLogger,
  };
}
