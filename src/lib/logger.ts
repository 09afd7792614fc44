/**
 * Pino logger factory. Writes to the configured log file, or to stderr so
 * CLI output on stdout stays clean.
 *
 * @module
 */

import pino, { type DestinationStream, type Logger } from 'pino';

import type { RegistryConfig } from '../schemas/config.js';

/** Synchronous destination for the configured log file, or stderr. */
export function logDestination(log: RegistryConfig['log']): DestinationStream {
  return pino.destination({ dest: log.file ?? 2, sync: true, mkdir: true });
}

/** Create the process logger from the log section of the config. */
export function createLogger(log: RegistryConfig['log']): Logger {
  return pino({ level: log.level }, logDestination(log));
}
