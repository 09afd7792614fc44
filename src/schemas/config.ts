/**
 * Registry configuration schema and types.
 *
 * @module
 */

import { z } from 'zod';

/** Log configuration sub-schema. */
const logSchema = z.object({
  /** Log level threshold (trace, debug, info, warn, error, fatal, silent). */
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  /** Optional log file path. Logs go to stderr when unset. */
  file: z.string().optional(),
});

/** Path normalization sub-schema. */
const pathsSchema = z.object({
  /** Casing convention applied to stored paths. */
  case: z.enum(['preserve', 'lower']).default('preserve'),
  /** Directory that relative paths are resolved against. Kept relative when unset. */
  baseDir: z.string().optional(),
  /** Expand `$VAR` and `${VAR}` references from the environment. */
  expandEnv: z.boolean().default(true),
});

/** Full registry configuration schema. Validates and provides defaults. */
export const registryConfigSchema = z.object({
  /** Path to SQLite database file. */
  dbPath: z.string().default('./data/run-ledger.sqlite'),
  /** How long a writer waits for the database lock, in milliseconds. */
  busyTimeoutMs: z.number().int().nonnegative().default(5000),
  /** HTTP port for the read-only inspection API. */
  port: z.number().int().min(1).max(65535).default(3120),
  /** Interface the inspection API binds to. */
  host: z.string().default('127.0.0.1'),
  /** Logging configuration. */
  log: logSchema.default({ level: 'info' }),
  /** Path normalization configuration. */
  paths: pathsSchema.default({ case: 'preserve', expandEnv: true }),
});

/** Inferred registry configuration type. */
export type RegistryConfig = z.infer<typeof registryConfigSchema>;
export type PathsConfig = RegistryConfig['paths'];
