/**
 * Configuration loading: JSON file validated against the registry schema.
 *
 * @module
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { type RegistryConfig, registryConfigSchema } from '../schemas/config.js';

/** Environment variable naming the config file when `--config` is absent. */
export const CONFIG_ENV = 'RUN_LEDGER_CONFIG';

/** Environment variable that overrides the configured database path. */
export const DB_PATH_ENV = 'RUN_LEDGER_DB_PATH';

/** Parse and validate config JSON. Throws SyntaxError or ZodError. */
export function parseConfig(raw: string): RegistryConfig {
  return registryConfigSchema.parse(JSON.parse(raw));
}

/**
 * Load and validate config from a JSON file path (or `RUN_LEDGER_CONFIG`),
 * or return defaults. `RUN_LEDGER_DB_PATH` overrides `dbPath`.
 */
export function loadConfig(
  configPath?: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): RegistryConfig {
  const path = configPath ?? env[CONFIG_ENV];
  const config = path
    ? parseConfig(readFileSync(resolve(path), 'utf-8'))
    : registryConfigSchema.parse({});

  const dbPath = env[DB_PATH_ENV];
  return dbPath ? { ...config, dbPath } : config;
}
