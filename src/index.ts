/**
 * Public API exports for run-ledger.
 *
 * @module
 */

// Schemas
export type { PathsConfig, RegistryConfig } from './schemas/config.js';
export { registryConfigSchema } from './schemas/config.js';
export type { LedgerEntry } from './schemas/ledger.js';
export { ledgerEntrySchema, ledgerSchema } from './schemas/ledger.js';
export type {
  CompleteRunInput,
  RegisterRunInput,
  RunFilter,
  RunInput,
  RunPatch,
  RunRecord,
  Stage,
} from './schemas/run.js';
export {
  runFilterSchema,
  runInputSchema,
  runPatchSchema,
  runRecordSchema,
  stageSchema,
} from './schemas/run.js';

// Errors
export type { ErrorDescription, RegistryErrorKind } from './errors.js';
export {
  describeError,
  EXIT_CODES,
  HTTP_STATUS,
  isRegistryError,
  RegistryError,
  registryErrorKinds,
} from './errors.js';

// Registry
export type {
  AuditReport,
  OpenRegistry,
  Registry,
  RegistryDeps,
  RegistryStats,
} from './registry/registry.js';
export { createRegistry, openRegistry } from './registry/registry.js';
export type { RunStore, RunStoreDeps } from './registry/store.js';
export { createRunStore } from './registry/store.js';
export type { DependencyLinker } from './registry/linker.js';
export { createDependencyLinker, walkLineage } from './registry/linker.js';
export type { RunArtifacts } from './registry/artifacts.js';
export { checkpointFileName, locateArtifacts } from './registry/artifacts.js';
export { readLedgerFile } from './registry/import.js';

// Paths
export type {
  PathResolver,
  PathResolverOptions,
  ResultPathEntry,
} from './paths/path-resolver.js';
export { createPathResolver, expandEnv } from './paths/path-resolver.js';

// Service
export type { Service } from './service.js';
export { createService } from './service.js';

// Utilities
export { loadConfig } from './lib/config.js';
export { formatDuration, parseDuration } from './lib/duration.js';
export { createLogger } from './lib/logger.js';

// Database
export type { Db } from './db/connection.js';
export { closeConnection, createConnection } from './db/connection.js';
export type { IntegrityIssue } from './db/maintenance.js';
export { checkIntegrity } from './db/maintenance.js';
export { runMigrations } from './db/migrations.js';
