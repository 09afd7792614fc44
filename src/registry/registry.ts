/**
 * Command surface over the store, path resolver and linker. Routes each
 * operation to the component that validates it and logs what changed;
 * failures reach the caller as `RegistryError`s.
 *
 * @module
 */

import type { Logger } from 'pino';

import { closeConnection, createConnection, type Db } from '../db/connection.js';
import { checkIntegrity, type IntegrityIssue } from '../db/maintenance.js';
import { runMigrations } from '../db/migrations.js';
import { invalidInput } from '../errors.js';
import { createPathResolver } from '../paths/path-resolver.js';
import type { RegistryConfig } from '../schemas/config.js';
import {
  type CompleteRunInput,
  completeRunSchema,
  type RegisterRunInput,
  registerRunSchema,
  type RunFilter,
  type RunRecord,
  type Stage,
} from '../schemas/run.js';
import { locateArtifacts, type RunArtifacts } from './artifacts.js';
import { importLedger } from './import.js';
import { createDependencyLinker } from './linker.js';
import { createRunStore, type RunStore } from './store.js';

/** Findings of an audit pass. */
export interface AuditReport {
  /** Triplet runs that do not yet name the doublet run they consume. */
  unlinkedTriplets: RunRecord[];
  /** Runs with no recorded training duration. */
  incompleteRuns: RunRecord[];
  /** Dataset directories used by more than one run. */
  sharedDatasets: Array<{ datasetPath: string; runIds: number[] }>;
  /** Problems reported by SQLite's own checks. */
  integrityIssues: IntegrityIssue[];
}

/** Aggregate counts for the inspection API. */
export interface RegistryStats {
  total: number;
  doublet: number;
  triplet: number;
  linkedTriplets: number;
  unlinkedTriplets: number;
  completed: number;
}

/** Registry command surface. */
export interface Registry {
  /** Register a new run; the id is assigned here. */
  register(input: RegisterRunInput): RunRecord;
  /** Fill in the duration and/or graph count once a run has finished. */
  complete(id: number, input: CompleteRunInput): RunRecord;
  /** Replace the notes of a run, or append a line to them. */
  annotate(id: number, notes: string, options?: { append?: boolean }): RunRecord;
  link(tripletId: number, doubletId: number): RunRecord;
  unlink(tripletId: number): RunRecord;
  get(id: number): RunRecord;
  list(filter?: RunFilter): RunRecord[];
  findByStage(stage: Stage): RunRecord[];
  /** Ancestors of a run, nearest first. */
  lineageOf(id: number): RunRecord[];
  /** Administrative delete; refused while another run depends on this one. */
  purge(id: number): RunRecord;
  artifactsOf(id: number, epoch?: number): RunArtifacts;
  audit(): AuditReport;
  stats(): RegistryStats;
  /** Register every entry of a parsed JSON ledger, all or nothing. */
  importLedger(entries: unknown): RunRecord[];
}

/** Registry dependencies. */
export interface RegistryDeps {
  db: Db;
  store: RunStore;
  logger: Logger;
}

/** Create the registry command surface. */
export function createRegistry(deps: RegistryDeps): Registry {
  const { db, store, logger } = deps;
  const linker = createDependencyLinker(store);

  const list = (filter?: RunFilter): RunRecord[] =>
    store.read(() => [...store.list(filter)]);

  return {
    register(input: RegisterRunInput): RunRecord {
      const parsed = registerRunSchema.safeParse(input);
      if (!parsed.success) throw invalidInput('registration', parsed.error);

      const record = store.write(() =>
        store.put({ ...parsed.data, id: store.nextId() }),
      );
      logger.info(
        { id: record.id, stage: record.stage, resultPath: record.resultPath },
        'Run registered',
      );
      return record;
    },

    complete(id: number, input: CompleteRunInput): RunRecord {
      const parsed = completeRunSchema.safeParse(input);
      if (!parsed.success) throw invalidInput('completion', parsed.error);

      const record = store.update(id, parsed.data);
      logger.info(
        {
          id,
          trainingDurationSeconds: record.trainingDurationSeconds,
          graphCount: record.graphCount,
        },
        'Run completed',
      );
      return record;
    },

    annotate(
      id: number,
      notes: string,
      options: { append?: boolean } = {},
    ): RunRecord {
      const record = store.write(() => {
        const current = store.get(id);
        const next =
          options.append && current.notes ? `${current.notes}\n${notes}` : notes;
        return store.update(id, { notes: next });
      });
      logger.info({ id, append: options.append ?? false }, 'Run annotated');
      return record;
    },

    link(tripletId: number, doubletId: number): RunRecord {
      const record = linker.link(tripletId, doubletId);
      logger.info({ tripletId, doubletId }, 'Runs linked');
      return record;
    },

    unlink(tripletId: number): RunRecord {
      const record = linker.unlink(tripletId);
      logger.info({ tripletId }, 'Run unlinked');
      return record;
    },

    get(id: number): RunRecord {
      logger.debug({ id }, 'Get run');
      return store.get(id);
    },

    list(filter?: RunFilter): RunRecord[] {
      logger.debug({ filter }, 'List runs');
      return list(filter);
    },

    findByStage(stage: Stage): RunRecord[] {
      return list({ stage });
    },

    lineageOf(id: number): RunRecord[] {
      logger.debug({ id }, 'Lineage');
      return linker.lineage(id);
    },

    purge(id: number): RunRecord {
      const record = store.delete(id);
      logger.info({ id, resultPath: record.resultPath }, 'Run purged');
      return record;
    },

    artifactsOf(id: number, epoch?: number): RunArtifacts {
      return store.read(() => {
        const record = store.get(id);
        const upstream =
          record.upstreamId === null ? null : store.get(record.upstreamId);
        return locateArtifacts(record.resultPath, {
          epoch,
          upstreamResultPath: upstream?.resultPath ?? null,
        });
      });
    },

    audit(): AuditReport {
      return store.read(() => {
        const all = [...store.list()];

        const byDataset = new Map<string, number[]>();
        for (const record of all) {
          const ids = byDataset.get(record.datasetPath) ?? [];
          ids.push(record.id);
          byDataset.set(record.datasetPath, ids);
        }

        return {
          unlinkedTriplets: all.filter(
            (r) => r.stage === 'triplet' && r.upstreamId === null,
          ),
          incompleteRuns: all.filter((r) => r.trainingDurationSeconds === null),
          sharedDatasets: [...byDataset]
            .filter(([, runIds]) => runIds.length > 1)
            .map(([datasetPath, runIds]) => ({ datasetPath, runIds })),
          integrityIssues: checkIntegrity(db, logger),
        };
      });
    },

    stats(): RegistryStats {
      return store.read(() => {
        const linkedTriplets = store.count({ stage: 'triplet', linked: true });
        const triplet = store.count({ stage: 'triplet' });
        const completed = db
          .prepare<
            [],
            { count: number }
          >('SELECT COUNT(*) AS count FROM runs WHERE training_duration_s IS NOT NULL')
          .get();
        return {
          total: store.count(),
          doublet: store.count({ stage: 'doublet' }),
          triplet,
          linkedTriplets,
          unlinkedTriplets: triplet - linkedTriplets,
          completed: completed?.count ?? 0,
        };
      });
    },

    importLedger(entries: unknown): RunRecord[] {
      return importLedger(store, entries, logger);
    },
  };
}

/** An open registry and the connection behind it. */
export interface OpenRegistry {
  registry: Registry;
  db: Db;
  close(): void;
}

/**
 * Open the configured database, apply migrations, and build the registry.
 * `env` feeds `$VAR` expansion in paths when `paths.expandEnv` is set.
 */
export function openRegistry(
  config: RegistryConfig,
  logger: Logger,
  env: Readonly<Record<string, string | undefined>> = process.env,
): OpenRegistry {
  const db = createConnection(config.dbPath, {
    busyTimeoutMs: config.busyTimeoutMs,
  });
  runMigrations(db);
  logger.debug({ dbPath: config.dbPath }, 'Database ready');

  const resolver = createPathResolver({
    case: config.paths.case,
    baseDir: config.paths.baseDir,
    env: config.paths.expandEnv ? env : undefined,
  });
  const store = createRunStore({ db, resolver });

  return {
    registry: createRegistry({ db, store, logger }),
    db,
    close: () => {
      closeConnection(db);
    },
  };
}
