/**
 * Registry store: the durable mapping from run ID to run record. Every
 * check runs inside the same transaction as the write it guards, so a
 * failed operation leaves the table unchanged.
 *
 * @module
 */

import type { Db } from '../db/connection.js';
import { invalidInput, isRegistryError, RegistryError } from '../errors.js';
import type { PathResolver } from '../paths/path-resolver.js';
import {
  IMMUTABLE_FIELDS,
  MUTABLE_FIELDS,
  type RunFilter,
  runFilterSchema,
  type RunInput,
  runInputSchema,
  type RunPatch,
  runPatchSchema,
  type RunRecord,
  runRecordSchema,
  type Stage,
} from '../schemas/run.js';

/** Row shape of the runs table. */
interface RunRow {
  id: number;
  stage: string;
  size_class: string | null;
  graph_count: number | null;
  training_duration_s: number | null;
  dataset_path: string;
  result_path: string;
  upstream_id: number | null;
  notes: string | null;
  created_at: string;
  updated_at: string;
}

/** Values bound to the mutable columns of an insert or update. */
type MutableColumns = [
  sizeClass: string | null,
  graphCount: number | null,
  trainingDurationSeconds: number | null,
  upstreamId: number | null,
  notes: string | null,
];

/** Run record store operations. */
export interface RunStore {
  /** The id the next registration will receive. */
  nextId(): number;
  /** Insert a new record with normalized paths. */
  put(record: RunInput): RunRecord;
  /** Fetch a record or throw `NotFound`. */
  get(id: number): RunRecord;
  /** Fetch a record or return null. */
  find(id: number): RunRecord | null;
  /** Fetch the record holding a result path (normalized before lookup). */
  findByResultPath(resultPath: string): RunRecord | null;
  /** Merge mutable fields into an existing record. */
  update(id: number, patch: RunPatch): RunRecord;
  /** Remove a record no other record depends on. Returns the removed record. */
  delete(id: number): RunRecord;
  /** Records whose upstream is `id`. */
  dependentsOf(id: number): RunRecord[];
  /**
   * Lazily iterate matching records in ascending id order. The connection
   * is busy until the iterator finishes; do not write while iterating.
   */
  list(filter?: RunFilter): IterableIterator<RunRecord>;
  /** Number of matching records. */
  count(filter?: RunFilter): number;
  /** Run `fn` against a consistent snapshot (deferred transaction). */
  read<T>(fn: () => T): T;
  /** Run `fn` holding the database write lock (immediate transaction). */
  write<T>(fn: () => T): T;
}

/** Dependencies for the run store. */
export interface RunStoreDeps {
  db: Db;
  resolver: PathResolver;
}

function toRecord(row: RunRow): RunRecord {
  return runRecordSchema.parse({
    id: row.id,
    stage: row.stage,
    sizeClass: row.size_class,
    graphCount: row.graph_count,
    trainingDurationSeconds: row.training_duration_s,
    datasetPath: row.dataset_path,
    resultPath: row.result_path,
    upstreamId: row.upstream_id,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

/** Build a WHERE clause and its parameters from a filter. */
function whereClause(filter: RunFilter): { sql: string; args: unknown[] } {
  const conditions: string[] = [];
  const args: unknown[] = [];

  if (filter.stage) {
    conditions.push('stage = ?');
    args.push(filter.stage);
  }
  if (filter.sizeClass) {
    conditions.push('size_class = ?');
    args.push(filter.sizeClass);
  }
  if (filter.linked !== undefined) {
    conditions.push(
      filter.linked ? 'upstream_id IS NOT NULL' : 'upstream_id IS NULL',
    );
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    args,
  };
}

function parseFilter(filter: RunFilter | undefined): RunFilter {
  const parsed = runFilterSchema.safeParse(filter ?? {});
  if (!parsed.success) throw invalidInput('run filter', parsed.error);
  return parsed.data;
}

/** Create a run store for the given database connection. */
export function createRunStore(deps: RunStoreDeps): RunStore {
  const { db, resolver } = deps;

  const selectById = db.prepare<[number], RunRow>(
    'SELECT * FROM runs WHERE id = ?',
  );
  const selectByResultPath = db.prepare<[string], RunRow>(
    'SELECT * FROM runs WHERE result_path = ?',
  );
  const selectResultPaths = db.prepare<
    [],
    { id: number; resultPath: string }
  >('SELECT id, result_path AS resultPath FROM runs');
  const selectDependents = db.prepare<[number], RunRow>(
    'SELECT * FROM runs WHERE upstream_id = ? ORDER BY id',
  );
  const selectSequence = db.prepare<[], { seq: number }>(
    `SELECT seq FROM sqlite_sequence WHERE name = 'runs'`,
  );
  const insertRun = db.prepare<
    [number, Stage, string, string, ...MutableColumns]
  >(
    `INSERT INTO runs (id, stage, dataset_path, result_path, size_class, graph_count, training_duration_s, upstream_id, notes)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const updateRun = db.prepare<[...MutableColumns, number]>(
    `UPDATE runs SET size_class = ?, graph_count = ?, training_duration_s = ?, upstream_id = ?, notes = ?,
     updated_at = datetime('now')
     WHERE id = ?`,
  );
  const deleteRun = db.prepare<[number]>('DELETE FROM runs WHERE id = ?');

  const read = <T>(fn: () => T): T => db.transaction(fn).deferred();
  const write = <T>(fn: () => T): T => db.transaction(fn).immediate();

  function find(id: number): RunRecord | null {
    const row = selectById.get(id);
    return row ? toRecord(row) : null;
  }

  function get(id: number): RunRecord {
    const record = find(id);
    if (!record) {
      throw new RegistryError('NotFound', `Run ${String(id)} not found`, {
        id,
      });
    }
    return record;
  }

  /** Highest id ever issued, including ids of purged records. */
  function highestIssuedId(): number {
    return selectSequence.get()?.seq ?? 0;
  }

  /** Upstream rules: only triplets have one, and it must be an existing doublet. */
  function checkUpstream(stage: Stage, upstreamId: number | null): void {
    if (upstreamId === null) return;
    if (stage !== 'triplet') {
      throw new RegistryError(
        'StageMismatch',
        `A ${stage} run cannot have an upstream run`,
        { stage, upstreamId },
      );
    }
    const upstream = find(upstreamId);
    if (!upstream) {
      throw new RegistryError(
        'NotFound',
        `Upstream run ${String(upstreamId)} not found`,
        { id: upstreamId },
      );
    }
    if (upstream.stage !== 'doublet') {
      throw new RegistryError(
        'StageMismatch',
        `Upstream run ${String(upstreamId)} is a ${upstream.stage} run; only doublet runs can be upstream`,
        { upstreamId, upstreamStage: upstream.stage },
      );
    }
  }

  /** Names of immutable fields the patch would change. */
  function changedImmutableFields(
    current: RunRecord,
    patch: RunPatch,
  ): string[] {
    return IMMUTABLE_FIELDS.filter((field) => {
      const value = patch[field];
      if (value === undefined) return false;
      if (field === 'datasetPath' || field === 'resultPath') {
        try {
          return resolver.normalize(String(value)) !== current[field];
        } catch (err) {
          // A malformed path can never equal the stored one.
          if (isRegistryError(err, 'MalformedPath')) return true;
          throw err;
        }
      }
      return value !== current[field];
    });
  }

  return {
    nextId(): number {
      return highestIssuedId() + 1;
    },

    put(record: RunInput): RunRecord {
      const parsed = runInputSchema.safeParse(record);
      if (!parsed.success) throw invalidInput('run record', parsed.error);
      const input = parsed.data;

      return write(() => {
        const datasetPath = resolver.normalize(input.datasetPath);

        if (find(input.id)) {
          throw new RegistryError(
            'DuplicateID',
            `Run ${String(input.id)} already exists`,
            { id: input.id },
          );
        }
        if (input.id <= highestIssuedId()) {
          throw new RegistryError(
            'DuplicateID',
            `Run ID ${String(input.id)} was already issued and cannot be reused`,
            { id: input.id },
          );
        }

        const resultPath = resolver.checkUnique(
          input.resultPath,
          selectResultPaths.all(),
        );
        const upstreamId = input.upstreamId ?? null;
        checkUpstream(input.stage, upstreamId);

        insertRun.run(
          input.id,
          input.stage,
          datasetPath,
          resultPath,
          input.sizeClass ?? null,
          input.graphCount ?? null,
          input.trainingDurationSeconds ?? null,
          upstreamId,
          input.notes ?? null,
        );
        return get(input.id);
      });
    },

    get,

    find,

    findByResultPath(resultPath: string): RunRecord | null {
      const row = selectByResultPath.get(resolver.normalize(resultPath));
      return row ? toRecord(row) : null;
    },

    update(id: number, patch: RunPatch): RunRecord {
      const parsed = runPatchSchema.safeParse(patch);
      if (!parsed.success) throw invalidInput('run update', parsed.error);
      const changes = parsed.data;

      return write(() => {
        const current = get(id);

        const violations = changedImmutableFields(current, changes);
        if (violations.length > 0) {
          throw new RegistryError(
            'ImmutableFieldViolation',
            `Cannot change ${violations.join(', ')} of run ${String(id)} after creation`,
            { id, fields: violations },
          );
        }

        if (MUTABLE_FIELDS.every((field) => changes[field] === undefined)) {
          return current;
        }

        const next = {
          sizeClass: changes.sizeClass ?? current.sizeClass,
          graphCount: changes.graphCount ?? current.graphCount,
          trainingDurationSeconds:
            changes.trainingDurationSeconds ?? current.trainingDurationSeconds,
          upstreamId: current.upstreamId,
          notes: changes.notes ?? current.notes,
        };
        // null clears a field; `??` above would keep the old value instead.
        for (const field of MUTABLE_FIELDS) {
          if (changes[field] === null) next[field] = null;
        }
        if (changes.upstreamId !== undefined) {
          next.upstreamId = changes.upstreamId;
          if (next.upstreamId !== current.upstreamId) {
            checkUpstream(current.stage, next.upstreamId);
          }
        }

        updateRun.run(
          next.sizeClass,
          next.graphCount,
          next.trainingDurationSeconds,
          next.upstreamId,
          next.notes,
          id,
        );
        return get(id);
      });
    },

    delete(id: number): RunRecord {
      return write(() => {
        const current = get(id);
        const dependents = selectDependents.all(id);
        if (dependents.length > 0) {
          const ids = dependents.map((row) => row.id);
          throw new RegistryError(
            'ReferencedByDependents',
            `Run ${String(id)} is the upstream of run(s) ${ids.join(', ')}; unlink them first`,
            { id, dependents: ids },
          );
        }
        deleteRun.run(id);
        return current;
      });
    },

    dependentsOf(id: number): RunRecord[] {
      return selectDependents.all(id).map(toRecord);
    },

    list(filter?: RunFilter): IterableIterator<RunRecord> {
      const where = whereClause(parseFilter(filter));
      const statement = db.prepare<unknown[], RunRow>(
        `SELECT * FROM runs ${where.sql} ORDER BY id`,
      );

      function* records(): IterableIterator<RunRecord> {
        for (const row of statement.iterate(...where.args)) {
          yield toRecord(row);
        }
      }
      return records();
    },

    count(filter?: RunFilter): number {
      const where = whereClause(parseFilter(filter));
      const row = db
        .prepare<
          unknown[],
          { count: number }
        >(`SELECT COUNT(*) AS count FROM runs ${where.sql}`)
        .get(...where.args);
      return row?.count ?? 0;
    },

    read,

    write,
  };
}
