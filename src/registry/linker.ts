/**
 * Dependency linker: the doublet → triplet edge and lineage walks over it.
 *
 * @module
 */

import { RegistryError } from '../errors.js';
import type { RunRecord } from '../schemas/run.js';
import type { RunStore } from './store.js';

/** Dependency edge operations. */
export interface DependencyLinker {
  /** Make `doubletId` the upstream of `tripletId`. */
  link(tripletId: number, doubletId: number): RunRecord;
  /** Clear the upstream of `tripletId`. Idempotent. */
  unlink(tripletId: number): RunRecord;
  /** Ancestors of `id`, nearest first. */
  lineage(id: number): RunRecord[];
}

/**
 * Follow `upstreamId` from `startId` until it is null. Stages only ever
 * form two-level chains today, but the walk takes any depth and throws
 * `CycleDetected` if it comes back to an id it has seen.
 */
export function walkLineage(
  startId: number,
  fetch: (id: number) => RunRecord,
): RunRecord[] {
  const start = fetch(startId);
  const visited = new Set<number>([start.id]);
  const ancestors: RunRecord[] = [];

  let next = start.upstreamId;
  while (next !== null) {
    if (visited.has(next)) {
      throw new RegistryError(
        'CycleDetected',
        `Lineage of run ${String(startId)} revisits run ${String(next)}`,
        { id: startId, path: [...visited, next] },
      );
    }
    visited.add(next);
    const parent = fetch(next);
    ancestors.push(parent);
    next = parent.upstreamId;
  }

  return ancestors;
}

/** Create a dependency linker over the given store. */
export function createDependencyLinker(store: RunStore): DependencyLinker {
  return {
    link(tripletId: number, doubletId: number): RunRecord {
      return store.write(() => {
        const triplet = store.get(tripletId);
        const doublet = store.get(doubletId);

        if (triplet.stage !== 'triplet' || doublet.stage !== 'doublet') {
          throw new RegistryError(
            'StageMismatch',
            `Can only link a triplet run to a doublet run; run ${String(tripletId)} is ${triplet.stage} and run ${String(doubletId)} is ${doublet.stage}`,
            {
              tripletId,
              tripletStage: triplet.stage,
              doubletId,
              doubletStage: doublet.stage,
            },
          );
        }
        if (triplet.upstreamId !== null) {
          throw new RegistryError(
            'AlreadyLinked',
            `Run ${String(tripletId)} is already linked to run ${String(triplet.upstreamId)}; unlink it first`,
            { tripletId, upstreamId: triplet.upstreamId },
          );
        }

        return store.update(tripletId, { upstreamId: doubletId });
      });
    },

    unlink(tripletId: number): RunRecord {
      return store.write(() => {
        const record = store.get(tripletId);
        if (record.upstreamId === null) return record;
        return store.update(tripletId, { upstreamId: null });
      });
    },

    lineage(id: number): RunRecord[] {
      return store.read(() => walkLineage(id, (runId) => store.get(runId)));
    },
  };
}
