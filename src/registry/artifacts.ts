/**
 * Conventional file locations inside a training result directory. Only
 * path strings are derived; nothing is read from storage.
 *
 * @module
 */

import { posix } from 'node:path';

import { z } from 'zod';

import { invalidInput } from '../errors.js';

const epochSchema = z.number().int().nonnegative();

/** Result-directory layout written by the training system. */
export const RESULT_LAYOUT = {
  configFile: 'config.pkl',
  summaryFile: 'summaries_0.csv',
  checkpointDir: 'checkpoints',
} as const;

/** Artifact paths derived for one run. */
export interface RunArtifacts {
  resultPath: string;
  /** Pickled training configuration. */
  configFile: string;
  /** Per-epoch training summaries. */
  summaryFile: string;
  checkpointDir: string;
  /** Checkpoint for the requested epoch, when one was requested. */
  checkpointFile: string | null;
  /** Checkpoint directory of the upstream doublet run this run consumes. */
  upstreamCheckpointDir: string | null;
}

/** `model_checkpoint_007.pth.tar` for epoch 7. */
export function checkpointFileName(epoch: number): string {
  const parsed = epochSchema.safeParse(epoch);
  if (!parsed.success) throw invalidInput('epoch', parsed.error);
  return `model_checkpoint_${String(parsed.data).padStart(3, '0')}.pth.tar`;
}

/** Derive the artifact paths of a result directory. */
export function locateArtifacts(
  resultPath: string,
  options: { epoch?: number; upstreamResultPath?: string | null } = {},
): RunArtifacts {
  const checkpointDir = posix.join(resultPath, RESULT_LAYOUT.checkpointDir);
  return {
    resultPath,
    configFile: posix.join(resultPath, RESULT_LAYOUT.configFile),
    summaryFile: posix.join(resultPath, RESULT_LAYOUT.summaryFile),
    checkpointDir,
    checkpointFile:
      options.epoch === undefined
        ? null
        : posix.join(checkpointDir, checkpointFileName(options.epoch)),
    upstreamCheckpointDir: options.upstreamResultPath
      ? posix.join(options.upstreamResultPath, RESULT_LAYOUT.checkpointDir)
      : null,
  };
}
