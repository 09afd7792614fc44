/**
 * Plain-text rendering of run records for CLI output.
 *
 * @module
 */

import { formatDuration } from '../../lib/duration.js';
import type { RunArtifacts } from '../../registry/artifacts.js';
import type { AuditReport } from '../../registry/registry.js';
import type { RunRecord } from '../../schemas/run.js';

const dash = (value: string | number | null): string =>
  value === null ? '-' : String(value);

function duration(record: RunRecord): string {
  return record.trainingDurationSeconds === null
    ? '-'
    : formatDuration(record.trainingDurationSeconds);
}

/** One-line summary, e.g. `3  triplet  size=medium  graphs=-  duration=12h  upstream=1  /triplet_results/t01`. */
export function formatRunLine(record: RunRecord): string {
  return [
    String(record.id),
    record.stage,
    `size=${dash(record.sizeClass)}`,
    `graphs=${dash(record.graphCount)}`,
    `duration=${duration(record)}`,
    `upstream=${dash(record.upstreamId)}`,
    record.resultPath,
  ].join('  ');
}

/** Multi-line detail view. */
export function formatRunDetail(record: RunRecord): string[] {
  return [
    `id: ${String(record.id)}`,
    `stage: ${record.stage}`,
    `size: ${dash(record.sizeClass)}`,
    `graphs: ${dash(record.graphCount)}`,
    `duration: ${duration(record)}`,
    `dataset: ${record.datasetPath}`,
    `result: ${record.resultPath}`,
    `upstream: ${dash(record.upstreamId)}`,
    `notes: ${dash(record.notes)}`,
    `created: ${record.createdAt}`,
    `updated: ${record.updatedAt}`,
  ];
}

export function formatArtifacts(artifacts: RunArtifacts): string[] {
  const lines = [
    `config: ${artifacts.configFile}`,
    `summaries: ${artifacts.summaryFile}`,
    `checkpoints: ${artifacts.checkpointDir}`,
  ];
  if (artifacts.checkpointFile) {
    lines.push(`checkpoint: ${artifacts.checkpointFile}`);
  }
  if (artifacts.upstreamCheckpointDir) {
    lines.push(`upstream checkpoints: ${artifacts.upstreamCheckpointDir}`);
  }
  return lines;
}

export function formatAudit(report: AuditReport): string[] {
  const lines: string[] = [];
  const ids = (records: RunRecord[]) => records.map((r) => r.id).join(', ');

  lines.push(
    report.unlinkedTriplets.length > 0
      ? `Unlinked triplet runs: ${ids(report.unlinkedTriplets)}`
      : 'Unlinked triplet runs: none',
  );
  lines.push(
    report.incompleteRuns.length > 0
      ? `Runs without a duration: ${ids(report.incompleteRuns)}`
      : 'Runs without a duration: none',
  );
  for (const shared of report.sharedDatasets) {
    lines.push(
      `Shared dataset ${shared.datasetPath}: runs ${shared.runIds.join(', ')}`,
    );
  }
  lines.push(
    report.integrityIssues.length > 0
      ? `Integrity issues: ${report.integrityIssues.map((i) => i.detail).join('; ')}`
      : 'Integrity: ok',
  );
  return lines;
}
