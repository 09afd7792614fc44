/**
 * The run-ledger commander program: run registration, completion, linking, queries, import.
 *
 * @module
 */

import { Command } from 'commander';
import type { z } from 'zod';

import { describeError, invalidInput, RegistryError } from '../../errors.js';
import { loadConfig } from '../../lib/config.js';
import { parseDuration } from '../../lib/duration.js';
import { readLedgerFile } from '../../registry/import.js';
import { openRegistry, type Registry } from '../../registry/registry.js';
import {
  countArgSchema,
  runIdArgSchema,
  stageSchema,
} from '../../schemas/run.js';
import { registerConfigCommands } from './commands/config.js';
import { registerServeCommand } from './commands/serve.js';
import {
  formatArtifacts,
  formatAudit,
  formatRunDetail,
  formatRunLine,
} from './format.js';
import type { CliIo } from './io.js';

/** Options shared by commands that accept --config. */
export interface ConfigOptions {
  config?: string;
}

/** Options shared by query commands that can print JSON. */
interface JsonOptions extends ConfigOptions {
  json?: boolean;
}

/** Options for the register command. */
interface RegisterOptions extends ConfigOptions {
  stage: string;
  dataset: string;
  result: string;
  size?: string;
  graphs?: string;
  duration?: string;
  upstream?: string;
  notes?: string;
}

/** Options for the complete command. */
interface CompleteOptions extends ConfigOptions {
  duration?: string;
  graphs?: string;
}

/** Options for the annotate command. */
interface AnnotateOptions extends ConfigOptions {
  notes: string;
  append?: boolean;
}

/** Options for the list command. */
interface ListOptions extends JsonOptions {
  stage?: string;
  size?: string;
  linked?: boolean;
  unlinked?: boolean;
}

/** Options for the artifacts command. */
interface ArtifactsOptions extends JsonOptions {
  epoch?: string;
}

/** Parse a CLI argument, failing with InvalidInput. */
function parseArg<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string,
  value: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw invalidInput(label, parsed.error);
  return parsed.data;
}

const parseRunId = (value: string): number =>
  parseArg(runIdArgSchema, 'run ID', value);

/** Create the CLI program bound to the given IO. */
export function createProgram(io: CliIo): Command {
  /**
   * Load config, open the registry, run `fn`, and close. Failures are
   * reported on stderr with the exit code of their kind.
   */
  function withRegistry(
    options: ConfigOptions,
    fn: (registry: Registry) => void,
  ): void {
    try {
      const config = loadConfig(options.config, io.env);
      const opened = openRegistry(config, io.createLogger(config.log), io.env);
      try {
        fn(opened.registry);
      } finally {
        opened.close();
      }
    } catch (err) {
      const described = describeError(err);
      io.err(described.message);
      io.setExitCode(described.exitCode);
    }
  }

  const printJson = (value: unknown): void => {
    io.out(JSON.stringify(value, null, 2));
  };

  const program = new Command();

  program
    .name('run-ledger')
    .description(
      'Provenance registry for doublet and triplet training runs, with SQLite state',
    )
    .version('0.1.0')
    .configureOutput({
      writeOut: (str) => {
        io.out(str.trimEnd());
      },
      writeErr: (str) => {
        io.err(str.trimEnd());
      },
    });

  program
    .command('register')
    .description('Register a training run')
    .requiredOption('-s, --stage <stage>', 'Pipeline stage (doublet|triplet)')
    .requiredOption('-d, --dataset <path>', 'Input dataset directory')
    .requiredOption('-r, --result <path>', 'Result/checkpoint directory')
    .option('--size <class>', 'Problem size class (small, medium, large, ...)')
    .option('-g, --graphs <n>', 'Number of training graphs')
    .option('--duration <duration>', 'Training duration (e.g. 3600, 90m, 12h, 1d6h)')
    .option('-u, --upstream <id>', 'Doublet run this triplet run consumes')
    .option('-n, --notes <text>', 'Free-text notes')
    .option('-c, --config <path>', 'Path to config file')
    .action((options: RegisterOptions) => {
      withRegistry(options, (registry) => {
        const record = registry.register({
          stage: parseArg(stageSchema, 'stage', options.stage),
          datasetPath: options.dataset,
          resultPath: options.result,
          sizeClass: options.size ?? null,
          graphCount:
            options.graphs === undefined
              ? null
              : parseArg(countArgSchema, 'graph count', options.graphs),
          trainingDurationSeconds:
            options.duration === undefined
              ? null
              : parseDuration(options.duration),
          upstreamId:
            options.upstream === undefined
              ? null
              : parseRunId(options.upstream),
          notes: options.notes ?? null,
        });
        io.out(`Run ${String(record.id)} registered (${record.stage}).`);
      });
    });

  program
    .command('complete')
    .description('Record the duration and/or graph count of a finished run')
    .argument('<id>', 'Run ID')
    .option('--duration <duration>', 'Training duration (e.g. 3600, 90m, 12h, 1d6h)')
    .option('-g, --graphs <n>', 'Number of training graphs')
    .option('-c, --config <path>', 'Path to config file')
    .action((id: string, options: CompleteOptions) => {
      withRegistry(options, (registry) => {
        const record = registry.complete(parseRunId(id), {
          trainingDurationSeconds:
            options.duration === undefined
              ? undefined
              : parseDuration(options.duration),
          graphCount:
            options.graphs === undefined
              ? undefined
              : parseArg(countArgSchema, 'graph count', options.graphs),
        });
        io.out(formatRunLine(record));
      });
    });

  program
    .command('annotate')
    .description('Set or append to the notes of a run')
    .argument('<id>', 'Run ID')
    .requiredOption('-n, --notes <text>', 'Notes text')
    .option('-a, --append', 'Append a line instead of replacing')
    .option('-c, --config <path>', 'Path to config file')
    .action((id: string, options: AnnotateOptions) => {
      withRegistry(options, (registry) => {
        const record = registry.annotate(parseRunId(id), options.notes, {
          append: options.append ?? false,
        });
        io.out(`Run ${String(record.id)} notes updated.`);
      });
    });

  program
    .command('link')
    .description('Record that a triplet run consumes a doublet run checkpoint')
    .argument('<tripletId>', 'Triplet run ID')
    .argument('<doubletId>', 'Doublet run ID')
    .option('-c, --config <path>', 'Path to config file')
    .action((tripletId: string, doubletId: string, options: ConfigOptions) => {
      withRegistry(options, (registry) => {
        const record = registry.link(
          parseRunId(tripletId),
          parseRunId(doubletId),
        );
        io.out(
          `Run ${String(record.id)} linked to doublet run ${String(record.upstreamId)}.`,
        );
      });
    });

  program
    .command('unlink')
    .description('Clear the upstream doublet run of a triplet run')
    .argument('<tripletId>', 'Triplet run ID')
    .option('-c, --config <path>', 'Path to config file')
    .action((tripletId: string, options: ConfigOptions) => {
      withRegistry(options, (registry) => {
        const record = registry.unlink(parseRunId(tripletId));
        io.out(`Run ${String(record.id)} unlinked.`);
      });
    });

  program
    .command('show')
    .description('Show one run')
    .argument('<id>', 'Run ID')
    .option('--json', 'Print JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action((id: string, options: JsonOptions) => {
      withRegistry(options, (registry) => {
        const record = registry.get(parseRunId(id));
        if (options.json) printJson(record);
        else formatRunDetail(record).forEach((line) => io.out(line));
      });
    });

  program
    .command('list')
    .description('List runs')
    .option('-s, --stage <stage>', 'Only runs of this stage (doublet|triplet)')
    .option('--size <class>', 'Only runs of this size class')
    .option('--linked', 'Only runs with an upstream run')
    .option('--unlinked', 'Only runs without an upstream run')
    .option('--json', 'Print JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action((options: ListOptions) => {
      withRegistry(options, (registry) => {
        if (options.linked && options.unlinked) {
          throw new RegistryError(
            'InvalidInput',
            '--linked and --unlinked are mutually exclusive',
          );
        }
        const runs = registry.list({
          stage:
            options.stage === undefined
              ? undefined
              : parseArg(stageSchema, 'stage', options.stage),
          sizeClass: options.size,
          linked: options.linked ? true : options.unlinked ? false : undefined,
        });

        if (options.json) printJson(runs);
        else if (runs.length === 0) io.out('No runs registered.');
        else runs.forEach((run) => io.out(formatRunLine(run)));
      });
    });

  program
    .command('lineage')
    .description('Show the upstream runs of a run, nearest first')
    .argument('<id>', 'Run ID')
    .option('--json', 'Print JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action((id: string, options: JsonOptions) => {
      withRegistry(options, (registry) => {
        const runId = parseRunId(id);
        const lineage = registry.lineageOf(runId);
        if (options.json) printJson(lineage);
        else if (lineage.length === 0)
          io.out(`Run ${String(runId)} has no upstream runs.`);
        else lineage.forEach((run) => io.out(formatRunLine(run)));
      });
    });

  program
    .command('artifacts')
    .description('Show conventional file locations in the result directory of a run')
    .argument('<id>', 'Run ID')
    .option('-e, --epoch <n>', 'Also show the checkpoint file for this epoch')
    .option('--json', 'Print JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action((id: string, options: ArtifactsOptions) => {
      withRegistry(options, (registry) => {
        const artifacts = registry.artifactsOf(
          parseRunId(id),
          options.epoch === undefined
            ? undefined
            : parseArg(countArgSchema, 'epoch', options.epoch),
        );
        if (options.json) printJson(artifacts);
        else formatArtifacts(artifacts).forEach((line) => io.out(line));
      });
    });

  program
    .command('purge')
    .description('Delete a run no other run depends on')
    .argument('<id>', 'Run ID')
    .option('-c, --config <path>', 'Path to config file')
    .action((id: string, options: ConfigOptions) => {
      withRegistry(options, (registry) => {
        const record = registry.purge(parseRunId(id));
        io.out(`Run ${String(record.id)} purged.`);
      });
    });

  program
    .command('audit')
    .description('Report unlinked triplet runs, incomplete runs, shared datasets and integrity problems')
    .option('--json', 'Print JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action((options: JsonOptions) => {
      withRegistry(options, (registry) => {
        const report = registry.audit();
        if (options.json) printJson(report);
        else formatAudit(report).forEach((line) => io.out(line));
      });
    });

  program
    .command('import')
    .description('Register every run in a JSON ledger file, all or nothing')
    .argument('<file>', 'Path to ledger JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action((file: string, options: ConfigOptions) => {
      withRegistry(options, (registry) => {
        const created = registry.importLedger(readLedgerFile(file));
        io.out(`Imported ${String(created.length)} runs.`);
      });
    });

  registerServeCommand(program, io);
  registerConfigCommands(program, io);

  return program;
}
