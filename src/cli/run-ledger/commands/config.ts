/**
 * @module commands/config
 *
 * CLI commands: validate, init, config-show.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Command } from 'commander';

import { describeError } from '../../../errors.js';
import { loadConfig, parseConfig } from '../../../lib/config.js';
import type { CliIo } from '../io.js';

/** Minimal starter config template. */
export const INIT_CONFIG_TEMPLATE = {
  dbPath: './data/run-ledger.sqlite',
  busyTimeoutMs: 5000,
  port: 3120,
  host: '127.0.0.1',
  log: {
    level: 'info',
  },
  paths: {
    case: 'preserve',
    expandEnv: true,
  },
};

/** Register config-related commands on the CLI. */
export function registerConfigCommands(cli: Command, io: CliIo): void {
  /** Report a failed config read with the usual exit code. */
  const fail = (error: unknown): void => {
    if (error instanceof SyntaxError) {
      io.err(`❌ Invalid JSON: ${error.message}`);
      io.setExitCode(2);
      return;
    }
    const described = describeError(error);
    io.err(`❌ Config invalid: ${described.message}`);
    io.setExitCode(described.exitCode);
  };

  cli
    .command('validate')
    .description('Validate a configuration file against the schema')
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .action((options: { config: string }) => {
      try {
        const config = parseConfig(
          readFileSync(resolve(options.config), 'utf-8'),
        );

        io.out('✅ Config valid');
        io.out(`  Database: ${config.dbPath}`);
        io.out(`  Busy timeout: ${String(config.busyTimeoutMs)} ms`);
        io.out(`  API: ${config.host}:${String(config.port)}`);
        io.out(`  Log level: ${config.log.level}`);
        if (config.log.file) {
          io.out(`  Log file: ${config.log.file}`);
        }
        io.out(
          `  Paths: case=${config.paths.case}, expandEnv=${String(config.paths.expandEnv)}${config.paths.baseDir ? `, baseDir=${config.paths.baseDir}` : ''}`,
        );
      } catch (error) {
        fail(error);
      }
    });

  cli
    .command('init')
    .description('Generate a starter configuration file')
    .option(
      '-o, --output <path>',
      'Output config file path',
      'run-ledger.config.json',
    )
    .action((options: { output: string }) => {
      const outputPath = resolve(options.output);

      if (existsSync(outputPath)) {
        io.err(`❌ File already exists: ${outputPath}`);
        io.err('   Remove it first or choose a different path with -o');
        io.setExitCode(1);
        return;
      }

      writeFileSync(
        outputPath,
        JSON.stringify(INIT_CONFIG_TEMPLATE, null, 2) + '\n',
      );
      io.out(`✅ Wrote ${outputPath}`);
      io.out('');
      io.out('Next steps:');
      io.out('  1. Edit the config file to set your paths and preferences');
      io.out('  2. Validate: run-ledger validate -c ' + options.output);
      io.out(
        '  3. Register: run-ledger register -c ' +
          options.output +
          ' --stage doublet --dataset <dir> --result <dir>',
      );
    });

  cli
    .command('config-show')
    .description(
      'Show the resolved configuration (defaults and environment overrides applied)',
    )
    .option('-c, --config <path>', 'Path to configuration file')
    .action((options: { config?: string }) => {
      try {
        io.out(JSON.stringify(loadConfig(options.config, io.env), null, 2));
      } catch (error) {
        fail(error);
      }
    });
}
