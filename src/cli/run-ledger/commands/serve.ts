/**
 * @module commands/serve
 *
 * CLI command: serve. Runs the read-only inspection API until SIGTERM/SIGINT.
 */

import type { Command } from 'commander';

import { describeError } from '../../../errors.js';
import { loadConfig } from '../../../lib/config.js';
import { registryConfigSchema } from '../../../schemas/config.js';
import { createService } from '../../../service.js';
import type { CliIo } from '../io.js';
import type { ConfigOptions } from '../program.js';

/** Options for the serve command. */
interface ServeOptions extends ConfigOptions {
  port?: string;
}

/** Register the `serve` command on the CLI. */
export function registerServeCommand(cli: Command, io: CliIo): void {
  cli
    .command('serve')
    .description('Serve the read-only inspection API')
    .option('-p, --port <port>', 'Port to listen on (overrides config)')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: ServeOptions) => {
      try {
        const loaded = loadConfig(options.config, io.env);
        const config = options.port
          ? registryConfigSchema.parse({ ...loaded, port: Number(options.port) })
          : loaded;
        const address = await createService(
          config,
          io.createLogger(config.log),
        ).start();
        io.out(`Inspection API listening on ${address}`);
      } catch (err) {
        const described = describeError(err);
        io.err(described.message);
        io.setExitCode(described.exitCode);
      }
    });
}
