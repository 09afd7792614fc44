/**
 * Inspection service. Wires up database, registry and API server, and handles graceful shutdown on SIGTERM/SIGINT.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';

import { createServer } from './api/server.js';
import { createLogger } from './lib/logger.js';
import { type OpenRegistry, openRegistry } from './registry/registry.js';
import type { RegistryConfig } from './schemas/config.js';

/** Service interface for managing the inspection API lifecycle. */
export interface Service {
  /** Open the database and start listening. Resolves with the bound address. */
  start(): Promise<string>;
  /** Stop the server and close the database. */
  stop(): Promise<void>;
}

/**
 * Create the service. The logger defaults to one built from `config.log`.
 */
export function createService(
  config: RegistryConfig,
  logger: Logger = createLogger(config.log),
): Service {
  let opened: OpenRegistry | null = null;
  let server: FastifyInstance | null = null;
  const signalHandlers = new Map<NodeJS.Signals, () => void>();

  return {
    async start(): Promise<string> {
      logger.info('Starting inspection service');

      opened = openRegistry(config, logger);
      logger.info({ dbPath: config.dbPath }, 'Database ready');

      server = createServer(config, { registry: opened.registry });
      let address: string;
      try {
        address = await server.listen({
          port: config.port,
          host: config.host,
        });
      } catch (err) {
        logger.error({ err }, 'API server failed to listen');
        await this.stop();
        throw err;
      }
      logger.info({ address }, 'API server listening');

      // Graceful shutdown
      const shutdown = async (signal: string): Promise<void> => {
        logger.info({ signal }, 'Received shutdown signal');
        await this.stop();
        process.exit(0);
      };

      for (const signal of ['SIGTERM', 'SIGINT'] as const) {
        const handler = (): void => {
          shutdown(signal).catch((err: unknown) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
          });
        };
        signalHandlers.set(signal, handler);
        process.once(signal, handler);
      }

      return address;
    },

    async stop(): Promise<void> {
      logger.info('Stopping inspection service');

      for (const [signal, handler] of signalHandlers) {
        process.off(signal, handler);
      }
      signalHandlers.clear();

      if (server) {
        await server.close();
        server = null;
        logger.info('API server stopped');
      }

      if (opened) {
        opened.close();
        opened = null;
        logger.info('Database closed');
      }
    },
  };
}
