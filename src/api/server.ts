/**
 * Fastify HTTP server for the inspection API. Creates server instance with logging, registers routes; listening is left to the caller.
 */

import Fastify, { type FastifyInstance } from 'fastify';

import { logDestination } from '../lib/logger.js';
import type { Registry } from '../registry/registry.js';
import type { RegistryConfig } from '../schemas/config.js';
import { registerRoutes } from './routes.js';

/** Server dependencies. */
interface ServerDeps {
  registry: Registry;
}

/**
 * Create and configure the Fastify server. Routes are registered but server is not started.
 */
export function createServer(
  config: RegistryConfig,
  deps: ServerDeps,
): FastifyInstance {
  const app = Fastify({
    logger: { level: config.log.level, stream: logDestination(config.log) },
  });

  registerRoutes(app, deps);

  return app;
}
