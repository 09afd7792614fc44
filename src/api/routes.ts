/**
 * Read-only Fastify routes for reporting and inspection tools: run listing, single runs, lineage, artifact paths, and stats.
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

import { describeError, HTTP_STATUS, isRegistryError } from '../errors.js';
import type { Registry } from '../registry/registry.js';
import {
  countArgSchema,
  runIdArgSchema,
  sizeClassSchema,
  stageSchema,
} from '../schemas/run.js';

/** Route dependencies. */
interface RouteDeps {
  registry: Registry;
}

const listQuerySchema = z.object({
  stage: stageSchema.optional(),
  size: sizeClassSchema.optional(),
  linked: z.enum(['true', 'false']).optional(),
});

const idParamsSchema = z.object({ id: runIdArgSchema });

const artifactsQuerySchema = z.object({
  epoch: countArgSchema.optional(),
});

/** Send an error body with the status that matches its kind. */
function sendError(reply: FastifyReply, err: unknown) {
  const described = describeError(err);
  const status = isRegistryError(err) ? HTTP_STATUS[err.kind] : 400;
  reply.code(described.kind === 'Unexpected' ? 500 : status);
  return { error: described.message, kind: described.kind };
}

/**
 * Register all API routes on the Fastify instance.
 */
export function registerRoutes(app: FastifyInstance, deps: RouteDeps): void {
  const { registry } = deps;

  /** GET /health — Health check. */
  app.get('/health', () => {
    return { ok: true, uptime: process.uptime() };
  });

  /** GET /runs — List runs, optionally by stage, size class and link state. */
  app.get('/runs', (request, reply) => {
    try {
      const query = listQuerySchema.parse(request.query);
      const runs = registry.list({
        stage: query.stage,
        sizeClass: query.size,
        linked: query.linked === undefined ? undefined : query.linked === 'true',
      });
      return { runs };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  /** GET /runs/:id — Single run. */
  app.get('/runs/:id', (request, reply) => {
    try {
      const { id } = idParamsSchema.parse(request.params);
      return { run: registry.get(id) };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  /** GET /runs/:id/lineage — Upstream runs, nearest first. */
  app.get('/runs/:id/lineage', (request, reply) => {
    try {
      const { id } = idParamsSchema.parse(request.params);
      return { id, lineage: registry.lineageOf(id) };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  /** GET /runs/:id/artifacts — Conventional file locations in the result directory. */
  app.get('/runs/:id/artifacts', (request, reply) => {
    try {
      const { id } = idParamsSchema.parse(request.params);
      const { epoch } = artifactsQuerySchema.parse(request.query);
      return { id, artifacts: registry.artifactsOf(id, epoch) };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  /** GET /stats — Aggregate run counts. */
  app.get('/stats', () => {
    return registry.stats();
  });
}
