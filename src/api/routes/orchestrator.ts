/**
 * Orchestrator routes: status, lifecycle and housekeeping.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { sendSuccess } from '../error-handler.js';
import type { RouteDependencies } from '../types.js';

const stopSchema = z.object({
  policy: z.enum(['drain', 'abort']).optional(),
  drainTimeoutMs: z.number().int().nonnegative().optional(),
});

const cleanupSchema = z.object({
  days: z.number().int().nonnegative().default(7),
});

export function orchestratorRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { orchestrator, logger } = deps;

  fastify.get('/orchestrator/status', async (_request, reply) => {
    return sendSuccess(reply, orchestrator.getStatus());
  });

  fastify.post('/orchestrator/start', async (_request, reply) => {
    await orchestrator.start();
    return sendSuccess(reply, orchestrator.getStatus());
  });

  fastify.post('/orchestrator/stop', async (request, reply) => {
    const body = stopSchema.parse(request.body ?? {});
    await orchestrator.stop(body);
    return sendSuccess(reply, orchestrator.getStatus());
  });

  fastify.post('/orchestrator/cleanup', async (request, reply) => {
    const { days } = cleanupSchema.parse(request.body ?? {});
    const removed = orchestrator.cleanupFinishedTasks(days);
    logger.info('Finished tasks cleaned up', { component: 'api', days, removed });
    return sendSuccess(reply, { removed });
  });
}
