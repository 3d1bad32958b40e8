/**
 * Request routes: submit goals and read request records.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { processRequestSchema, requestIdSchema } from '@/orchestrator/schemas.js';
import { callerFrom } from '../caller.js';
import { sendNotFound, sendSuccess } from '../error-handler.js';
import type { RouteDependencies } from '../types.js';

const requestParamsSchema = z.object({ requestId: requestIdSchema });

export function requestRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { orchestrator, logger } = deps;

  // ─── Submit ─────────────────────────────────────────────────────

  fastify.post('/requests', async (request, reply) => {
    const body = processRequestSchema.parse(request.body);
    const caller = callerFrom(request);

    logger.info('Request submitted over HTTP', { component: 'api', caller: caller.id });
    const outcome = await orchestrator.processRequest({ ...body, caller });
    return sendSuccess(reply, outcome);
  });

  // ─── Read ───────────────────────────────────────────────────────

  fastify.get('/requests', async (_request, reply) => {
    return sendSuccess(reply, orchestrator.getStatus().recentRequests);
  });

  fastify.get('/requests/:requestId', async (request, reply) => {
    const { requestId } = requestParamsSchema.parse(request.params);
    const record = await orchestrator.getRequest(requestId);
    if (!record) {
      return sendNotFound(reply, 'Request', requestId);
    }
    const tasks = await orchestrator.listTasks(requestId);
    return sendSuccess(reply, { request: record, tasks });
  });
}
