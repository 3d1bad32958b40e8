/**
 * Agent routes: inspection, state changes and direct execution.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { jsonObjectSchema } from '@/core/json.js';
import { describeAgent } from '@/orchestrator/agent-detail.js';
import { agentIdSchema } from '@/orchestrator/schemas.js';
import { callerFrom } from '../caller.js';
import { sendNotFound, sendSuccess } from '../error-handler.js';
import type { RouteDependencies } from '../types.js';

// ─── Schemas ────────────────────────────────────────────────────

const agentParamsSchema = z.object({ agentId: agentIdSchema });

const setStateSchema = z.object({
  state: z.enum(['active', 'inactive', 'error']),
  reason: z.string().min(1).optional(),
});

const executeSchema = z.object({
  taskData: jsonObjectSchema.default({}),
  capability: z.string().min(1).optional(),
});

// ─── Route Registration ─────────────────────────────────────────

export function agentRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { orchestrator, registry, logger } = deps;

  fastify.get('/agents', async (_request, reply) => {
    return sendSuccess(reply, orchestrator.getStatus().agents);
  });

  fastify.get('/agents/:agentId', async (request, reply) => {
    const { agentId } = agentParamsSchema.parse(request.params);
    const detail = describeAgent(orchestrator, registry, agentId);
    if (!detail) {
      return sendNotFound(reply, 'Agent', agentId);
    }
    return sendSuccess(reply, detail);
  });

  fastify.post('/agents/:agentId/state', async (request, reply) => {
    const { agentId } = agentParamsSchema.parse(request.params);
    const body = setStateSchema.parse(request.body);

    const record = await registry.setState(agentId, body.state, body.reason);
    logger.info('Agent state changed over HTTP', {
      component: 'api',
      agentId,
      state: record.state,
      caller: callerFrom(request).id,
    });
    return sendSuccess(reply, record);
  });

  fastify.post('/agents/:agentId/execute', async (request, reply) => {
    const { agentId } = agentParamsSchema.parse(request.params);
    const body = executeSchema.parse(request.body ?? {});

    const outcome = await orchestrator.executeAgent({
      agentRef: agentId,
      taskData: body.taskData,
      capability: body.capability,
      caller: callerFrom(request),
    });
    return sendSuccess(reply, outcome);
  });
}
