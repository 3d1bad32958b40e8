/**
 * Chat route: one message in, one rendered reply out.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { callerFrom } from '../caller.js';
import { sendSuccess } from '../error-handler.js';
import type { RouteDependencies } from '../types.js';

const chatBodySchema = z.object({
  message: z.string().max(10_000),
  recordModel: z.string().min(1).optional(),
  recordId: z.number().int().positive().optional(),
});

export function chatRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { chat } = deps;

  fastify.post('/chat', async (request, reply) => {
    const body = chatBodySchema.parse(request.body);
    const result = await chat.handleMessage(body.message, {
      caller: callerFrom(request),
      recordModel: body.recordModel,
      recordId: body.recordId,
    });
    return sendSuccess(reply, result);
  });
}
