/**
 * The `{ success, data | error }` envelope every route replies with, and the
 * error handler that turns thrown engine and validation errors into it.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { ConductorError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { ApiResponse } from './types.js';

// ─── Envelope ───────────────────────────────────────────────────

/** Reply with `data` under a success envelope. */
export async function sendSuccess(
  reply: FastifyReply,
  data: unknown,
  statusCode = 200,
): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

/** Reply with an error envelope; `details` is omitted when absent. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

/** 404 for a request, agent or task id that resolves to nothing. */
export async function sendNotFound(
  reply: FastifyReply,
  resource: string,
  id: string,
): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

// ─── Error Mapping ──────────────────────────────────────────────

function statusCodeOf(error: Error): number | undefined {
  return 'statusCode' in error && typeof error.statusCode === 'number'
    ? error.statusCode
    : undefined;
}

/**
 * Map thrown errors onto envelopes: bad bodies and params (400), engine
 * errors with their own status and context, errors that already carry a
 * status, and a logged 500 for the rest.
 */
export function registerErrorHandler(fastify: FastifyInstance, logger: Logger): void {
  fastify.setErrorHandler(async (error: Error, _request, reply) => {
    if (error instanceof ZodError) {
      const details: Record<string, unknown> = {
        issues: error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      };
      await sendError(reply, 'VALIDATION_ERROR', 'Request validation failed', 400, details);
      return;
    }

    if (error instanceof ConductorError) {
      logger.warn('Request rejected by the engine', {
        component: 'error-handler',
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      });
      await sendError(reply, error.code, error.message, error.statusCode, error.context);
      return;
    }

    // malformed JSON, unsupported media type and the like
    const statusCode = statusCodeOf(error);
    if (statusCode !== undefined) {
      await sendError(reply, 'REQUEST_ERROR', error.message, statusCode);
      return;
    }

    logger.error('Unhandled error in request', {
      component: 'error-handler',
      error: error.message,
      stack: error.stack,
    });
    await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
  });
}
