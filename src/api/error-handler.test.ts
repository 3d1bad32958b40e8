import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  AgentNotFoundError,
  ConductorError,
  InvalidTransitionError,
  OrchestratorNotRunningError,
} from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { createMockLogger } from '@/testing/fixtures/engine.js';
import { sendSuccess, sendError, sendNotFound, registerErrorHandler } from './error-handler.js';

interface SuccessBody {
  success: true;
  data: unknown;
}

interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// ─── Response Helpers ────────────────────────────────────────────

describe('response helpers', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify();
    app.get('/ok', async (_request, reply) => sendSuccess(reply, { foo: 'bar' }));
    app.get('/created', async (_request, reply) => sendSuccess(reply, { created: true }, 201));
    app.get('/error', async (_request, reply) =>
      sendError(reply, 'DETAIL_ERROR', 'With details', 422, { field: 'goal' }),
    );
    app.get('/bare-error', async (_request, reply) => sendError(reply, 'TEST_ERROR', 'Broken'));
    app.get('/missing', async (_request, reply) => sendNotFound(reply, 'Request', 'req_1'));
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('wraps data in a success envelope', async () => {
    const response = await app.inject({ method: 'GET', url: '/ok' });

    expect(response.statusCode).toBe(200);
    expect(response.json<SuccessBody>()).toEqual({ success: true, data: { foo: 'bar' } });
  });

  it('uses the given success status', async () => {
    const response = await app.inject({ method: 'GET', url: '/created' });

    expect(response.statusCode).toBe(201);
  });

  it('includes details when provided', async () => {
    const response = await app.inject({ method: 'GET', url: '/error' });

    expect(response.statusCode).toBe(422);
    expect(response.json<ErrorBody>()).toEqual({
      success: false,
      error: { code: 'DETAIL_ERROR', message: 'With details', details: { field: 'goal' } },
    });
  });

  it('defaults to 500 and omits absent details', async () => {
    const response = await app.inject({ method: 'GET', url: '/bare-error' });
    const body = response.json<ErrorBody>();

    expect(response.statusCode).toBe(500);
    expect(body.error).not.toHaveProperty('details');
  });

  it('sends a 404 with a descriptive message', async () => {
    const response = await app.inject({ method: 'GET', url: '/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'NOT_FOUND',
      message: 'Request "req_1" not found',
    });
  });
});

// ─── registerErrorHandler ────────────────────────────────────────

describe('registerErrorHandler', () => {
  let app: FastifyInstance;
  let logger: Logger;

  beforeAll(async () => {
    logger = createMockLogger();
    app = Fastify();
    registerErrorHandler(app, logger);

    app.get('/zod', () => {
      z.object({ goal: z.string() }).parse({ goal: 42 });
      return {};
    });
    app.get('/agent-not-found', () => {
      throw new AgentNotFoundError('payroll');
    });
    app.get('/invalid-transition', () => {
      throw new InvalidTransitionError('agent', 'crm', 'error', 'active');
    });
    app.get('/not-running', () => {
      throw new OrchestratorNotRunningError();
    });
    app.get('/custom', () => {
      throw new ConductorError({ message: 'Custom error', code: 'CUSTOM_ERROR', statusCode: 418 });
    });
    app.get('/fastify-error', () => {
      throw Object.assign(new Error('Not Acceptable'), { statusCode: 406 });
    });
    app.get('/crash', () => {
      throw new Error('database exploded');
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('maps ZodError to 400 with the issues', async () => {
    const response = await app.inject({ method: 'GET', url: '/zod' });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: { issues: [{ path: 'goal', message: 'Expected string, received number' }] },
    });
  });

  it('maps AgentNotFoundError to 404 with its context', async () => {
    const response = await app.inject({ method: 'GET', url: '/agent-not-found' });

    expect(response.statusCode).toBe(404);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'AGENT_NOT_FOUND',
      message: 'Agent "payroll" not found',
      details: { agentRef: 'payroll' },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Request rejected by the engine',
      expect.objectContaining({ component: 'error-handler', code: 'AGENT_NOT_FOUND', statusCode: 404 }),
    );
  });

  it('maps InvalidTransitionError to 409', async () => {
    const response = await app.inject({ method: 'GET', url: '/invalid-transition' });

    expect(response.statusCode).toBe(409);
    expect(response.json<ErrorBody>().error.code).toBe('INVALID_TRANSITION');
  });

  it('maps OrchestratorNotRunningError to 503 without details', async () => {
    const response = await app.inject({ method: 'GET', url: '/not-running' });

    expect(response.statusCode).toBe(503);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'ORCHESTRATOR_NOT_RUNNING',
      message: 'Orchestrator is not running',
    });
  });

  it('uses the status and code of a base ConductorError', async () => {
    const response = await app.inject({ method: 'GET', url: '/custom' });

    expect(response.statusCode).toBe(418);
    expect(response.json<ErrorBody>().error.code).toBe('CUSTOM_ERROR');
  });

  it('keeps the status of errors that carry one', async () => {
    const response = await app.inject({ method: 'GET', url: '/fastify-error' });

    expect(response.statusCode).toBe(406);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'REQUEST_ERROR',
      message: 'Not Acceptable',
    });
  });

  it('hides unexpected errors behind a 500 and logs them', async () => {
    const response = await app.inject({ method: 'GET', url: '/crash' });

    expect(response.statusCode).toBe(500);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Unhandled error in request',
      expect.objectContaining({ component: 'error-handler', error: 'database exploded' }),
    );
  });
});
