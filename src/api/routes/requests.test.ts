import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestApp } from '@/testing/fixtures/routes.js';
import type { TestApp } from '@/testing/fixtures/routes.js';

interface Envelope<T> {
  success: boolean;
  data: T;
  error?: { code: string; message: string };
}

let harness: TestApp;

beforeEach(async () => {
  harness = await createTestApp();
});

afterEach(async () => {
  await harness.app.close();
  await harness.orchestrator.stop();
});

describe('POST /requests', () => {
  it('runs the goal and returns the outcome', async () => {
    const response = await harness.app.inject({
      method: 'POST',
      url: '/requests',
      headers: { 'x-caller-id': 'user-7' },
      payload: { goal: 'create a lead for Acme' },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json<Envelope<{ status: string; requestId: string }>>();
    expect(body.success).toBe(true);
    expect(body.data).toMatchObject({
      status: 'success',
      outputs: [{ key: 'crm', capability: 'crm', agentId: 'crm' }],
      unmatched: [],
    });
  });

  it('reports a goal no agent can take as unroutable', async () => {
    const response = await harness.app.inject({
      method: 'POST',
      url: '/requests',
      payload: { goal: 'water the plants' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json<Envelope<unknown>>().data).toMatchObject({
      status: 'unroutable',
      unmatched: ['water the plants'],
    });
  });

  it('rejects a body without a goal', async () => {
    const response = await harness.app.inject({ method: 'POST', url: '/requests', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json<Envelope<never>>().error?.code).toBe('VALIDATION_ERROR');
  });

  it('answers 503 while the orchestrator is stopped', async () => {
    await harness.orchestrator.stop();

    const response = await harness.app.inject({
      method: 'POST',
      url: '/requests',
      payload: { goal: 'create a lead for Acme' },
    });

    expect(response.statusCode).toBe(503);
    expect(response.json<Envelope<never>>().error).toEqual({
      code: 'ORCHESTRATOR_NOT_RUNNING',
      message: 'Orchestrator is not running',
    });
  });
});

describe('GET /requests/:requestId', () => {
  it('returns the request record with its tasks', async () => {
    const submitted = await harness.app.inject({
      method: 'POST',
      url: '/requests',
      headers: { 'x-caller-id': 'user-7', 'x-caller-name': 'Ada' },
      payload: { goal: 'create a lead for Acme' },
    });
    const { requestId } = submitted.json<Envelope<{ requestId: string }>>().data;

    const response = await harness.app.inject({ method: 'GET', url: `/requests/${requestId}` });

    expect(response.statusCode).toBe(200);
    const body = response.json<
      Envelope<{
        request: { id: string; state: string; caller: unknown };
        tasks: { state: string; assignedAgentId: string }[];
      }>
    >();
    expect(body.data.request).toMatchObject({
      id: requestId,
      state: 'completed',
      caller: { id: 'user-7', name: 'Ada', channel: 'http' },
    });
    expect(body.data.tasks.map((task) => [task.state, task.assignedAgentId])).toEqual([
      ['completed', 'crm'],
    ]);
  });

  it('returns 404 for an unknown request', async () => {
    const response = await harness.app.inject({ method: 'GET', url: '/requests/req_missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json<Envelope<never>>().error).toEqual({
      code: 'NOT_FOUND',
      message: 'Request "req_missing" not found',
    });
  });
});

describe('GET /requests', () => {
  it('lists recent requests', async () => {
    const submitted = await harness.app.inject({
      method: 'POST',
      url: '/requests',
      payload: { goal: 'create a lead for Acme' },
    });
    const { requestId } = submitted.json<Envelope<{ requestId: string }>>().data;

    const response = await harness.app.inject({ method: 'GET', url: '/requests' });

    expect(response.json<Envelope<{ requestId: string; status: string }[]>>().data).toMatchObject([
      { requestId, status: 'success' },
    ]);
  });
});
