import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestApp } from '@/testing/fixtures/routes.js';
import type { TestApp } from '@/testing/fixtures/routes.js';

interface Envelope<T> {
  success: boolean;
  data: T;
}

let harness: TestApp;

beforeEach(async () => {
  harness = await createTestApp();
});

afterEach(async () => {
  await harness.app.close();
  await harness.orchestrator.stop();
});

describe('GET /health', () => {
  it('reports liveness and the orchestrator state', async () => {
    const response = await harness.app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', orchestrator: 'running' });
  });
});

describe('GET /orchestrator/status', () => {
  it('returns the status snapshot', async () => {
    const response = await harness.app.inject({ method: 'GET', url: '/orchestrator/status' });

    expect(response.json<Envelope<unknown>>().data).toMatchObject({
      state: 'running',
      draining: false,
      activeRequests: 0,
      performance: { totalProcessed: 0 },
    });
  });
});

describe('POST /orchestrator/stop and /orchestrator/start', () => {
  it('stops with the requested policy and starts again', async () => {
    const stopped = await harness.app.inject({
      method: 'POST',
      url: '/orchestrator/stop',
      payload: { policy: 'abort' },
    });
    expect(stopped.json<Envelope<{ state: string }>>().data.state).toBe('stopped');

    const started = await harness.app.inject({ method: 'POST', url: '/orchestrator/start' });
    expect(started.json<Envelope<{ state: string }>>().data.state).toBe('running');
  });

  it('accepts a stop without a body', async () => {
    const response = await harness.app.inject({ method: 'POST', url: '/orchestrator/stop' });

    expect(response.statusCode).toBe(200);
    expect(harness.orchestrator.getStatus().state).toBe('stopped');
  });

  it('rejects an unknown stop policy', async () => {
    const response = await harness.app.inject({
      method: 'POST',
      url: '/orchestrator/stop',
      payload: { policy: 'pause' },
    });

    expect(response.statusCode).toBe(400);
    expect(harness.orchestrator.getStatus().state).toBe('running');
  });
});

describe('POST /orchestrator/cleanup', () => {
  it('drops nothing younger than the default seven days', async () => {
    await harness.app.inject({
      method: 'POST',
      url: '/requests',
      payload: { goal: 'create a lead for Acme' },
    });

    const response = await harness.app.inject({
      method: 'POST',
      url: '/orchestrator/cleanup',
      payload: {},
    });

    expect(response.json<Envelope<unknown>>().data).toEqual({ removed: 0 });
  });
});
