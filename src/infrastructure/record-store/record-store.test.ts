/**
 * Record Store contract tests, run against both implementations.
 */
import { describe, it, expect, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { toAgentId, toRequestId, toTaskId } from '@/core/ids.js';
import type { AgentRecord } from '@/agents/types.js';
import { DEFAULT_ORCHESTRATOR_SETTINGS } from '@/orchestrator/types.js';
import type { RequestRecord } from '@/orchestrator/types.js';
import type { Task } from '@/scheduling/types.js';
import { createMemoryRecordStore } from './memory-record-store.js';
import { createSqliteRecordStore } from './sqlite-record-store.js';
import type { RecordStore } from './types.js';

// ─── Fixtures ───────────────────────────────────────────────────

const crmAgent: AgentRecord = {
  id: toAgentId('crm'),
  name: 'CRM Agent',
  type: 'crm',
  description: 'Leads and customers',
  capabilities: ['crm'],
  state: 'active',
  priority: 0,
  configuration: { region: 'eu' },
  updatedAt: new Date(1_700_000_000_000),
};

const salesAgent: AgentRecord = {
  id: toAgentId('sales'),
  name: 'Sales Agent',
  type: 'sales',
  capabilities: ['sales'],
  state: 'inactive',
  priority: 1,
  configuration: {},
  updatedAt: new Date(1_700_000_000_000),
};

function makeTask(overrides: Partial<Task>): Task {
  return {
    id: toTaskId('task_1'),
    requestId: toRequestId('req_1'),
    key: 'crm',
    capability: 'crm',
    assignedAgentId: null,
    input: { text: 'create a lead for Acme' },
    output: null,
    state: 'pending',
    retryCount: 0,
    maxAttempts: 3,
    dependsOn: [],
    error: null,
    nextAttemptAt: null,
    executionId: 0,
    createdAt: new Date(1_700_000_000_000),
    enqueuedAt: null,
    startedAt: null,
    finishedAt: null,
    ...overrides,
  };
}

const request: RequestRecord = {
  id: toRequestId('req_1'),
  goal: 'create a lead for Acme',
  context: { recordModel: 'res.partner' },
  constraints: { maxTasks: 5 },
  caller: { id: 'user-1', channel: 'http' },
  taskIds: [toTaskId('task_1')],
  unmatched: [],
  state: 'in_progress',
  outcome: null,
  createdAt: new Date(1_700_000_000_000),
  finishedAt: null,
};

// ─── Contract ───────────────────────────────────────────────────

const implementations: [string, () => RecordStore][] = [
  ['memory', () => createMemoryRecordStore()],
  ['sqlite', () => createSqliteRecordStore(new Database(':memory:'))],
];

describe.each(implementations)('%s record store', (_name, factory) => {
  let store: RecordStore;

  afterEach(async () => {
    await store.close();
  });

  it('returns agents in first-stored order and keeps that order on update', async () => {
    store = factory();
    await store.persistAgent(crmAgent);
    await store.persistAgent(salesAgent);
    await store.persistAgent({ ...crmAgent, state: 'error', errorMessage: 'boom' });

    const agents = await store.loadAgents();

    expect(agents.map((a) => a.id)).toEqual(['crm', 'sales']);
    expect(agents[0]).toEqual({ ...crmAgent, state: 'error', errorMessage: 'boom' });
    expect(agents[1]?.description).toBeUndefined();
  });

  it('returns null orchestrator config until one is saved', async () => {
    store = factory();
    expect(await store.loadOrchestratorConfig()).toBeNull();

    await store.persistOrchestratorConfig({
      ...DEFAULT_ORCHESTRATOR_SETTINGS,
      plannerAgentId: toAgentId('planner'),
    });

    const loaded = await store.loadOrchestratorConfig();
    expect(loaded?.plannerAgentId).toBe('planner');
    expect(loaded?.retryPolicy).toEqual({ maxAttempts: 3, backoffBaseMs: 1000, backoffCapMs: 30_000 });
  });

  it('upserts tasks and lists them per request', async () => {
    store = factory();
    await store.persistTask(makeTask({}));
    await store.persistTask(
      makeTask({
        id: toTaskId('task_2'),
        key: 'sales',
        capability: 'sales',
        createdAt: new Date(1_700_000_000_001),
      }),
    );
    await store.persistTask(makeTask({ id: toTaskId('task_3'), requestId: toRequestId('req_2') }));
    await store.persistTask(
      makeTask({
        state: 'completed',
        assignedAgentId: toAgentId('crm'),
        output: { leadId: 1 },
        executionId: 1,
        finishedAt: new Date(1_700_000_000_500),
      }),
    );

    const tasks = await store.listTasks(toRequestId('req_1'));

    expect(tasks.map((t) => t.id)).toEqual(['task_1', 'task_2']);
    expect(tasks[0]?.state).toBe('completed');
    expect(tasks[0]?.output).toEqual({ leadId: 1 });
    expect(tasks[0]?.finishedAt).toEqual(new Date(1_700_000_000_500));
  });

  it('round-trips a failed task with its error', async () => {
    store = factory();
    const failed = makeTask({
      state: 'failed',
      retryCount: 2,
      error: { kind: 'NoAgentAvailable', message: 'none', agentId: toAgentId('crm') },
    });
    await store.persistTask(failed);

    const [loaded] = await store.listTasks(toRequestId('req_1'));
    expect(loaded?.error).toEqual({ kind: 'NoAgentAvailable', message: 'none', agentId: 'crm' });
    expect(loaded?.retryCount).toBe(2);
  });

  it('stores and updates requests', async () => {
    store = factory();
    await store.persistRequest(request);
    await store.persistRequest({
      ...request,
      state: 'completed',
      outcome: { status: 'success', requestId: request.id, outputs: [], unmatched: [] },
      finishedAt: new Date(1_700_000_001_000),
    });

    const loaded = await store.getRequest(request.id);

    expect(loaded?.state).toBe('completed');
    expect(loaded?.outcome).toEqual({ status: 'success', requestId: 'req_1', outputs: [], unmatched: [] });
    expect(loaded?.caller).toEqual({ id: 'user-1', channel: 'http' });
    expect(loaded?.constraints).toEqual({ maxTasks: 5 });
    expect(await store.getRequest(toRequestId('req_missing'))).toBeNull();
  });
});
