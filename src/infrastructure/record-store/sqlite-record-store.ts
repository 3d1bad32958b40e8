/**
 * SQLite Record Store (better-sqlite3).
 *
 * One table per record kind. Structured fields are JSON columns, validated
 * with zod when read back; timestamps are epoch milliseconds.
 */
import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { RequestId } from '@/core/types.js';
import { jsonObjectSchema, jsonValueSchema, parseJsonColumn } from '@/core/json.js';
import { toAgentId, toRequestId, toTaskId } from '@/core/ids.js';
import type { AgentRecord } from '@/agents/types.js';
import type { OrchestratorSettings, RequestRecord } from '@/orchestrator/types.js';
import {
  callerSchema,
  constraintsSchema,
  goalSchema,
  orchestratorSettingsSchema,
  requestOutcomeSchema,
  taskErrorSchema,
} from '@/orchestrator/schemas.js';
import type { Task } from '@/scheduling/types.js';
import type { RecordStore } from './types.js';

// ─── Rows ───────────────────────────────────────────────────────

interface AgentRow {
  id: string;
  name: string;
  type: string;
  description: string | null;
  capabilities: string;
  state: string;
  priority: number;
  configuration: string;
  error_message: string | null;
  updated_at: number;
}

interface TaskRow {
  id: string;
  request_id: string;
  key: string;
  capability: string;
  pinned_agent_id: string | null;
  assigned_agent_id: string | null;
  input: string;
  output: string | null;
  state: string;
  retry_count: number;
  max_attempts: number;
  depends_on: string;
  deadline_ms: number | null;
  error: string | null;
  next_attempt_at: number | null;
  execution_id: number;
  created_at: number;
  enqueued_at: number | null;
  started_at: number | null;
  finished_at: number | null;
}

interface RequestRow {
  id: string;
  goal: string;
  context: string;
  constraints: string;
  caller: string | null;
  task_ids: string;
  unmatched: string;
  state: string;
  outcome: string | null;
  created_at: number;
  finished_at: number | null;
}

interface ConfigRow {
  data: string;
}

const agentStateSchema = z.enum(['inactive', 'active', 'error']);
const taskStateSchema = z.enum(['pending', 'routed', 'running', 'completed', 'failed']);
const requestStateSchema = z.enum(['in_progress', 'completed', 'failed']);
const stringListSchema = z.array(z.string());

// ─── Mappers ────────────────────────────────────────────────────

function toDate(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}

function fromDate(value: Date | null): number | null {
  return value === null ? null : value.getTime();
}

function rowToAgent(row: AgentRow): AgentRecord {
  return {
    id: toAgentId(row.id),
    name: row.name,
    type: row.type,
    description: row.description ?? undefined,
    capabilities: parseJsonColumn(row.capabilities, stringListSchema),
    state: agentStateSchema.parse(row.state),
    priority: row.priority,
    configuration: parseJsonColumn(row.configuration, jsonObjectSchema),
    errorMessage: row.error_message ?? undefined,
    updatedAt: new Date(row.updated_at),
  };
}

function rowToTask(row: TaskRow): Task {
  return {
    id: toTaskId(row.id),
    requestId: toRequestId(row.request_id),
    key: row.key,
    capability: row.capability,
    pinnedAgentId: row.pinned_agent_id === null ? undefined : toAgentId(row.pinned_agent_id),
    assignedAgentId: row.assigned_agent_id === null ? null : toAgentId(row.assigned_agent_id),
    input: parseJsonColumn(row.input, jsonObjectSchema),
    output: row.output === null ? null : parseJsonColumn(row.output, jsonValueSchema),
    state: taskStateSchema.parse(row.state),
    retryCount: row.retry_count,
    maxAttempts: row.max_attempts,
    dependsOn: parseJsonColumn(row.depends_on, stringListSchema).map(toTaskId),
    deadlineMs: row.deadline_ms ?? undefined,
    error: row.error === null ? null : parseJsonColumn(row.error, taskErrorSchema),
    nextAttemptAt: toDate(row.next_attempt_at),
    executionId: row.execution_id,
    createdAt: new Date(row.created_at),
    enqueuedAt: toDate(row.enqueued_at),
    startedAt: toDate(row.started_at),
    finishedAt: toDate(row.finished_at),
  };
}

function rowToRequest(row: RequestRow): RequestRecord {
  return {
    id: toRequestId(row.id),
    goal: parseJsonColumn(row.goal, goalSchema),
    context: parseJsonColumn(row.context, jsonObjectSchema),
    constraints: parseJsonColumn(row.constraints, constraintsSchema),
    caller: row.caller === null ? undefined : parseJsonColumn(row.caller, callerSchema),
    taskIds: parseJsonColumn(row.task_ids, stringListSchema).map(toTaskId),
    unmatched: parseJsonColumn(row.unmatched, stringListSchema),
    state: requestStateSchema.parse(row.state),
    outcome: row.outcome === null ? null : parseJsonColumn(row.outcome, requestOutcomeSchema),
    createdAt: new Date(row.created_at),
    finishedAt: toDate(row.finished_at),
  };
}

// ─── Schema ─────────────────────────────────────────────────────

/** Create the record tables. Safe to call on every startup. */
export function initRecordStoreDb(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS agents (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      type TEXT NOT NULL,
      description TEXT,
      capabilities TEXT NOT NULL,
      state TEXT NOT NULL,
      priority INTEGER NOT NULL DEFAULT 0,
      configuration TEXT NOT NULL,
      error_message TEXT,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS orchestrator_config (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      request_id TEXT NOT NULL,
      key TEXT NOT NULL,
      capability TEXT NOT NULL,
      pinned_agent_id TEXT,
      assigned_agent_id TEXT,
      input TEXT NOT NULL,
      output TEXT,
      state TEXT NOT NULL,
      retry_count INTEGER NOT NULL,
      max_attempts INTEGER NOT NULL,
      depends_on TEXT NOT NULL,
      deadline_ms INTEGER,
      error TEXT,
      next_attempt_at INTEGER,
      execution_id INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      enqueued_at INTEGER,
      started_at INTEGER,
      finished_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_tasks_request
      ON tasks(request_id, created_at);

    CREATE TABLE IF NOT EXISTS requests (
      id TEXT PRIMARY KEY,
      goal TEXT NOT NULL,
      context TEXT NOT NULL,
      constraints TEXT NOT NULL,
      caller TEXT,
      task_ids TEXT NOT NULL,
      unmatched TEXT NOT NULL,
      state TEXT NOT NULL,
      outcome TEXT,
      created_at INTEGER NOT NULL,
      finished_at INTEGER
    );
  `);
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a Record Store over an open better-sqlite3 database. Creates tables on first use. */
export function createSqliteRecordStore(db: Database.Database): RecordStore {
  initRecordStoreDb(db);

  const upsertAgent = db.prepare(`
    INSERT INTO agents
      (id, name, type, description, capabilities, state, priority, configuration, error_message, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      name = excluded.name,
      type = excluded.type,
      description = excluded.description,
      capabilities = excluded.capabilities,
      state = excluded.state,
      priority = excluded.priority,
      configuration = excluded.configuration,
      error_message = excluded.error_message,
      updated_at = excluded.updated_at
  `);

  const upsertTask = db.prepare(`
    INSERT INTO tasks
      (id, request_id, key, capability, pinned_agent_id, assigned_agent_id, input, output, state,
       retry_count, max_attempts, depends_on, deadline_ms, error, next_attempt_at, execution_id,
       created_at, enqueued_at, started_at, finished_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      assigned_agent_id = excluded.assigned_agent_id,
      output = excluded.output,
      state = excluded.state,
      retry_count = excluded.retry_count,
      error = excluded.error,
      next_attempt_at = excluded.next_attempt_at,
      execution_id = excluded.execution_id,
      enqueued_at = excluded.enqueued_at,
      started_at = excluded.started_at,
      finished_at = excluded.finished_at
  `);

  const upsertRequest = db.prepare(`
    INSERT INTO requests
      (id, goal, context, constraints, caller, task_ids, unmatched, state, outcome, created_at, finished_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      task_ids = excluded.task_ids,
      unmatched = excluded.unmatched,
      state = excluded.state,
      outcome = excluded.outcome,
      finished_at = excluded.finished_at
  `);

  const upsertConfig = db.prepare(`
    INSERT INTO orchestrator_config (id, data) VALUES ('default', ?)
    ON CONFLICT(id) DO UPDATE SET data = excluded.data
  `);

  const selectAgents = db.prepare<[], AgentRow>('SELECT * FROM agents ORDER BY rowid ASC');
  const selectConfig = db.prepare<[], ConfigRow>(
    `SELECT data FROM orchestrator_config WHERE id = 'default'`,
  );
  const selectTasks = db.prepare<[string], TaskRow>(
    'SELECT * FROM tasks WHERE request_id = ? ORDER BY created_at ASC, rowid ASC',
  );
  const selectRequest = db.prepare<[string], RequestRow>('SELECT * FROM requests WHERE id = ?');

  return {
    loadAgents(): Promise<AgentRecord[]> {
      return Promise.resolve(selectAgents.all().map(rowToAgent));
    },

    loadOrchestratorConfig(): Promise<Partial<OrchestratorSettings> | null> {
      const row = selectConfig.get();
      return Promise.resolve(
        row ? parseJsonColumn(row.data, orchestratorSettingsSchema.partial()) : null,
      );
    },

    persistOrchestratorConfig(settings: OrchestratorSettings): Promise<void> {
      upsertConfig.run(JSON.stringify(settings));
      return Promise.resolve();
    },

    persistAgent(record: AgentRecord): Promise<void> {
      upsertAgent.run(
        record.id,
        record.name,
        record.type,
        record.description ?? null,
        JSON.stringify(record.capabilities),
        record.state,
        record.priority,
        JSON.stringify(record.configuration),
        record.errorMessage ?? null,
        record.updatedAt.getTime(),
      );
      return Promise.resolve();
    },

    persistTask(task: Task): Promise<void> {
      upsertTask.run(
        task.id,
        task.requestId,
        task.key,
        task.capability,
        task.pinnedAgentId ?? null,
        task.assignedAgentId,
        JSON.stringify(task.input),
        task.output === null ? null : JSON.stringify(task.output),
        task.state,
        task.retryCount,
        task.maxAttempts,
        JSON.stringify(task.dependsOn),
        task.deadlineMs ?? null,
        task.error === null ? null : JSON.stringify(task.error),
        fromDate(task.nextAttemptAt),
        task.executionId,
        task.createdAt.getTime(),
        fromDate(task.enqueuedAt),
        fromDate(task.startedAt),
        fromDate(task.finishedAt),
      );
      return Promise.resolve();
    },

    persistRequest(request: RequestRecord): Promise<void> {
      upsertRequest.run(
        request.id,
        JSON.stringify(request.goal),
        JSON.stringify(request.context),
        JSON.stringify(request.constraints),
        request.caller ? JSON.stringify(request.caller) : null,
        JSON.stringify(request.taskIds),
        JSON.stringify(request.unmatched),
        request.state,
        request.outcome === null ? null : JSON.stringify(request.outcome),
        request.createdAt.getTime(),
        fromDate(request.finishedAt),
      );
      return Promise.resolve();
    },

    listTasks(requestId: RequestId): Promise<Task[]> {
      return Promise.resolve(selectTasks.all(requestId).map(rowToTask));
    },

    getRequest(id: RequestId): Promise<RequestRecord | null> {
      const row = selectRequest.get(id);
      return Promise.resolve(row ? rowToRequest(row) : null);
    },

    close(): Promise<void> {
      db.close();
      return Promise.resolve();
    },
  };
}
