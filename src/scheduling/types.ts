/**
 * Task Queue: types for the task lifecycle.
 *
 * States: pending -> routed -> running -> completed | failed, with
 * failed -> pending while another attempt remains. A task is terminal
 * once completed, or failed with no retry scheduled.
 */
import type { ErrorKind } from '@/core/errors.js';
import type { AgentId, JsonObject, JsonValue, RequestId, TaskId } from '@/core/types.js';

// ─── Enums ──────────────────────────────────────────────────────

export type TaskState = 'pending' | 'routed' | 'running' | 'completed' | 'failed';

// ─── Task Error ─────────────────────────────────────────────────

export interface TaskError {
  kind: ErrorKind;
  message: string;
  /** Agent that was executing when the failure happened. */
  agentId?: AgentId;
}

// ─── Task ───────────────────────────────────────────────────────

export interface Task {
  id: TaskId;
  requestId: RequestId;
  /** Plan-local name; dependency outputs are keyed by it. */
  key: string;
  capability: string;
  /** Direct executions bypass routing and run only on this agent. */
  pinnedAgentId?: AgentId;
  assignedAgentId: AgentId | null;
  input: JsonObject;
  /** Set if and only if state is `completed`. */
  output: JsonValue | null;
  state: TaskState;
  retryCount: number;
  maxAttempts: number;
  dependsOn: TaskId[];
  /** Running time allowed per attempt. */
  deadlineMs?: number;
  /** Set if and only if state is `failed`. */
  error: TaskError | null;
  /** When a scheduled retry will re-admit the task. Null unless a retry is pending. */
  nextAttemptAt: Date | null;
  /** Incremented for every execution context; stale signals carry an old value. */
  executionId: number;
  createdAt: Date;
  enqueuedAt: Date | null;
  startedAt: Date | null;
  finishedAt: Date | null;
}

// ─── Inputs ─────────────────────────────────────────────────────

export interface TaskCreateInput {
  requestId: RequestId;
  key: string;
  capability: string;
  input: JsonObject;
  dependsOn?: TaskId[];
  deadlineMs?: number;
  pinnedAgentId?: AgentId;
  /** Overrides the queue's retry policy for this task. */
  maxAttempts?: number;
}

// ─── Retry Policy ───────────────────────────────────────────────

export interface RetryPolicy {
  /** Total executions allowed per task, including the first. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
}

// ─── Queue Depth ────────────────────────────────────────────────

export interface QueueDepth {
  pending: number;
  routed: number;
  running: number;
  completed: number;
  failed: number;
  /** Failed tasks waiting for a scheduled retry. */
  retrying: number;
  total: number;
}

// ─── Dispatch ───────────────────────────────────────────────────

/** A task that the queue moved to `running`, with the agent that accepted it. */
export interface DispatchedTask {
  task: Task;
  agentId: AgentId;
  executionId: number;
}

/** Chooses an agent for a routed task. Throws NoAgentAvailableError when none fits. */
export type RouteFn = (task: Task) => AgentId;
