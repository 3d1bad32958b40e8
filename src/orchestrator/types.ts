/**
 * Orchestrator types: requests, outcomes, settings, and the status snapshot.
 */
import type { AgentId, CallerIdentity, JsonObject, JsonValue, RequestId, TaskId } from '@/core/types.js';
import type { AgentRecord, AgentType } from '@/agents/types.js';
import type { Goal, PlanConstraints } from '@/planning/types.js';
import type { QueueDepth, RetryPolicy, TaskError } from '@/scheduling/types.js';

// ─── Settings ───────────────────────────────────────────────────

export type StopPolicy = 'drain' | 'abort';

export interface OrchestratorSettings {
  /** Must exist and be active for `start()` to succeed when set. */
  plannerAgentId?: AgentId;
  routerAgentId?: AgentId;
  retryPolicy: RetryPolicy;
  maxConcurrentTasks: number;
  /** Deadline applied to tasks that carry none. */
  taskTimeoutMs: number;
  stopPolicy: StopPolicy;
  /** How long a drain may wait before the remainder is aborted. Unbounded when unset. */
  drainTimeoutMs?: number;
  /** Finished requests kept in memory for status and lookup. */
  recentRequestLimit: number;
  /** Consecutive execution failures that put an agent into `error`. 0 never does. */
  agentFailureThreshold: number;
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  retryPolicy: { maxAttempts: 3, backoffBaseMs: 1000, backoffCapMs: 30_000 },
  maxConcurrentTasks: 10,
  taskTimeoutMs: 300_000,
  stopPolicy: 'drain',
  recentRequestLimit: 50,
  agentFailureThreshold: 0,
};

// ─── Requests ───────────────────────────────────────────────────

export interface RequestConstraints extends PlanConstraints {
  /** Total executions allowed per task in this request. */
  maxAttempts?: number;
}

export interface ProcessRequestInput {
  goal: Goal;
  context?: JsonObject;
  constraints?: RequestConstraints;
  caller?: CallerIdentity;
}

export type RequestState = 'in_progress' | 'completed' | 'failed';

export interface TaskOutput {
  taskId: TaskId;
  key: string;
  capability: string;
  agentId: AgentId | null;
  output: JsonValue;
}

export interface TaskFailure {
  taskId: TaskId;
  key: string;
  capability: string;
  /** Executions used, including the one that failed last. */
  attempts: number;
  error: TaskError;
}

export type RequestOutcome =
  | { status: 'success'; requestId: RequestId; outputs: TaskOutput[]; unmatched: string[] }
  | {
      status: 'partial_failure';
      requestId: RequestId;
      outputs: TaskOutput[];
      failures: TaskFailure[];
      unmatched: string[];
    }
  | { status: 'unroutable'; requestId: RequestId; reason: string; unmatched: string[] };

export interface RequestRecord {
  id: RequestId;
  goal: Goal;
  context: JsonObject;
  constraints: RequestConstraints;
  caller?: CallerIdentity;
  /** Plan order. */
  taskIds: TaskId[];
  unmatched: string[];
  state: RequestState;
  outcome: RequestOutcome | null;
  createdAt: Date;
  finishedAt: Date | null;
}

// ─── Direct Execution ───────────────────────────────────────────

export interface ExecuteAgentInput {
  /** Agent id, or an agent type resolved to its first agent. */
  agentRef: string | AgentType;
  taskData: JsonObject;
  capability?: string;
  caller?: CallerIdentity;
}

// ─── Status ─────────────────────────────────────────────────────

export type OrchestratorState = 'stopped' | 'running';

export interface AgentStats {
  running: number;
  completed: number;
  failed: number;
  consecutiveFailures: number;
}

export interface AgentStatus {
  id: AgentId;
  name: string;
  type: AgentType;
  description?: string;
  state: AgentRecord['state'];
  capabilities: string[];
  priority: number;
  errorMessage?: string;
  stats: AgentStats;
}

export interface RequestSummary {
  requestId: RequestId;
  state: RequestState;
  status: RequestOutcome['status'] | null;
  taskCount: number;
  createdAt: string;
  finishedAt: string | null;
  durationMs: number | null;
}

export interface PerformanceStats {
  totalProcessed: number;
  succeeded: number;
  /** 0..1, or 0 before anything finished. */
  successRate: number;
  averageProcessingMs: number;
}

export interface OrchestratorStatus {
  state: OrchestratorState;
  draining: boolean;
  plannerAgentId: AgentId | null;
  routerAgentId: AgentId | null;
  maxConcurrentTasks: number;
  agents: AgentStatus[];
  queue: QueueDepth;
  activeRequests: number;
  recentRequests: RequestSummary[];
  performance: PerformanceStats;
}

export interface StopOptions {
  policy?: StopPolicy;
  drainTimeoutMs?: number;
}
