/**
 * Agent Types
 *
 * Agents are capability-tagged handlers. The registry resolves them by
 * capability key; new categories arrive through configuration and the
 * handler catalog, never through subclassing.
 */
import type { AgentId, JsonObject, JsonValue, RequestId, TaskId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';

// ─── Agent Type & State ──────────────────────────────────────────

export const BUILT_IN_AGENT_TYPES = [
  'planner',
  'router',
  'crm',
  'sales',
  'inventory',
  'accounting',
  'hr',
  'custom',
] as const;

export type BuiltInAgentType = (typeof BUILT_IN_AGENT_TYPES)[number];

/** A built-in category, or any category added by configuration. */
export type AgentType = BuiltInAgentType | (string & {});

export type AgentState = 'inactive' | 'active' | 'error';

// ─── Agent Record ────────────────────────────────────────────────

/** The persisted, configuration-owned description of an agent. */
export interface AgentRecord {
  id: AgentId;
  name: string;
  type: AgentType;
  description?: string;
  capabilities: string[];
  state: AgentState;
  /** Lower runs first. Equal priorities fall back to registration order. */
  priority: number;
  /** Opaque to the engine; handed to the agent's handler. */
  configuration: JsonObject;
  /** Set when the agent entered `error`. */
  errorMessage?: string;
  updatedAt: Date;
}

// ─── Execution Contract ──────────────────────────────────────────

/** What an agent receives for one execution of a task. */
export interface AgentTaskInput {
  taskId: TaskId;
  requestId: RequestId;
  capability: string;
  input: JsonObject;
  /** Context of the request the task belongs to (caller, host record, ...). */
  context: JsonObject;
  /** Outputs of completed dependency tasks, keyed by their plan key. */
  dependencyOutputs: Record<string, JsonValue>;
}

export interface AgentExecutionContext {
  agent: AgentRecord;
  /** Aborted on deadline, re-routing, or orchestrator abort. */
  signal: AbortSignal;
  logger: Logger;
}

/** Execution entry point of an agent. Rejects to report a failure. */
export type AgentHandler = (
  task: AgentTaskInput,
  context: AgentExecutionContext,
) => Promise<JsonValue>;

// ─── Registration ────────────────────────────────────────────────

export interface AgentRegistration {
  id: AgentId;
  name: string;
  type: AgentType;
  description?: string;
  capabilities: string[];
  state?: AgentState;
  priority?: number;
  configuration?: JsonObject;
  handler: AgentHandler;
}

export interface RegisterOptions {
  /** Allow replacing the capability set of an existing agent. */
  update?: boolean;
}

/** A registered agent as seen by routing and introspection. */
export interface RegisteredAgent {
  record: AgentRecord;
  handler: AgentHandler;
  /** Monotonic registration sequence, the default routing order. */
  sequence: number;
}

export interface AgentStateChange {
  agentId: AgentId;
  from: AgentState;
  to: AgentState;
  reason?: string;
}

// ─── Agent Registry Interface ────────────────────────────────────

export interface AgentRegistry {
  /** Add or update an agent. */
  register(agent: AgentRegistration, options?: RegisterOptions): RegisteredAgent;
  /** Active agents declaring `capability`, by priority then registration order. */
  resolve(capability: string): RegisteredAgent[];
  /** Validate and apply a state transition, then persist it. */
  setState(agentId: AgentId, state: AgentState, reason?: string): Promise<AgentRecord>;
  activate(agentId: AgentId): Promise<AgentRecord>;
  deactivate(agentId: AgentId): Promise<AgentRecord>;
  markError(agentId: AgentId, reason: string): Promise<AgentRecord>;
  /** `error -> inactive`. */
  reset(agentId: AgentId): Promise<AgentRecord>;
  get(agentId: AgentId): RegisteredAgent | undefined;
  /** First agent of a type, preferring active ones. */
  findByType(type: AgentType): RegisteredAgent | undefined;
  list(): RegisteredAgent[];
  /** Every capability declared by any registered agent, in first-declared order. */
  capabilities(): string[];
  /** Subscribe to state changes. Returns an unsubscribe function. */
  onStateChange(listener: (change: AgentStateChange) => void): () => void;
}

// ─── Handler Catalog ─────────────────────────────────────────────

/** Builds the handler for an agent record; keyed by agent type or `configuration.handler`. */
export type AgentHandlerFactory = (record: AgentRecord) => AgentHandler;

export interface HandlerCatalog {
  register(key: string, factory: AgentHandlerFactory): void;
  /** Resolve a handler for `record`, trying `configuration.handler` first, then `type`. */
  resolve(record: AgentRecord): AgentHandler | undefined;
  keys(): string[];
}
