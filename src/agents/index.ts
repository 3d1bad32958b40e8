/**
 * Agents
 *
 * Registry, handler catalog, built-in handlers and the host record port.
 */

// ─── Types ───────────────────────────────────────────────────────

export type {
  AgentExecutionContext,
  AgentHandler,
  AgentHandlerFactory,
  AgentRecord,
  AgentRegistration,
  AgentRegistry,
  AgentState,
  AgentStateChange,
  AgentTaskInput,
  AgentType,
  HandlerCatalog,
  RegisteredAgent,
} from './types.js';
export { BUILT_IN_AGENT_TYPES } from './types.js';

export type { HostRecord, HostRecordGateway, RecordQuery } from './host-record-gateway.js';

// ─── Factory Functions ───────────────────────────────────────────

export { canTransitionAgent, createAgentRegistry } from './agent-registry.js';
export { createHandlerCatalog } from './handler-catalog.js';
export { createMemoryRecordGateway } from './host-record-gateway.js';
export { bootstrapAgents } from './bootstrap.js';
export type { BootstrapResult } from './bootstrap.js';
export { DEFAULT_AGENTS } from './default-agents.js';
export { registerBuiltInHandlers } from './handlers/index.js';
export type { BuiltInHandlerDeps } from './handlers/index.js';
