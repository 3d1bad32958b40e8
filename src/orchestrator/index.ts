// Orchestrator module: the façade over planner, router, registry and queue
export type {
  AgentStats,
  AgentStatus,
  ExecuteAgentInput,
  OrchestratorSettings,
  OrchestratorState,
  OrchestratorStatus,
  PerformanceStats,
  ProcessRequestInput,
  RequestConstraints,
  RequestOutcome,
  RequestRecord,
  RequestState,
  RequestSummary,
  StopOptions,
  StopPolicy,
  TaskFailure,
  TaskOutput,
} from './types.js';
export { DEFAULT_ORCHESTRATOR_SETTINGS } from './types.js';

export { createOrchestrator, plannableCapabilities } from './orchestrator.js';
export type { Orchestrator } from './orchestrator.js';
export { describeAgent } from './agent-detail.js';
export type { AgentDetail } from './agent-detail.js';
export {
  orchestratorSettingsSchema,
  processRequestSchema,
  requestOutcomeSchema,
} from './schemas.js';
