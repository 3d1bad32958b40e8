/**
 * Record Store: the durable side of the engine.
 *
 * The engine calls these at every documented state transition. Lookups are
 * keyed; nothing here spans more than one record.
 */
import type { RequestId } from '@/core/types.js';
import type { AgentRecord } from '@/agents/types.js';
import type { OrchestratorSettings, RequestRecord } from '@/orchestrator/types.js';
import type { Task } from '@/scheduling/types.js';

export interface RecordStore {
  /** Every stored agent, in first-stored order. */
  loadAgents(): Promise<AgentRecord[]>;
  /** Stored orchestrator settings, or null when none were saved. */
  loadOrchestratorConfig(): Promise<Partial<OrchestratorSettings> | null>;
  persistOrchestratorConfig(settings: OrchestratorSettings): Promise<void>;
  persistAgent(record: AgentRecord): Promise<void>;
  persistTask(task: Task): Promise<void>;
  persistRequest(request: RequestRecord): Promise<void>;
  /** Tasks of a request, oldest first. */
  listTasks(requestId: RequestId): Promise<Task[]>;
  getRequest(id: RequestId): Promise<RequestRecord | null>;
  close(): Promise<void>;
}
