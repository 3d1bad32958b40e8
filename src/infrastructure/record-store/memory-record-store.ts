/**
 * In-memory Record Store. Used when no database path is configured, and in tests.
 * Records are cloned on the way in and out so callers never share state with the store.
 */
import type { RequestId, TaskId } from '@/core/types.js';
import type { AgentRecord } from '@/agents/types.js';
import type { OrchestratorSettings, RequestRecord } from '@/orchestrator/types.js';
import type { Task } from '@/scheduling/types.js';
import type { RecordStore } from './types.js';

export interface MemoryRecordStoreSeed {
  agents?: AgentRecord[];
  orchestrator?: Partial<OrchestratorSettings>;
}

/** Create an in-memory Record Store, optionally pre-seeded. */
export function createMemoryRecordStore(seed?: MemoryRecordStoreSeed): RecordStore {
  const agents = new Map<string, AgentRecord>();
  const tasks = new Map<TaskId, Task>();
  const requests = new Map<RequestId, RequestRecord>();
  let settings: Partial<OrchestratorSettings> | null = seed?.orchestrator
    ? structuredClone(seed.orchestrator)
    : null;

  for (const agent of seed?.agents ?? []) {
    agents.set(agent.id, structuredClone(agent));
  }

  return {
    loadAgents(): Promise<AgentRecord[]> {
      return Promise.resolve([...agents.values()].map((agent) => structuredClone(agent)));
    },

    loadOrchestratorConfig(): Promise<Partial<OrchestratorSettings> | null> {
      return Promise.resolve(settings ? structuredClone(settings) : null);
    },

    persistOrchestratorConfig(next: OrchestratorSettings): Promise<void> {
      settings = structuredClone(next);
      return Promise.resolve();
    },

    persistAgent(record: AgentRecord): Promise<void> {
      agents.set(record.id, structuredClone(record));
      return Promise.resolve();
    },

    persistTask(task: Task): Promise<void> {
      tasks.set(task.id, structuredClone(task));
      return Promise.resolve();
    },

    persistRequest(request: RequestRecord): Promise<void> {
      requests.set(request.id, structuredClone(request));
      return Promise.resolve();
    },

    listTasks(requestId: RequestId): Promise<Task[]> {
      return Promise.resolve(
        [...tasks.values()]
          .filter((task) => task.requestId === requestId)
          .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
          .map((task) => structuredClone(task)),
      );
    },

    getRequest(id: RequestId): Promise<RequestRecord | null> {
      const request = requests.get(id);
      return Promise.resolve(request ? structuredClone(request) : null);
    },

    close(): Promise<void> {
      return Promise.resolve();
    },
  };
}
