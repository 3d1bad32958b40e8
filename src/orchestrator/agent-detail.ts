import type { AgentRegistry } from '@/agents/types.js';
import type { JsonObject } from '@/core/types.js';
import type { Orchestrator } from './orchestrator.js';
import type { AgentStatus } from './types.js';

/** One agent's status entry plus its stored configuration. */
export interface AgentDetail extends AgentStatus {
  configuration: JsonObject;
  updatedAt: string;
}

export function describeAgent(
  orchestrator: Orchestrator,
  registry: AgentRegistry,
  agentId: string,
): AgentDetail | undefined {
  const status = orchestrator.getStatus().agents.find((agent) => agent.id === agentId);
  if (!status) return undefined;
  const registered = registry.get(status.id);
  if (!registered) return undefined;
  return {
    ...status,
    configuration: registered.record.configuration,
    updatedAt: registered.record.updatedAt.toISOString(),
  };
}
