/**
 * Router: picks exactly one active agent for a task.
 *
 * Candidates come from the registry in priority order. Among the
 * best-priority candidates the one with the fewest running tasks wins;
 * exact ties keep registration order.
 */
import { NoAgentAvailableError } from '@/core/errors.js';
import type { AgentId } from '@/core/types.js';
import type { AgentRegistry, RegisteredAgent } from '@/agents/types.js';
import type { Task } from '@/scheduling/types.js';

export interface RouteOptions {
  /** Agents that must not be chosen, e.g. the one that just failed. */
  exclude?: readonly AgentId[];
}

export interface Router {
  /** Throws NoAgentAvailableError when no active agent fits. */
  route(task: Pick<Task, 'capability' | 'pinnedAgentId'>, options?: RouteOptions): RegisteredAgent;
}

interface RouterDeps {
  registry: AgentRegistry;
  /** Running tasks per agent. */
  load: (agentId: AgentId) => number;
}

/**
 * Create a load-aware router.
 */
export function createRouter(deps: RouterDeps): Router {
  const { registry, load } = deps;

  return {
    route(task, options): RegisteredAgent {
      const excluded = new Set(options?.exclude ?? []);

      if (task.pinnedAgentId !== undefined) {
        const pinned = registry.get(task.pinnedAgentId);
        if (!pinned || pinned.record.state !== 'active' || excluded.has(pinned.record.id)) {
          throw new NoAgentAvailableError(task.capability, [...excluded]);
        }
        return pinned;
      }

      const candidates = registry
        .resolve(task.capability)
        .filter((agent) => !excluded.has(agent.record.id));

      const [first] = candidates;
      if (first === undefined) {
        throw new NoAgentAvailableError(task.capability, [...excluded]);
      }

      let best = first;
      let bestLoad = load(first.record.id);
      for (const candidate of candidates.slice(1)) {
        if (candidate.record.priority !== first.record.priority) break;
        const candidateLoad = load(candidate.record.id);
        if (candidateLoad < bestLoad) {
          best = candidate;
          bestLoad = candidateLoad;
        }
      }
      return best;
    },
  };
}
