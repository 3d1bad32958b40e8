/**
 * Agent Registry: capability-indexed access to registered agents.
 *
 * Holds agents in memory, resolves capabilities to active agents, and
 * enforces the agent state graph. State changes are serialized per agent
 * and take effect for the next `resolve` call, with no caching in between.
 */
import { EventEmitter } from 'events';
import {
  AgentNotFoundError,
  DuplicateIdentifierError,
  InvalidTransitionError,
} from '@/core/errors.js';
import { createKeyedLock } from '@/core/keyed-lock.js';
import type { AgentId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { RecordStore } from '@/infrastructure/record-store/types.js';
import type {
  AgentRecord,
  AgentRegistration,
  AgentRegistry,
  AgentState,
  AgentStateChange,
  AgentType,
  RegisterOptions,
  RegisteredAgent,
} from './types.js';

// ─── State Graph ─────────────────────────────────────────────────

const ALLOWED_TRANSITIONS: Readonly<Record<AgentState, readonly AgentState[]>> = {
  inactive: ['active'],
  active: ['inactive', 'error'],
  error: ['inactive'],
};

/** Whether the agent state graph permits `from -> to`. */
export function canTransitionAgent(from: AgentState, to: AgentState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

function sameCapabilities(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const capability of left) {
    if (!right.has(capability)) return false;
  }
  return true;
}

// ─── Registry Dependencies ───────────────────────────────────────

interface RegistryDeps {
  logger: Logger;
  /** Where state changes are persisted. Omit for a purely in-memory registry. */
  recordStore?: Pick<RecordStore, 'persistAgent'>;
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create an agent registry.
 */
export function createAgentRegistry(deps: RegistryDeps): AgentRegistry {
  const { logger, recordStore } = deps;
  const agents = new Map<AgentId, RegisteredAgent>();
  const emitter = new EventEmitter();
  const lock = createKeyedLock();
  let nextSequence = 0;

  function byRoutingOrder(a: RegisteredAgent, b: RegisteredAgent): number {
    return a.record.priority - b.record.priority || a.sequence - b.sequence;
  }

  function mustGet(agentId: AgentId): RegisteredAgent {
    const agent = agents.get(agentId);
    if (!agent) {
      throw new AgentNotFoundError(agentId);
    }
    return agent;
  }

  function notify(change: AgentStateChange): void {
    emitter.emit('state', change);
  }

  const registry: AgentRegistry = {
    register(agent: AgentRegistration, options?: RegisterOptions): RegisteredAgent {
      const existing = agents.get(agent.id);

      if (
        existing &&
        !options?.update &&
        !sameCapabilities(existing.record.capabilities, agent.capabilities)
      ) {
        throw new DuplicateIdentifierError(
          agent.id,
          existing.record.capabilities,
          agent.capabilities,
        );
      }

      const previousState = existing?.record.state;
      const record: AgentRecord = {
        id: agent.id,
        name: agent.name,
        type: agent.type,
        description: agent.description,
        capabilities: [...new Set(agent.capabilities)],
        state: agent.state ?? previousState ?? 'inactive',
        priority: agent.priority ?? existing?.record.priority ?? 0,
        configuration: agent.configuration ?? existing?.record.configuration ?? {},
        updatedAt: new Date(),
      };

      const registered: RegisteredAgent = {
        record,
        handler: agent.handler,
        sequence: existing?.sequence ?? nextSequence++,
      };
      agents.set(agent.id, registered);

      logger.info(existing ? 'Agent updated' : 'Agent registered', {
        component: 'agent-registry',
        agentId: agent.id,
        type: agent.type,
        capabilities: record.capabilities,
        state: record.state,
      });

      if (previousState !== undefined && previousState !== record.state) {
        notify({ agentId: agent.id, from: previousState, to: record.state, reason: 'registration' });
      }

      return registered;
    },

    resolve(capability: string): RegisteredAgent[] {
      return [...agents.values()]
        .filter(
          (agent) =>
            agent.record.state === 'active' && agent.record.capabilities.includes(capability),
        )
        .sort(byRoutingOrder);
    },

    setState(agentId: AgentId, state: AgentState, reason?: string): Promise<AgentRecord> {
      return lock.run(agentId, async () => {
        const agent = mustGet(agentId);
        const from = agent.record.state;

        if (!canTransitionAgent(from, state)) {
          throw new InvalidTransitionError('agent', agentId, from, state);
        }

        const record: AgentRecord = {
          ...agent.record,
          state,
          errorMessage: state === 'error' ? reason : undefined,
          updatedAt: new Date(),
        };
        if (recordStore) {
          await recordStore.persistAgent(record);
        }
        agents.set(agentId, { ...agent, record });

        logger.info('Agent state changed', {
          component: 'agent-registry',
          agentId,
          from,
          to: state,
          reason,
        });
        notify({ agentId, from, to: state, reason });
        return record;
      });
    },

    activate(agentId: AgentId): Promise<AgentRecord> {
      return registry.setState(agentId, 'active');
    },

    deactivate(agentId: AgentId): Promise<AgentRecord> {
      return registry.setState(agentId, 'inactive');
    },

    markError(agentId: AgentId, reason: string): Promise<AgentRecord> {
      return registry.setState(agentId, 'error', reason);
    },

    reset(agentId: AgentId): Promise<AgentRecord> {
      return registry.setState(agentId, 'inactive', 'reset');
    },

    get(agentId: AgentId): RegisteredAgent | undefined {
      return agents.get(agentId);
    },

    findByType(type: AgentType): RegisteredAgent | undefined {
      const ofType = [...agents.values()]
        .filter((agent) => agent.record.type === type)
        .sort(byRoutingOrder);
      return ofType.find((agent) => agent.record.state === 'active') ?? ofType[0];
    },

    list(): RegisteredAgent[] {
      return [...agents.values()].sort((a, b) => a.sequence - b.sequence);
    },

    capabilities(): string[] {
      const seen = new Set<string>();
      for (const agent of registry.list()) {
        for (const capability of agent.record.capabilities) {
          seen.add(capability);
        }
      }
      return [...seen];
    },

    onStateChange(listener: (change: AgentStateChange) => void): () => void {
      emitter.on('state', listener);
      return () => {
        emitter.off('state', listener);
      };
    },
  };

  return registry;
}
