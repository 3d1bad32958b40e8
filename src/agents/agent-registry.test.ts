/**
 * Agent Registry Tests
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  AgentNotFoundError,
  DuplicateIdentifierError,
  InvalidTransitionError,
} from '@/core/errors.js';
import { toAgentId } from '@/core/ids.js';
import { createMemoryRecordStore } from '@/infrastructure/record-store/memory-record-store.js';
import { createMockLogger, echoHandler, makeAgent } from '@/testing/fixtures/engine.js';
import { canTransitionAgent, createAgentRegistry } from './agent-registry.js';
import type { AgentRegistry, AgentStateChange } from './types.js';

describe('AgentRegistry', () => {
  let registry: AgentRegistry;

  beforeEach(() => {
    registry = createAgentRegistry({ logger: createMockLogger() });
  });

  // ─── Registration ─────────────────────────────────────────────

  describe('register', () => {
    it('defaults state to inactive and priority to 0', () => {
      const agent = registry.register({
        id: toAgentId('crm'),
        name: 'CRM',
        type: 'crm',
        capabilities: ['crm'],
        handler: echoHandler('crm'),
      });

      expect(agent.record.state).toBe('inactive');
      expect(agent.record.priority).toBe(0);
      expect(agent.record.configuration).toEqual({});
    });

    it('deduplicates capabilities', () => {
      const agent = registry.register(makeAgent('crm', ['crm', 'leads', 'crm']));

      expect(agent.record.capabilities).toEqual(['crm', 'leads']);
    });

    it('accepts re-registration with the same capability set', () => {
      registry.register(makeAgent('crm', ['crm', 'leads']));

      const again = registry.register(makeAgent('crm', ['leads', 'crm'], { name: 'CRM v2' }));

      expect(again.record.name).toBe('CRM v2');
      expect(registry.list()).toHaveLength(1);
    });

    it('rejects a different capability set unless update is requested', () => {
      registry.register(makeAgent('crm', ['crm']));

      expect(() => registry.register(makeAgent('crm', ['crm', 'sales']))).toThrow(
        DuplicateIdentifierError,
      );

      const updated = registry.register(makeAgent('crm', ['crm', 'sales']), { update: true });
      expect(updated.record.capabilities).toEqual(['crm', 'sales']);
    });

    it('keeps the original registration order on update', () => {
      registry.register(makeAgent('a', ['x']));
      registry.register(makeAgent('b', ['x']));
      registry.register(makeAgent('a', ['x', 'y']), { update: true });

      expect(registry.list().map((agent) => agent.record.id)).toEqual(['a', 'b']);
    });
  });

  // ─── Resolution ───────────────────────────────────────────────

  describe('resolve', () => {
    it('returns only active agents, by priority then registration order', () => {
      registry.register(makeAgent('crm-c', ['crm'], { priority: 2 }));
      registry.register(makeAgent('crm-a', ['crm'], { priority: 1 }));
      registry.register(makeAgent('crm-b', ['crm'], { priority: 1 }));
      registry.register(makeAgent('crm-off', ['crm'], { priority: 0, state: 'inactive' }));

      expect(registry.resolve('crm').map((agent) => agent.record.id)).toEqual([
        'crm-a',
        'crm-b',
        'crm-c',
      ]);
    });

    it('returns nothing for an unknown capability', () => {
      registry.register(makeAgent('crm', ['crm']));

      expect(registry.resolve('payroll')).toEqual([]);
    });

    it('sees state changes on the next call', async () => {
      registry.register(makeAgent('crm', ['crm']));

      await registry.deactivate(toAgentId('crm'));

      expect(registry.resolve('crm')).toEqual([]);
    });
  });

  // ─── State Graph ──────────────────────────────────────────────

  describe('state transitions', () => {
    it('allows the documented edges only', () => {
      expect(canTransitionAgent('inactive', 'active')).toBe(true);
      expect(canTransitionAgent('active', 'error')).toBe(true);
      expect(canTransitionAgent('error', 'inactive')).toBe(true);
      expect(canTransitionAgent('error', 'active')).toBe(false);
      expect(canTransitionAgent('inactive', 'error')).toBe(false);
    });

    it('rejects an invalid transition and leaves the agent unchanged', async () => {
      registry.register(makeAgent('crm', ['crm']));
      await registry.markError(toAgentId('crm'), 'boom');

      await expect(registry.activate(toAgentId('crm'))).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
      expect(registry.get(toAgentId('crm'))?.record.state).toBe('error');
    });

    it('records the error message and clears it on reset', async () => {
      registry.register(makeAgent('crm', ['crm']));

      await registry.markError(toAgentId('crm'), 'ERP unreachable');
      expect(registry.get(toAgentId('crm'))?.record.errorMessage).toBe('ERP unreachable');

      const record = await registry.reset(toAgentId('crm'));
      expect(record.state).toBe('inactive');
      expect(record.errorMessage).toBeUndefined();
    });

    it('throws AgentNotFound for unknown agents', async () => {
      await expect(registry.activate(toAgentId('ghost'))).rejects.toBeInstanceOf(
        AgentNotFoundError,
      );
    });

    it('notifies listeners until they unsubscribe', async () => {
      registry.register(makeAgent('crm', ['crm']));
      const changes: AgentStateChange[] = [];
      const unsubscribe = registry.onStateChange((change) => changes.push(change));

      await registry.markError(toAgentId('crm'), 'boom');
      unsubscribe();
      await registry.reset(toAgentId('crm'));

      expect(changes).toEqual([{ agentId: 'crm', from: 'active', to: 'error', reason: 'boom' }]);
    });

    it('persists each change before announcing it', async () => {
      const recordStore = createMemoryRecordStore();
      const persistAgent = vi.spyOn(recordStore, 'persistAgent');
      const persisted = createAgentRegistry({ logger: createMockLogger(), recordStore });
      persisted.register(makeAgent('crm', ['crm']));
      const seenAtNotify: number[] = [];
      persisted.onStateChange(() => seenAtNotify.push(persistAgent.mock.calls.length));

      await persisted.deactivate(toAgentId('crm'));

      expect(seenAtNotify).toEqual([1]);
      expect((await recordStore.loadAgents()).map((agent) => agent.state)).toEqual(['inactive']);
    });
  });

  // ─── Lookup ───────────────────────────────────────────────────

  describe('lookup', () => {
    it('finds an agent by type, preferring active ones', () => {
      registry.register(makeAgent('crm-old', ['crm'], { type: 'crm', state: 'inactive' }));
      registry.register(makeAgent('crm-new', ['crm'], { type: 'crm', priority: 3 }));

      expect(registry.findByType('crm')?.record.id).toBe('crm-new');
      expect(registry.findByType('hr')).toBeUndefined();
    });

    it('lists capabilities in first-declared order', () => {
      registry.register(makeAgent('a', ['crm', 'sales']));
      registry.register(makeAgent('b', ['sales', 'hr']));

      expect(registry.capabilities()).toEqual(['crm', 'sales', 'hr']);
    });
  });
});
