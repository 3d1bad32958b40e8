/**
 * Shared fixtures for engine tests: a silent logger, agent registrations,
 * and small async helpers.
 */
import { vi } from 'vitest';
import { toAgentId, toRequestId, toTaskId } from '@/core/ids.js';
import type { JsonObject, JsonValue } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type {
  AgentExecutionContext,
  AgentHandler,
  AgentRegistration,
  AgentTaskInput,
} from '@/agents/types.js';

/** Create a mock Logger with every method as vi.fn(). */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

/** Handler that resolves with `{ agent, capability, input }`. */
export function echoHandler(agentName: string): AgentHandler {
  return (task) =>
    Promise.resolve({ agent: agentName, capability: task.capability, input: task.input });
}

/** Handler that always rejects. */
export function failingHandler(message = 'agent exploded'): AgentHandler {
  return () => Promise.reject(new Error(message));
}

/** A handler whose executions stay open until the test settles them. */
export interface DeferredHandler {
  handler: AgentHandler;
  /** Executions started so far, oldest first. */
  calls: { capability: string; signal: AbortSignal; resolve: (value: JsonValue) => void; reject: (error: Error) => void }[];
}

export function deferredHandler(): DeferredHandler {
  const calls: DeferredHandler['calls'] = [];
  return {
    calls,
    handler: (task, context) =>
      new Promise<JsonValue>((resolve, reject) => {
        calls.push({ capability: task.capability, signal: context.signal, resolve, reject });
      }),
  };
}

/** Build an active agent registration. */
export function makeAgent(
  id: string,
  capabilities: string[],
  overrides?: Partial<AgentRegistration>,
): AgentRegistration {
  return {
    id: toAgentId(id),
    name: `${id} agent`,
    type: 'custom',
    capabilities,
    state: 'active',
    handler: echoHandler(id),
    ...overrides,
  };
}

/** Let queued promise callbacks and zero-delay timers run. */
export async function flush(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => {
      setImmediate(resolve);
    });
  }
}

/** Task input for calling a handler directly. */
export function makeTaskInput(
  capability: string,
  input: JsonObject,
  overrides?: Partial<AgentTaskInput>,
): AgentTaskInput {
  return {
    taskId: toTaskId('task_test'),
    requestId: toRequestId('req_test'),
    capability,
    input,
    context: {},
    dependencyOutputs: {},
    ...overrides,
  };
}

/** Execution context for calling a handler directly. */
export function makeExecutionContext(agentId = 'agent-under-test'): AgentExecutionContext {
  return {
    agent: {
      id: toAgentId(agentId),
      name: `${agentId} agent`,
      type: 'custom',
      capabilities: [],
      state: 'active',
      priority: 0,
      configuration: {},
      updatedAt: new Date(),
    },
    signal: new AbortController().signal,
    logger: createMockLogger(),
  };
}
