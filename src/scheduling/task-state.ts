/**
 * Task state graph and the invariants that hang off it.
 */
import type { Task, TaskState } from './types.js';

const ALLOWED_TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  // pending -> failed: dependency failed, or the orchestrator aborted
  pending: ['routed', 'failed'],
  // routed -> failed: the router found no agent
  routed: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: ['pending'],
};

/** Whether the task state graph permits `from -> to`. */
export function canTransitionTask(from: TaskState, to: TaskState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/** Completed, or failed with no retry scheduled. Terminal tasks never change again. */
export function isTerminal(task: Pick<Task, 'state' | 'nextAttemptAt'>): boolean {
  return task.state === 'completed' || (task.state === 'failed' && task.nextAttemptAt === null);
}

/** Backoff before retry number `retryCount + 1`: min(cap, base * 2^retryCount). */
export function computeBackoffMs(
  retryCount: number,
  policy: { backoffBaseMs: number; backoffCapMs: number },
): number {
  return Math.min(policy.backoffCapMs, policy.backoffBaseMs * 2 ** retryCount);
}

/** Whether a task failing now gets another attempt. `retryCount` counts retries already used. */
export function hasAttemptsLeft(task: Pick<Task, 'retryCount' | 'maxAttempts'>): boolean {
  return task.retryCount + 1 < task.maxAttempts;
}
