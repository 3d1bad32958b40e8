/**
 * Task Queue: owns every task and drives it through its state machine.
 *
 * Each transition runs inside a per-task lock: the next task value is built
 * and validated, persisted through the Record Store, and only then committed
 * in memory and announced. Readers therefore never observe a state that was
 * not durably recorded. Waiting (dependencies, request aggregation, idle)
 * is driven by the `terminal` event, never by polling.
 */
import { EventEmitter } from 'events';
import {
  ConductorError,
  DependencyUnmetError,
  InvalidTransitionError,
  TaskNotFoundError,
} from '@/core/errors.js';
import { newTaskId } from '@/core/ids.js';
import { createKeyedLock } from '@/core/keyed-lock.js';
import type { AgentId, JsonValue, RequestId, TaskId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { RecordStore } from '@/infrastructure/record-store/types.js';
import { canTransitionTask, computeBackoffMs, hasAttemptsLeft, isTerminal } from './task-state.js';
import type {
  DispatchedTask,
  QueueDepth,
  RetryPolicy,
  RouteFn,
  Task,
  TaskCreateInput,
  TaskError,
  TaskState,
} from './types.js';

// ─── Interface ──────────────────────────────────────────────────

export interface TaskListFilter {
  requestId?: RequestId;
  state?: TaskState;
  agentId?: AgentId;
}

export interface TaskQueueEvents {
  /** A pending task became eligible for dispatch. */
  admitted: [task: Task];
  /** A task reached a terminal state. */
  terminal: [task: Task];
}

export interface TaskQueue {
  /** Record a task in `pending`. It is not dispatched until admitted. */
  create(input: TaskCreateInput): Promise<Task>;
  /** Admit a pending task. Throws DependencyUnmetError unless every dependency is completed. */
  enqueue(taskId: TaskId): Promise<Task>;
  /** Admit once every dependency completes; fail with DependencyFailed if one fails for good. */
  enqueueWhenReady(taskId: TaskId): Promise<Task>;
  /** Take the earliest admitted task, route it, and start it. Null when nothing can start. */
  dequeueForExecution(route: RouteFn): Promise<DispatchedTask | null>;
  complete(taskId: TaskId, output: JsonValue, executionId?: number): Promise<Task>;
  /** Fail a running task; schedules a retry while attempts remain. */
  fail(taskId: TaskId, error: TaskError, executionId?: number): Promise<Task>;
  /** Move a running task to another agent under a new execution id. */
  reassign(taskId: TaskId, agentId: AgentId): Promise<DispatchedTask>;
  /** Fail a non-terminal task for good, cancelling any scheduled retry. No-op on terminal tasks. */
  abandon(taskId: TaskId, error: TaskError): Promise<Task>;
  get(taskId: TaskId): Task | undefined;
  list(filter?: TaskListFilter): Task[];
  depth(): QueueDepth;
  /** Running tasks, optionally only those assigned to `agentId`. */
  runningCount(agentId?: AgentId): number;
  /** Admitted tasks waiting for dispatch. */
  readyCount(): number;
  isTerminal(taskId: TaskId): boolean;
  waitForTerminal(taskIds: readonly TaskId[]): Promise<Task[]>;
  /** Resolves once no task is outside a terminal state. */
  waitForIdle(): Promise<void>;
  /** Drop terminal tasks finished more than `olderThanMs` ago. Returns how many were dropped. */
  purgeFinished(olderThanMs: number): number;
  on<E extends keyof TaskQueueEvents>(
    event: E,
    listener: (...args: TaskQueueEvents[E]) => void,
  ): () => void;
  /** Cancel every scheduled retry timer. */
  dispose(): void;
}

// ─── Dependencies ───────────────────────────────────────────────

interface TaskQueueDeps {
  logger: Logger;
  retryPolicy: RetryPolicy;
  recordStore?: Pick<RecordStore, 'persistTask'>;
}

function toTaskError(error: unknown, agentId?: AgentId): TaskError {
  if (error instanceof ConductorError) {
    return { kind: error.kind, message: error.message, agentId };
  }
  return {
    kind: 'Internal',
    message: error instanceof Error ? error.message : String(error),
    agentId,
  };
}

// ─── Factory Function ───────────────────────────────────────────

/**
 * Create a task queue.
 */
export function createTaskQueue(deps: TaskQueueDeps): TaskQueue {
  const { logger, retryPolicy, recordStore } = deps;
  const tasks = new Map<TaskId, Task>();
  /** Admitted pending tasks, in admission order. */
  const ready: TaskId[] = [];
  const retryTimers = new Map<TaskId, NodeJS.Timeout>();
  const lock = createKeyedLock();
  const emitter = new EventEmitter();
  emitter.setMaxListeners(0);

  function mustGet(taskId: TaskId): Task {
    const task = tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  function assertTransition(task: Task, to: TaskState): void {
    if (!canTransitionTask(task.state, to)) {
      throw new InvalidTransitionError('task', task.id, task.state, to);
    }
  }

  function assertExecution(task: Task, executionId: number | undefined): void {
    if (executionId !== undefined && executionId !== task.executionId) {
      throw new InvalidTransitionError(
        'task',
        task.id,
        `${task.state}#${executionId}`,
        `stale execution (current #${task.executionId})`,
      );
    }
  }

  function removeFromReady(taskId: TaskId): void {
    const index = ready.indexOf(taskId);
    if (index >= 0) {
      ready.splice(index, 1);
    }
  }

  async function commit(next: Task): Promise<Task> {
    if (recordStore) {
      await recordStore.persistTask(next);
    }
    tasks.set(next.id, next);
    return next;
  }

  function announce(task: Task): void {
    if (isTerminal(task)) {
      emitter.emit('terminal', task);
    } else if (task.state === 'pending' && task.enqueuedAt !== null) {
      emitter.emit('admitted', task);
    }
  }

  /** Build the failed task for `current`, scheduling a retry when attempts remain. */
  function failedFrom(current: Task, error: TaskError): Task {
    const now = new Date();
    if (hasAttemptsLeft(current)) {
      const delay = computeBackoffMs(current.retryCount, retryPolicy);
      return {
        ...current,
        state: 'failed',
        output: null,
        error,
        nextAttemptAt: new Date(now.getTime() + delay),
        finishedAt: now,
      };
    }
    return { ...current, state: 'failed', output: null, error, nextAttemptAt: null, finishedAt: now };
  }

  function scheduleRetry(task: Task): void {
    if (task.nextAttemptAt === null) return;
    const delay = Math.max(0, task.nextAttemptAt.getTime() - Date.now());

    logger.warn('Task failed, retry scheduled', {
      component: 'task-queue',
      taskId: task.id,
      requestId: task.requestId,
      errorKind: task.error?.kind,
      attempt: task.retryCount + 1,
      maxAttempts: task.maxAttempts,
      delayMs: delay,
    });

    const timer = setTimeout(() => {
      retryTimers.delete(task.id);
      readmit(task.id).catch((error: unknown) => {
        logger.error('Failed to re-admit task for retry', {
          component: 'task-queue',
          taskId: task.id,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, delay);
    retryTimers.set(task.id, timer);
  }

  function afterFailure(task: Task): void {
    if (task.nextAttemptAt !== null) {
      scheduleRetry(task);
      return;
    }
    logger.info('Task failed', {
      component: 'task-queue',
      taskId: task.id,
      requestId: task.requestId,
      agentId: task.error?.agentId,
      errorKind: task.error?.kind,
      attempts: task.retryCount + 1,
    });
  }

  /** `failed -> pending` once a scheduled retry is due. */
  function readmit(taskId: TaskId): Promise<Task | undefined> {
    return lock.run(taskId, async () => {
      const current = tasks.get(taskId);
      // abandoned or purged while the timer was pending
      if (!current || current.state !== 'failed' || current.nextAttemptAt === null) {
        return current;
      }
      assertTransition(current, 'pending');
      const next = await commit({
        ...current,
        state: 'pending',
        retryCount: current.retryCount + 1,
        assignedAgentId: current.pinnedAgentId ?? null,
        error: null,
        nextAttemptAt: null,
        enqueuedAt: new Date(),
        startedAt: null,
        finishedAt: null,
      });
      ready.push(taskId);
      logger.debug('Task re-admitted', {
        component: 'task-queue',
        taskId,
        requestId: next.requestId,
        retryCount: next.retryCount,
      });
      announce(next);
      return next;
    });
  }

  /** Run one claimed task through routing. Null when it was no longer pending or routing failed. */
  function dispatch(taskId: TaskId, route: RouteFn): Promise<DispatchedTask | null> {
    return lock.run(taskId, async () => {
      const current = tasks.get(taskId);
      if (!current || current.state !== 'pending') {
        return null;
      }
      assertTransition(current, 'routed');
      const routed = await commit({ ...current, state: 'routed' });

      let agentId: AgentId;
      try {
        agentId = route(routed);
      } catch (error) {
        const failed = await commit(failedFrom(routed, toTaskError(error)));
        afterFailure(failed);
        announce(failed);
        return null;
      }

      assertTransition(routed, 'running');
      const running = await commit({
        ...routed,
        state: 'running',
        assignedAgentId: agentId,
        executionId: routed.executionId + 1,
        startedAt: new Date(),
      });

      logger.debug('Task dispatched', {
        component: 'task-queue',
        taskId,
        requestId: running.requestId,
        agentId,
        executionId: running.executionId,
      });
      return { task: running, agentId, executionId: running.executionId };
    });
  }

  const queue: TaskQueue = {
    create(input: TaskCreateInput): Promise<Task> {
      const id = newTaskId();
      return lock.run(id, async () => {
        const missing = (input.dependsOn ?? []).filter((dep) => !tasks.has(dep));
        if (missing.length > 0) {
          throw new DependencyUnmetError(id, missing);
        }

        const task = await commit({
          id,
          requestId: input.requestId,
          key: input.key,
          capability: input.capability,
          pinnedAgentId: input.pinnedAgentId,
          assignedAgentId: input.pinnedAgentId ?? null,
          input: input.input,
          output: null,
          state: 'pending',
          retryCount: 0,
          maxAttempts: input.maxAttempts ?? retryPolicy.maxAttempts,
          dependsOn: [...(input.dependsOn ?? [])],
          deadlineMs: input.deadlineMs,
          error: null,
          nextAttemptAt: null,
          executionId: 0,
          createdAt: new Date(),
          enqueuedAt: null,
          startedAt: null,
          finishedAt: null,
        });

        logger.debug('Task created', {
          component: 'task-queue',
          taskId: id,
          requestId: task.requestId,
          capability: task.capability,
          dependsOn: task.dependsOn,
        });
        return task;
      });
    },

    enqueue(taskId: TaskId): Promise<Task> {
      return lock.run(taskId, async () => {
        const current = mustGet(taskId);
        if (current.state !== 'pending' || current.enqueuedAt !== null) {
          throw new InvalidTransitionError('task', taskId, current.state, 'admitted');
        }
        const unmet = current.dependsOn.filter((dep) => tasks.get(dep)?.state !== 'completed');
        if (unmet.length > 0) {
          throw new DependencyUnmetError(taskId, unmet);
        }

        const next = await commit({ ...current, enqueuedAt: new Date() });
        ready.push(taskId);
        announce(next);
        return next;
      });
    },

    enqueueWhenReady(taskId: TaskId): Promise<Task> {
      return new Promise<Task>((resolve, reject) => {
        let settled = false;

        const evaluate = (): void => {
          if (settled) return;
          const task = tasks.get(taskId);
          if (!task) {
            settled = true;
            unsubscribe();
            reject(new TaskNotFoundError(taskId));
            return;
          }
          // already admitted, or failed while waiting
          if (task.state !== 'pending' || task.enqueuedAt !== null) {
            settled = true;
            unsubscribe();
            resolve(task);
            return;
          }

          const dependencies = task.dependsOn.map((dep) => tasks.get(dep));
          const failedDep = task.dependsOn.find((dep, i) => {
            const dependency = dependencies[i];
            return dependency === undefined || (dependency.state === 'failed' && isTerminal(dependency));
          });

          if (failedDep !== undefined) {
            settled = true;
            unsubscribe();
            queue
              .abandon(taskId, {
                kind: 'DependencyFailed',
                message: `Dependency "${failedDep}" failed`,
              })
              .then(resolve, reject);
            return;
          }

          if (dependencies.every((dependency) => dependency?.state === 'completed')) {
            settled = true;
            unsubscribe();
            queue.enqueue(taskId).then(resolve, reject);
          }
        };

        const unsubscribe = queue.on('terminal', evaluate);
        evaluate();
      });
    },

    async dequeueForExecution(route: RouteFn): Promise<DispatchedTask | null> {
      // Claiming is synchronous, so two dispatchers never take the same task.
      let taskId = ready.shift();
      while (taskId !== undefined) {
        const dispatched = await dispatch(taskId, route);
        if (dispatched) {
          return dispatched;
        }
        taskId = ready.shift();
      }
      return null;
    },

    complete(taskId: TaskId, output: JsonValue, executionId?: number): Promise<Task> {
      return lock.run(taskId, async () => {
        const current = mustGet(taskId);
        assertTransition(current, 'completed');
        assertExecution(current, executionId);

        const next = await commit({
          ...current,
          state: 'completed',
          output,
          error: null,
          finishedAt: new Date(),
        });
        logger.info('Task completed', {
          component: 'task-queue',
          taskId,
          requestId: next.requestId,
          agentId: next.assignedAgentId ?? undefined,
          attempts: next.retryCount + 1,
        });
        announce(next);
        return next;
      });
    },

    fail(taskId: TaskId, error: TaskError, executionId?: number): Promise<Task> {
      return lock.run(taskId, async () => {
        const current = mustGet(taskId);
        if (current.state !== 'running') {
          throw new InvalidTransitionError('task', taskId, current.state, 'failed');
        }
        assertExecution(current, executionId);

        const next = await commit(failedFrom(current, error));
        afterFailure(next);
        announce(next);
        return next;
      });
    },

    reassign(taskId: TaskId, agentId: AgentId): Promise<DispatchedTask> {
      return lock.run(taskId, async () => {
        const current = mustGet(taskId);
        if (current.state !== 'running') {
          throw new InvalidTransitionError('task', taskId, current.state, 'running');
        }
        const next = await commit({
          ...current,
          assignedAgentId: agentId,
          executionId: current.executionId + 1,
          startedAt: new Date(),
        });
        logger.info('Task reassigned', {
          component: 'task-queue',
          taskId,
          requestId: next.requestId,
          from: current.assignedAgentId ?? undefined,
          agentId,
        });
        return { task: next, agentId, executionId: next.executionId };
      });
    },

    abandon(taskId: TaskId, error: TaskError): Promise<Task> {
      return lock.run(taskId, async () => {
        const current = mustGet(taskId);
        if (isTerminal(current)) {
          return current;
        }

        const timer = retryTimers.get(taskId);
        if (timer) {
          clearTimeout(timer);
          retryTimers.delete(taskId);
        }
        removeFromReady(taskId);

        const next = await commit({
          ...current,
          state: 'failed',
          output: null,
          error,
          nextAttemptAt: null,
          // invalidate any live execution
          executionId: current.state === 'running' ? current.executionId + 1 : current.executionId,
          finishedAt: new Date(),
        });
        logger.info('Task abandoned', {
          component: 'task-queue',
          taskId,
          requestId: next.requestId,
          from: current.state,
          errorKind: error.kind,
        });
        announce(next);
        return next;
      });
    },

    get(taskId: TaskId): Task | undefined {
      return tasks.get(taskId);
    },

    list(filter?: TaskListFilter): Task[] {
      return [...tasks.values()].filter(
        (task) =>
          (filter?.requestId === undefined || task.requestId === filter.requestId) &&
          (filter?.state === undefined || task.state === filter.state) &&
          (filter?.agentId === undefined || task.assignedAgentId === filter.agentId),
      );
    },

    depth(): QueueDepth {
      const depth: QueueDepth = {
        pending: 0,
        routed: 0,
        running: 0,
        completed: 0,
        failed: 0,
        retrying: 0,
        total: tasks.size,
      };
      for (const task of tasks.values()) {
        depth[task.state] += 1;
        if (task.state === 'failed' && task.nextAttemptAt !== null) {
          depth.retrying += 1;
        }
      }
      return depth;
    },

    runningCount(agentId?: AgentId): number {
      let count = 0;
      for (const task of tasks.values()) {
        if (task.state === 'running' && (agentId === undefined || task.assignedAgentId === agentId)) {
          count += 1;
        }
      }
      return count;
    },

    readyCount(): number {
      return ready.length;
    },

    isTerminal(taskId: TaskId): boolean {
      return isTerminal(mustGet(taskId));
    },

    waitForTerminal(taskIds: readonly TaskId[]): Promise<Task[]> {
      return new Promise<Task[]>((resolve, reject) => {
        const check = (): boolean => {
          const current: Task[] = [];
          for (const taskId of taskIds) {
            const task = tasks.get(taskId);
            if (!task) {
              unsubscribe();
              reject(new TaskNotFoundError(taskId));
              return true;
            }
            if (!isTerminal(task)) return false;
            current.push(task);
          }
          unsubscribe();
          resolve(current);
          return true;
        };

        const unsubscribe = queue.on('terminal', () => {
          check();
        });
        check();
      });
    },

    waitForIdle(): Promise<void> {
      return new Promise<void>((resolve) => {
        const check = (): void => {
          for (const task of tasks.values()) {
            if (!isTerminal(task)) return;
          }
          unsubscribe();
          resolve();
        };
        const unsubscribe = queue.on('terminal', check);
        check();
      });
    },

    purgeFinished(olderThanMs: number): number {
      const cutoff = Date.now() - olderThanMs;
      let purged = 0;
      for (const task of [...tasks.values()]) {
        if (isTerminal(task) && task.finishedAt !== null && task.finishedAt.getTime() < cutoff) {
          tasks.delete(task.id);
          purged += 1;
        }
      }
      if (purged > 0) {
        logger.info('Finished tasks purged', { component: 'task-queue', purged, olderThanMs });
      }
      return purged;
    },

    on<E extends keyof TaskQueueEvents>(
      event: E,
      listener: (...args: TaskQueueEvents[E]) => void,
    ): () => void {
      emitter.on(event, listener);
      return () => {
        emitter.off(event, listener);
      };
    },

    dispose(): void {
      for (const timer of retryTimers.values()) {
        clearTimeout(timer);
      }
      retryTimers.clear();
    },
  };

  return queue;
}
