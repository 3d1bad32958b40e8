// Scheduling module: task state machine and the task queue
export type {
  DispatchedTask,
  QueueDepth,
  RetryPolicy,
  RouteFn,
  Task,
  TaskCreateInput,
  TaskError,
  TaskState,
} from './types.js';

export { canTransitionTask, computeBackoffMs, hasAttemptsLeft, isTerminal } from './task-state.js';

export { createTaskQueue } from './task-queue.js';
export type { TaskListFilter, TaskQueue, TaskQueueEvents } from './task-queue.js';
