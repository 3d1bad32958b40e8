/**
 * Orchestrator: plans requests and aggregates the results of their tasks.
 *
 * One explicit handle owns the queue, the router and the dispatcher. The
 * dispatcher is driven by queue and registry events: a task admitted, a task
 * finished, an agent changing state. It never polls, and never keeps more
 * than `maxConcurrentTasks` executions in flight.
 */
import {
  AgentNotActiveError,
  AgentNotFoundError,
  ConductorError,
  NoAgentAvailableError,
  OrchestratorNotRunningError,
  TaskTimeoutError,
} from '@/core/errors.js';
import { newRequestId, toAgentId } from '@/core/ids.js';
import { err, settle } from '@/core/result.js';
import type { Result } from '@/core/result.js';
import type { AgentId, JsonValue, RequestId, TaskId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { AgentRegistry, AgentStateChange, AgentTaskInput, RegisteredAgent } from '@/agents/types.js';
import type { RecordStore } from '@/infrastructure/record-store/types.js';
import type { Planner } from '@/planning/planner.js';
import type { PlannedTask } from '@/planning/types.js';
import { createRouter } from '@/routing/router.js';
import type { Router } from '@/routing/router.js';
import { createTaskQueue } from '@/scheduling/task-queue.js';
import type { TaskQueue } from '@/scheduling/task-queue.js';
import type { DispatchedTask, Task, TaskError } from '@/scheduling/types.js';
import type {
  AgentStats,
  ExecuteAgentInput,
  OrchestratorSettings,
  OrchestratorState,
  OrchestratorStatus,
  ProcessRequestInput,
  RequestOutcome,
  RequestRecord,
  RequestSummary,
  StopOptions,
  TaskFailure,
  TaskOutput,
} from './types.js';

// ─── Interface ──────────────────────────────────────────────────

export interface Orchestrator {
  readonly state: OrchestratorState;
  /** Begin accepting requests. Checks the configured planner and router agents. */
  start(): Promise<void>;
  /** Stop accepting requests, then drain or abort in-flight work. */
  stop(options?: StopOptions): Promise<void>;
  /** Plan a goal and run it. Resolves once every task of the request is terminal. */
  processRequest(input: ProcessRequestInput): Promise<RequestOutcome>;
  /** Run one task on one agent (by id, or by type), bypassing the planner and router. */
  executeAgent(input: ExecuteAgentInput): Promise<RequestOutcome>;
  getStatus(): OrchestratorStatus;
  getRequest(id: RequestId): Promise<RequestRecord | null>;
  /** Active requests, then recently finished ones, newest first. */
  listRequests(): RequestRecord[];
  listTasks(requestId: RequestId): Promise<Task[]>;
  /** Drop terminal tasks older than `days` from memory. Returns how many were dropped. */
  cleanupFinishedTasks(days?: number): number;
  /** Tasks currently running, optionally only on `agentId`. */
  runningCount(agentId?: AgentId): number;
}

interface OrchestratorDeps {
  registry: AgentRegistry;
  planner: Planner;
  recordStore: RecordStore;
  logger: Logger;
  settings: OrchestratorSettings;
}

/** A live agent execution. Replaced on re-routing, dropped when it settles or is aborted. */
interface Execution {
  taskId: TaskId;
  agentId: AgentId;
  executionId: number;
  controller: AbortController;
  timer?: NodeJS.Timeout;
}

const DAY_MS = 24 * 60 * 60 * 1000;
/** Agent types that serve the engine itself and never receive planned work. */
const ENGINE_AGENT_TYPES = new Set(['planner', 'router']);

/** Capabilities of every registered agent that may receive planned work. */
export function plannableCapabilities(registry: AgentRegistry): string[] {
  const seen = new Set<string>();
  for (const agent of registry.list()) {
    if (ENGINE_AGENT_TYPES.has(agent.record.type)) continue;
    for (const capability of agent.record.capabilities) seen.add(capability);
  }
  return [...seen];
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function executionError(error: unknown, agentId: AgentId): TaskError {
  if (error instanceof ConductorError && error.kind !== 'Internal') {
    return { kind: error.kind, message: error.message, agentId };
  }
  return { kind: 'AgentExecutionFailed', message: describe(error), agentId };
}

function summarize(request: RequestRecord): RequestSummary {
  return {
    requestId: request.id,
    state: request.state,
    status: request.outcome?.status ?? null,
    taskCount: request.taskIds.length,
    createdAt: request.createdAt.toISOString(),
    finishedAt: request.finishedAt?.toISOString() ?? null,
    durationMs:
      request.finishedAt === null ? null : request.finishedAt.getTime() - request.createdAt.getTime(),
  };
}

// ─── Factory Function ───────────────────────────────────────────

/**
 * Create an orchestrator. It starts in `stopped`.
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { registry, planner, recordStore, settings, logger } = deps;

  const queue: TaskQueue = createTaskQueue({
    logger,
    retryPolicy: settings.retryPolicy,
    recordStore,
  });
  const router: Router = createRouter({
    registry,
    load: (agentId) => queue.runningCount(agentId),
  });

  let state: OrchestratorState = 'stopped';
  let draining = false;
  let stopping: Promise<void> | null = null;

  const inFlight = new Map<TaskId, Execution>();
  const activeRequests = new Map<RequestId, RequestRecord>();
  const recentRequests: RequestRecord[] = [];
  const agentStats = new Map<AgentId, Omit<AgentStats, 'running'>>();
  const performance = { totalProcessed: 0, succeeded: 0, totalDurationMs: 0 };

  let pumping = false;
  let pumpAgain = false;

  // ─── Dispatcher ─────────────────────────────────────────────

  function canDispatch(): boolean {
    return state === 'running' || draining;
  }

  function routeTask(task: Task): AgentId {
    return router.route(task).record.id;
  }

  async function pump(): Promise<void> {
    if (pumping) {
      pumpAgain = true;
      return;
    }
    pumping = true;
    try {
      do {
        pumpAgain = false;
        while (
          canDispatch() &&
          inFlight.size < settings.maxConcurrentTasks &&
          queue.readyCount() > 0
        ) {
          const dispatched = await queue.dequeueForExecution(routeTask);
          if (!dispatched) break;
          startExecution(dispatched);
        }
      } while (pumpAgain);
    } finally {
      pumping = false;
    }
  }

  function kick(): void {
    pump().catch((error: unknown) => {
      logger.error('Dispatcher failed', { component: 'orchestrator', error: describe(error) });
    });
  }

  function statsFor(agentId: AgentId): Omit<AgentStats, 'running'> {
    let stats = agentStats.get(agentId);
    if (!stats) {
      stats = { completed: 0, failed: 0, consecutiveFailures: 0 };
      agentStats.set(agentId, stats);
    }
    return stats;
  }

  function buildTaskInput(task: Task): AgentTaskInput {
    const dependencyOutputs: Record<string, JsonValue> = {};
    for (const depId of task.dependsOn) {
      const dependency = queue.get(depId);
      if (dependency && dependency.output !== null) {
        dependencyOutputs[dependency.key] = dependency.output;
      }
    }
    return {
      taskId: task.id,
      requestId: task.requestId,
      capability: task.capability,
      input: task.input,
      context: activeRequests.get(task.requestId)?.context ?? {},
      dependencyOutputs,
    };
  }

  /** Invoke the agent handler under the task deadline. */
  function invoke(agent: RegisteredAgent, task: Task, execution: Execution): Promise<JsonValue> {
    const deadlineMs = task.deadlineMs ?? settings.taskTimeoutMs;
    const context = {
      agent: agent.record,
      signal: execution.controller.signal,
      logger: logger.child({ taskId: task.id, agentId: agent.record.id }),
    };

    return new Promise<JsonValue>((resolve, reject) => {
      execution.timer = setTimeout(() => {
        execution.controller.abort();
        reject(new TaskTimeoutError(task.id, deadlineMs));
      }, deadlineMs);

      Promise.resolve()
        .then(() => agent.handler(buildTaskInput(task), context))
        .then(resolve, reject);
    });
  }

  function logRecordFailure(taskId: TaskId): (error: unknown) => void {
    return (error: unknown) => {
      logger.error('Failed to record execution', {
        component: 'orchestrator',
        taskId,
        error: describe(error),
      });
    };
  }

  /** True while `dispatched` is still the live execution of its task. */
  function isCurrent(dispatched: DispatchedTask): boolean {
    const current = queue.get(dispatched.task.id);
    return current?.state === 'running' && current.executionId === dispatched.executionId;
  }

  function startExecution(dispatched: DispatchedTask): void {
    const { task, agentId, executionId } = dispatched;

    // a stop or an abandon landed while the task was being dispatched
    if (!canDispatch() || !isCurrent(dispatched)) {
      logger.debug('Dropping dispatch that is no longer current', {
        component: 'orchestrator',
        taskId: task.id,
        agentId,
        executionId,
      });
      if (!canDispatch()) {
        queue
          .abandon(task.id, { kind: 'OrchestratorStopped', message: 'Orchestrator stopped' })
          .catch(logRecordFailure(task.id));
      }
      return;
    }

    const agent = registry.get(agentId);
    const execution: Execution = {
      taskId: task.id,
      agentId,
      executionId,
      controller: new AbortController(),
    };
    inFlight.set(task.id, execution);

    // the agent left `active` after routing picked it
    if (agent && agent.record.state !== 'active') {
      moveExecution(execution)
        .catch((error: unknown) => {
          logger.error('Re-routing failed', {
            component: 'orchestrator',
            taskId: task.id,
            agentId,
            error: describe(error),
          });
        })
        .finally(kick);
      return;
    }

    if (!agent) {
      finishExecution(execution, err(new AgentNotFoundError(agentId))).catch(
        logRecordFailure(task.id),
      );
      return;
    }

    logger.debug('Execution started', {
      component: 'orchestrator',
      taskId: task.id,
      requestId: task.requestId,
      agentId,
      executionId,
    });

    settle(invoke(agent, task, execution))
      .then((result) => finishExecution(execution, result))
      .catch(logRecordFailure(task.id));
  }

  async function finishExecution(
    execution: Execution,
    result: Result<JsonValue, Error>,
  ): Promise<void> {
    clearTimeout(execution.timer);
    // superseded by re-routing or abort
    if (inFlight.get(execution.taskId) !== execution) {
      logger.debug('Ignoring result of a superseded execution', {
        component: 'orchestrator',
        taskId: execution.taskId,
        agentId: execution.agentId,
        executionId: execution.executionId,
      });
      return;
    }
    inFlight.delete(execution.taskId);
    // a retry leaves the task non-terminal, so no queue event frees the slot
    kick();

    const stats = statsFor(execution.agentId);
    if (result.ok) {
      stats.completed += 1;
      stats.consecutiveFailures = 0;
      await queue.complete(execution.taskId, result.value, execution.executionId);
      return;
    }

    stats.failed += 1;
    stats.consecutiveFailures += 1;
    const error = executionError(result.error, execution.agentId);
    logger.warn('Agent execution failed', {
      component: 'orchestrator',
      taskId: execution.taskId,
      agentId: execution.agentId,
      errorKind: error.kind,
      error: error.message,
    });
    await queue.fail(execution.taskId, error, execution.executionId);

    const threshold = settings.agentFailureThreshold;
    const agent = registry.get(execution.agentId);
    if (threshold > 0 && stats.consecutiveFailures >= threshold && agent?.record.state === 'active') {
      await registry.markError(execution.agentId, error.message);
    }
  }

  /** Re-route one execution away from its agent, failing the task when no other agent fits. */
  async function moveExecution(execution: Execution): Promise<void> {
    execution.controller.abort();
    clearTimeout(execution.timer);
    inFlight.delete(execution.taskId);

    const task = queue.get(execution.taskId);
    if (!task) return;

    let target: RegisteredAgent;
    try {
      target = router.route(task, { exclude: [execution.agentId] });
    } catch (error) {
      if (!(error instanceof NoAgentAvailableError)) throw error;
      logger.warn('No agent to re-route to', {
        component: 'orchestrator',
        taskId: task.id,
        from: execution.agentId,
      });
      await queue.fail(
        task.id,
        { kind: 'NoAgentAvailable', message: error.message, agentId: execution.agentId },
        execution.executionId,
      );
      return;
    }

    const dispatched = await queue.reassign(task.id, target.record.id);
    startExecution(dispatched);
  }

  /** Move the running tasks of an agent that entered `error` to other agents. */
  async function rerouteFrom(agentId: AgentId): Promise<void> {
    const affected = [...inFlight.values()].filter((execution) => execution.agentId === agentId);
    for (const execution of affected) {
      await moveExecution(execution);
    }
  }

  function onAgentStateChange(change: AgentStateChange): void {
    if (change.to === 'error') {
      rerouteFrom(change.agentId)
        .catch((error: unknown) => {
          logger.error('Re-routing failed', {
            component: 'orchestrator',
            agentId: change.agentId,
            error: describe(error),
          });
        })
        .finally(kick);
      return;
    }
    kick();
  }

  queue.on('admitted', kick);
  queue.on('terminal', kick);
  registry.onStateChange(onAgentStateChange);

  // ─── Requests ───────────────────────────────────────────────

  async function finishRequest(request: RequestRecord, outcome: RequestOutcome): Promise<RequestOutcome> {
    request.outcome = outcome;
    request.state = outcome.status === 'success' ? 'completed' : 'failed';
    request.finishedAt = new Date();
    await recordStore.persistRequest(request);

    activeRequests.delete(request.id);
    recentRequests.unshift(request);
    recentRequests.splice(settings.recentRequestLimit);

    performance.totalProcessed += 1;
    performance.totalDurationMs += request.finishedAt.getTime() - request.createdAt.getTime();
    if (outcome.status === 'success') performance.succeeded += 1;

    logger.info('Request finished', {
      component: 'orchestrator',
      requestId: request.id,
      status: outcome.status,
      tasks: request.taskIds.length,
      unmatched: request.unmatched.length,
    });
    return outcome;
  }

  async function openRequest(input: ProcessRequestInput): Promise<RequestRecord> {
    const request: RequestRecord = {
      id: newRequestId(),
      goal: input.goal,
      context: input.context ?? {},
      constraints: input.constraints ?? {},
      caller: input.caller,
      taskIds: [],
      unmatched: [],
      state: 'in_progress',
      outcome: null,
      createdAt: new Date(),
      finishedAt: null,
    };
    activeRequests.set(request.id, request);
    await recordStore.persistRequest(request);
    logger.info('Request accepted', {
      component: 'orchestrator',
      requestId: request.id,
      caller: input.caller?.id,
      channel: input.caller?.channel,
    });
    return request;
  }

  async function runPlan(
    request: RequestRecord,
    planned: PlannedTask[],
    pinnedAgentId?: AgentId,
  ): Promise<RequestOutcome> {
    const idsByKey = new Map<string, TaskId>();
    const tasks: Task[] = [];

    for (const step of planned) {
      const task = await queue.create({
        requestId: request.id,
        key: step.key,
        capability: step.capability,
        input: step.input,
        dependsOn: step.dependsOn.flatMap((key) => idsByKey.get(key) ?? []),
        deadlineMs: step.deadlineMs,
        pinnedAgentId,
        maxAttempts: request.constraints.maxAttempts,
      });
      idsByKey.set(step.key, task.id);
      tasks.push(task);
    }

    request.taskIds = tasks.map((task) => task.id);
    await recordStore.persistRequest(request);

    const admissions = tasks.map((task) =>
      settle(task.dependsOn.length === 0 ? queue.enqueue(task.id) : queue.enqueueWhenReady(task.id)),
    );

    // an abort landed while the plan was being queued
    if (!canDispatch()) {
      await Promise.all(
        tasks.map((task) =>
          queue.abandon(task.id, { kind: 'OrchestratorStopped', message: 'Orchestrator stopped' }),
        ),
      );
    }

    const finished = await queue.waitForTerminal(request.taskIds);
    for (const admission of await Promise.all(admissions)) {
      if (!admission.ok) {
        logger.error('Task admission failed', {
          component: 'orchestrator',
          requestId: request.id,
          error: admission.error.message,
        });
      }
    }

    const outputs: TaskOutput[] = [];
    const failures: TaskFailure[] = [];
    for (const task of finished) {
      if (task.state === 'completed' && task.output !== null) {
        outputs.push({
          taskId: task.id,
          key: task.key,
          capability: task.capability,
          agentId: task.assignedAgentId,
          output: task.output,
        });
      } else if (task.error) {
        failures.push({
          taskId: task.id,
          key: task.key,
          capability: task.capability,
          attempts: task.retryCount + 1,
          error: task.error,
        });
      }
    }

    const outcome: RequestOutcome =
      failures.length === 0
        ? { status: 'success', requestId: request.id, outputs, unmatched: request.unmatched }
        : {
            status: 'partial_failure',
            requestId: request.id,
            outputs,
            failures,
            unmatched: request.unmatched,
          };
    return finishRequest(request, outcome);
  }

  function resolveAgent(agentRef: string): RegisteredAgent {
    const agent = registry.get(toAgentId(agentRef)) ?? registry.findByType(agentRef);
    if (!agent) {
      throw new AgentNotFoundError(agentRef);
    }
    if (agent.record.state !== 'active') {
      throw new AgentNotActiveError(agent.record.id, agent.record.state);
    }
    return agent;
  }

  async function abortAll(reason: string): Promise<void> {
    for (const execution of inFlight.values()) {
      execution.controller.abort();
      clearTimeout(execution.timer);
    }
    inFlight.clear();

    const open = queue.list().filter((task) => !queue.isTerminal(task.id));
    await Promise.all(
      open.map((task) => queue.abandon(task.id, { kind: 'OrchestratorStopped', message: reason })),
    );
    logger.warn('In-flight work aborted', { component: 'orchestrator', aborted: open.length, reason });
  }

  async function drain(timeoutMs: number | undefined): Promise<void> {
    draining = true;
    let timer: NodeJS.Timeout | undefined;
    let drained: boolean;
    try {
      const idle = queue.waitForIdle().then(() => true);
      drained =
        timeoutMs === undefined
          ? await idle
          : await Promise.race([
              idle,
              new Promise<false>((resolve) => {
                timer = setTimeout(() => {
                  resolve(false);
                }, timeoutMs);
              }),
            ]);
    } finally {
      clearTimeout(timer);
      draining = false;
    }

    if (!drained) {
      logger.warn('Drain timed out', { component: 'orchestrator', drainTimeoutMs: timeoutMs });
      await abortAll(`Orchestrator stopped (drain timed out after ${timeoutMs ?? 0}ms)`);
    }
  }

  // ─── Orchestrator ───────────────────────────────────────────

  const orchestrator: Orchestrator = {
    get state(): OrchestratorState {
      return state;
    },

    async start(): Promise<void> {
      if (stopping) await stopping;
      if (state === 'running') return;

      for (const agentId of [settings.plannerAgentId, settings.routerAgentId]) {
        if (agentId === undefined) continue;
        const agent = registry.get(agentId);
        if (!agent) throw new AgentNotFoundError(agentId);
        if (agent.record.state !== 'active') {
          throw new AgentNotActiveError(agentId, agent.record.state);
        }
      }

      state = 'running';
      logger.info('Orchestrator started', {
        component: 'orchestrator',
        maxConcurrentTasks: settings.maxConcurrentTasks,
      });
      kick();
    },

    stop(options?: StopOptions): Promise<void> {
      if (stopping) return stopping;
      if (state === 'stopped') return Promise.resolve();

      state = 'stopped';
      const policy = options?.policy ?? settings.stopPolicy;
      logger.info('Orchestrator stopping', { component: 'orchestrator', policy, inFlight: inFlight.size });

      const run = async (): Promise<void> => {
        if (policy === 'drain') {
          await drain(options?.drainTimeoutMs ?? settings.drainTimeoutMs);
        } else {
          await abortAll('Orchestrator stopped');
        }
        logger.info('Orchestrator stopped', { component: 'orchestrator', policy });
      };

      stopping = run().finally(() => {
        stopping = null;
      });
      return stopping;
    },

    async processRequest(input: ProcessRequestInput): Promise<RequestOutcome> {
      if (state !== 'running') {
        throw new OrchestratorNotRunningError();
      }

      const request = await openRequest(input);
      const plan = planner.decompose(
        request.goal,
        request.context,
        request.constraints,
        plannableCapabilities(registry),
      );
      request.unmatched = plan.unmatched;

      if (plan.kind === 'unroutable') {
        logger.info('Request unroutable', {
          component: 'orchestrator',
          requestId: request.id,
          reason: plan.reason,
        });
        return finishRequest(request, {
          status: 'unroutable',
          requestId: request.id,
          reason: plan.reason,
          unmatched: plan.unmatched,
        });
      }

      return runPlan(request, plan.tasks);
    },

    async executeAgent(input: ExecuteAgentInput): Promise<RequestOutcome> {
      if (state !== 'running') {
        throw new OrchestratorNotRunningError();
      }
      const agent = resolveAgent(input.agentRef);
      const capability = input.capability ?? agent.record.capabilities[0] ?? agent.record.type;

      const request = await openRequest({
        goal: { steps: [{ capability, input: input.taskData }] },
        context: { agentId: agent.record.id },
        caller: input.caller,
      });
      return runPlan(
        request,
        [{ key: capability, capability, input: input.taskData, dependsOn: [] }],
        agent.record.id,
      );
    },

    getStatus(): OrchestratorStatus {
      const { totalProcessed, succeeded, totalDurationMs } = performance;
      return {
        state,
        draining,
        plannerAgentId: settings.plannerAgentId ?? null,
        routerAgentId: settings.routerAgentId ?? null,
        maxConcurrentTasks: settings.maxConcurrentTasks,
        agents: registry.list().map(({ record }) => ({
          id: record.id,
          name: record.name,
          type: record.type,
          description: record.description,
          state: record.state,
          capabilities: [...record.capabilities],
          priority: record.priority,
          errorMessage: record.errorMessage,
          stats: {
            running: queue.runningCount(record.id),
            ...(agentStats.get(record.id) ?? { completed: 0, failed: 0, consecutiveFailures: 0 }),
          },
        })),
        queue: queue.depth(),
        activeRequests: activeRequests.size,
        recentRequests: recentRequests.map(summarize),
        performance: {
          totalProcessed,
          succeeded,
          successRate: totalProcessed === 0 ? 0 : succeeded / totalProcessed,
          averageProcessingMs: totalProcessed === 0 ? 0 : totalDurationMs / totalProcessed,
        },
      };
    },

    async getRequest(id: RequestId): Promise<RequestRecord | null> {
      const known = activeRequests.get(id) ?? recentRequests.find((request) => request.id === id);
      return known ?? recordStore.getRequest(id);
    },

    listRequests(): RequestRecord[] {
      const active = [...activeRequests.values()].reverse();
      return [...active, ...recentRequests];
    },

    async listTasks(requestId: RequestId): Promise<Task[]> {
      const live = queue.list({ requestId });
      return live.length > 0 ? live : recordStore.listTasks(requestId);
    },

    cleanupFinishedTasks(days = 7): number {
      return queue.purgeFinished(days * DAY_MS);
    },

    runningCount(agentId?: AgentId): number {
      return queue.runningCount(agentId);
    },
  };

  return orchestrator;
}
