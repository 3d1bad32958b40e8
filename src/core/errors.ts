/** Error kinds shared by thrown errors and failed-task records. */
export const ERROR_KINDS = [
  'DuplicateIdentifier',
  'InvalidTransition',
  'NoAgentAvailable',
  'DependencyUnmet',
  'DependencyFailed',
  'AgentNotFound',
  'AgentNotActive',
  'OrchestratorNotRunning',
  'OrchestratorStopped',
  'TaskTimeout',
  'AgentExecutionFailed',
  'Unroutable',
  'Validation',
  'Internal',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/**
 * Base error class for all Conductor errors.
 * Extends Error with a machine-readable code, the engine error kind,
 * an HTTP status, and structured context.
 */
export class ConductorError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    kind?: ErrorKind;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'ConductorError';
    this.code = params.code;
    this.kind = params.kind ?? 'Internal';
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when an agent id is re-registered with a different capability set. */
export class DuplicateIdentifierError extends ConductorError {
  constructor(agentId: string, existing: readonly string[], incoming: readonly string[]) {
    super({
      message: `Agent "${agentId}" is already registered with capabilities [${existing.join(', ')}]`,
      code: 'DUPLICATE_IDENTIFIER',
      kind: 'DuplicateIdentifier',
      statusCode: 409,
      context: { agentId, existing: [...existing], incoming: [...incoming] },
    });
    this.name = 'DuplicateIdentifierError';
  }
}

/** Thrown when an agent or task state change is not allowed by its state graph. */
export class InvalidTransitionError extends ConductorError {
  constructor(entity: 'agent' | 'task', id: string, from: string, to: string) {
    super({
      message: `Invalid ${entity} transition for "${id}": ${from} -> ${to}`,
      code: 'INVALID_TRANSITION',
      kind: 'InvalidTransition',
      statusCode: 409,
      context: { entity, id, from, to },
    });
    this.name = 'InvalidTransitionError';
  }
}

/** Thrown when no active agent can take a task. */
export class NoAgentAvailableError extends ConductorError {
  constructor(capability: string, excluded: readonly string[] = []) {
    super({
      message: `No active agent available for capability "${capability}"`,
      code: 'NO_AGENT_AVAILABLE',
      kind: 'NoAgentAvailable',
      statusCode: 503,
      context: { capability, excluded: [...excluded] },
    });
    this.name = 'NoAgentAvailableError';
  }
}

/** Thrown when a task is admitted before its dependencies completed. */
export class DependencyUnmetError extends ConductorError {
  constructor(taskId: string, unmet: readonly string[]) {
    super({
      message: `Task "${taskId}" has unmet dependencies: ${unmet.join(', ')}`,
      code: 'DEPENDENCY_UNMET',
      kind: 'DependencyUnmet',
      statusCode: 409,
      context: { taskId, unmet: [...unmet] },
    });
    this.name = 'DependencyUnmetError';
  }
}

/** Thrown when an agent id (or type) does not resolve to a registered agent. */
export class AgentNotFoundError extends ConductorError {
  constructor(agentRef: string) {
    super({
      message: `Agent "${agentRef}" not found`,
      code: 'AGENT_NOT_FOUND',
      kind: 'AgentNotFound',
      statusCode: 404,
      context: { agentRef },
    });
    this.name = 'AgentNotFoundError';
  }
}

/** Thrown when a direct invocation targets an agent that is not active. */
export class AgentNotActiveError extends ConductorError {
  constructor(agentId: string, state: string) {
    super({
      message: `Agent "${agentId}" is not active (state: ${state})`,
      code: 'AGENT_NOT_ACTIVE',
      kind: 'AgentNotActive',
      statusCode: 409,
      context: { agentId, state },
    });
    this.name = 'AgentNotActiveError';
  }
}

/** Thrown when a request arrives while the orchestrator is stopped. */
export class OrchestratorNotRunningError extends ConductorError {
  constructor() {
    super({
      message: 'Orchestrator is not running',
      code: 'ORCHESTRATOR_NOT_RUNNING',
      kind: 'OrchestratorNotRunning',
      statusCode: 503,
    });
    this.name = 'OrchestratorNotRunningError';
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends ConductorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      kind: 'Validation',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when a task id is unknown to the queue (never created, or purged). */
export class TaskNotFoundError extends ConductorError {
  constructor(taskId: string) {
    super({
      message: `Task "${taskId}" not found`,
      code: 'TASK_NOT_FOUND',
      kind: 'Validation',
      statusCode: 404,
      context: { taskId },
    });
    this.name = 'TaskNotFoundError';
  }
}

/** Thrown when a request id is unknown. */
export class RequestNotFoundError extends ConductorError {
  constructor(requestId: string) {
    super({
      message: `Request "${requestId}" not found`,
      code: 'REQUEST_NOT_FOUND',
      kind: 'Validation',
      statusCode: 404,
      context: { requestId },
    });
    this.name = 'RequestNotFoundError';
  }
}

/** Raised inside the engine when a running task outlives its deadline. */
export class TaskTimeoutError extends ConductorError {
  constructor(taskId: string, deadlineMs: number) {
    super({
      message: `Task "${taskId}" exceeded its ${deadlineMs}ms deadline`,
      code: 'TASK_TIMEOUT',
      kind: 'TaskTimeout',
      statusCode: 504,
      context: { taskId, deadlineMs },
    });
    this.name = 'TaskTimeoutError';
  }
}
