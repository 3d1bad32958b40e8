// Core module: ids, results, errors, JSON values and per-key locking
export type {
  AgentId,
  CallerIdentity,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  RequestId,
  TaskId,
} from './types.js';

export type { Result } from './result.js';
export { ok, err, settle } from './result.js';

export { newRequestId, newTaskId, toAgentId, toRequestId, toTaskId } from './ids.js';
export { jsonObjectSchema, jsonValueSchema, parseJsonColumn } from './json.js';
export { createKeyedLock } from './keyed-lock.js';
export type { KeyedLock } from './keyed-lock.js';

export {
  ERROR_KINDS,
  ConductorError,
  DuplicateIdentifierError,
  InvalidTransitionError,
  NoAgentAvailableError,
  DependencyUnmetError,
  AgentNotFoundError,
  AgentNotActiveError,
  OrchestratorNotRunningError,
  ValidationError,
  TaskNotFoundError,
  RequestNotFoundError,
  TaskTimeoutError,
} from './errors.js';
export type { ErrorKind } from './errors.js';
