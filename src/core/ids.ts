/**
 * ID minting and parsing for the branded ID types.
 * The casts here are the only place raw strings become branded IDs.
 */
import { nanoid } from 'nanoid';
import type { AgentId, RequestId, TaskId } from './types.js';

export function newTaskId(): TaskId {
  return `task_${nanoid(12)}` as TaskId;
}

export function newRequestId(): RequestId {
  return `req_${nanoid(12)}` as RequestId;
}

/** Brand an agent id coming from configuration, storage, or a remote caller. */
export function toAgentId(raw: string): AgentId {
  return raw as AgentId;
}

/** Brand a task id coming from storage or a remote caller. */
export function toTaskId(raw: string): TaskId {
  return raw as TaskId;
}

/** Brand a request id coming from storage or a remote caller. */
export function toRequestId(raw: string): RequestId {
  return raw as RequestId;
}
