// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a TaskId where an AgentId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type AgentId = Brand<string, 'AgentId'>;
export type TaskId = Brand<string, 'TaskId'>;
export type RequestId = Brand<string, 'RequestId'>;

// ─── JSON Payloads ──────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ─── Caller Identity ────────────────────────────────────────────

/** Who issued a request. Resolved by the gateway before the engine is invoked. */
export interface CallerIdentity {
  id: string;
  name?: string;
  /** Channel the call arrived on (e.g. 'http', 'mcp', 'chat'). */
  channel: string;
}
