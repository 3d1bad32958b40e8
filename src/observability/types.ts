// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  requestId?: string;
  taskId?: string;
  agentId?: string;
  component: string;
  [key: string]: unknown;
}
