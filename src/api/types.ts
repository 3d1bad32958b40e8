import type { AgentRegistry } from '@/agents/types.js';
import type { ChatFrontEnd } from '@/channels/chat-front-end.js';
import type { Logger } from '@/observability/logger.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

export interface RouteDependencies {
  orchestrator: Orchestrator;
  registry: AgentRegistry;
  chat: ChatFrontEnd;
  logger: Logger;
}
