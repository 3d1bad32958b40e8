/**
 * A Fastify app over a real engine, for route tests. Agents are plain test
 * registrations; storage is in memory.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { createAgentRegistry } from '@/agents/agent-registry.js';
import type { AgentRegistration, AgentRegistry } from '@/agents/types.js';
import { registerErrorHandler } from '@/api/error-handler.js';
import { registerRoutes } from '@/api/routes/index.js';
import { createChatFrontEnd } from '@/channels/chat-front-end.js';
import { createMemoryRecordStore } from '@/infrastructure/record-store/memory-record-store.js';
import type { Logger } from '@/observability/logger.js';
import { createOrchestrator } from '@/orchestrator/orchestrator.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import { DEFAULT_ORCHESTRATOR_SETTINGS } from '@/orchestrator/types.js';
import { createKeywordMatcher } from '@/planning/capability-matcher.js';
import { createPlanner } from '@/planning/planner.js';
import { createMockLogger, makeAgent } from './engine.js';

export interface TestApp {
  app: FastifyInstance;
  orchestrator: Orchestrator;
  registry: AgentRegistry;
  logger: Logger;
}

/** Default agents: an active `crm` and an inactive `hr`, both echoing their input. */
export async function createTestApp(agents?: AgentRegistration[]): Promise<TestApp> {
  const logger = createMockLogger();
  const registry = createAgentRegistry({ logger });
  for (const agent of agents ?? [
    makeAgent('crm', ['crm']),
    makeAgent('hr', ['hr'], { state: 'inactive' }),
  ]) {
    registry.register(agent);
  }

  const orchestrator = createOrchestrator({
    registry,
    planner: createPlanner({ matcher: createKeywordMatcher() }),
    recordStore: createMemoryRecordStore(),
    logger,
    settings: {
      ...DEFAULT_ORCHESTRATOR_SETTINGS,
      retryPolicy: { maxAttempts: 1, backoffBaseMs: 0, backoffCapMs: 0 },
    },
  });
  await orchestrator.start();

  const app = Fastify();
  registerErrorHandler(app, logger);
  registerRoutes(app, {
    orchestrator,
    registry,
    chat: createChatFrontEnd({ orchestrator, logger }),
    logger,
  });
  await app.ready();

  return { app, orchestrator, registry, logger };
}
