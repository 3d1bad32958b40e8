/**
 * Conductor: wires the engine together from configuration.
 *
 * Shared by the HTTP server and the MCP stdio entry point. Nothing here is
 * global: every call builds a fresh, independent engine.
 */
import { bootstrapAgents } from '@/agents/bootstrap.js';
import { createAgentRegistry } from '@/agents/agent-registry.js';
import { createHandlerCatalog } from '@/agents/handler-catalog.js';
import { registerBuiltInHandlers } from '@/agents/handlers/index.js';
import { createMemoryRecordGateway } from '@/agents/host-record-gateway.js';
import type { HostRecordGateway } from '@/agents/host-record-gateway.js';
import type { AgentRegistry } from '@/agents/types.js';
import { createChatFrontEnd } from '@/channels/chat-front-end.js';
import type { ChatFrontEnd } from '@/channels/chat-front-end.js';
import { loadConductorConfig, mergeSettings, parseConductorConfig } from '@/config/loader.js';
import type { ConductorConfig } from '@/config/types.js';
import { openRecordStore } from '@/infrastructure/database.js';
import type { RecordStore } from '@/infrastructure/record-store/types.js';
import type { Logger } from '@/observability/logger.js';
import { createOrchestrator, plannableCapabilities } from '@/orchestrator/orchestrator.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import { DEFAULT_ORCHESTRATOR_SETTINGS } from '@/orchestrator/types.js';
import type { OrchestratorSettings } from '@/orchestrator/types.js';
import { createKeywordMatcher } from '@/planning/capability-matcher.js';
import { createPlanner } from '@/planning/planner.js';
import { createRouter } from '@/routing/router.js';

export interface Conductor {
  registry: AgentRegistry;
  orchestrator: Orchestrator;
  recordStore: RecordStore;
  gateway: HostRecordGateway;
  chat: ChatFrontEnd;
  settings: OrchestratorSettings;
  /** Stop the orchestrator with its configured policy, then close the store. */
  close(): Promise<void>;
}

export interface ConductorOptions {
  config: ConductorConfig;
  recordStore: RecordStore;
  logger: Logger;
  /** Defaults to an in-memory gateway seeded from `config.hostRecords`. */
  gateway?: HostRecordGateway;
}

/**
 * Build an engine. Settings layer as defaults, then stored settings, then
 * the config file; the result is stored for the next start.
 */
export async function createConductor(options: ConductorOptions): Promise<Conductor> {
  const { config, recordStore, logger } = options;
  const gateway = options.gateway ?? createMemoryRecordGateway(config.hostRecords);

  const stored = await recordStore.loadOrchestratorConfig();
  const settings = mergeSettings(DEFAULT_ORCHESTRATOR_SETTINGS, stored, config.orchestrator);
  await recordStore.persistOrchestratorConfig(settings);

  const matcher = createKeywordMatcher(config.planner.keywords);
  const planner = createPlanner({ matcher, dependencyRules: config.planner.dependencyRules });
  const registry = createAgentRegistry({ logger, recordStore });

  // assigned below; the router handler only runs once the orchestrator exists
  let orchestrator: Orchestrator | undefined;
  const catalog = createHandlerCatalog();
  registerBuiltInHandlers(catalog, {
    gateway,
    planner,
    matcher,
    router: createRouter({
      registry,
      load: (agentId) => orchestrator?.runningCount(agentId) ?? 0,
    }),
    capabilities: () => plannableCapabilities(registry),
  });

  await bootstrapAgents({ registry, catalog, recordStore, logger, seeds: config.agents });

  const engine = createOrchestrator({ registry, planner, recordStore, logger, settings });
  orchestrator = engine;

  const chat = createChatFrontEnd({ orchestrator: engine, logger });

  return {
    registry,
    orchestrator: engine,
    recordStore,
    gateway,
    chat,
    settings,
    async close(): Promise<void> {
      await engine.stop();
      await recordStore.close();
    },
  };
}

/**
 * Build an engine from the environment: `CONDUCTOR_CONFIG` names a JSON
 * config file, `CONDUCTOR_DB_PATH` a SQLite database. Both are optional.
 */
export async function createConductorFromEnv(
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Conductor> {
  const configPath = env['CONDUCTOR_CONFIG'];
  const loaded = configPath ? await loadConductorConfig(configPath) : parseConductorConfig({});
  if (!loaded.ok) throw loaded.error;

  const recordStore = openRecordStore({ dbPath: env['CONDUCTOR_DB_PATH'], logger });
  return createConductor({ config: loaded.value, recordStore, logger });
}
