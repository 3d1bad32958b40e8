/**
 * Agent bootstrap: loads agent records from the record store (seeding it
 * when empty) and registers each with the handler the catalog builds for it.
 */
import type { AgentSeed } from '@/config/types.js';
import type { RecordStore } from '@/infrastructure/record-store/types.js';
import type { Logger } from '@/observability/logger.js';
import { DEFAULT_AGENTS } from './default-agents.js';
import type { AgentRecord, AgentRegistry, HandlerCatalog } from './types.js';

interface BootstrapAgentsDeps {
  registry: AgentRegistry;
  catalog: HandlerCatalog;
  recordStore: Pick<RecordStore, 'loadAgents' | 'persistAgent'>;
  logger: Logger;
  /** Seeds for an empty store. Defaults to the built-in agent set. */
  seeds?: readonly AgentSeed[];
}

export interface BootstrapResult {
  registered: AgentRecord[];
  /** Records whose handler key the catalog does not know. */
  skipped: AgentRecord[];
  seeded: boolean;
}

function fromSeed(seed: AgentSeed): AgentRecord {
  return {
    id: seed.id,
    name: seed.name,
    type: seed.type,
    description: seed.description,
    capabilities: [...seed.capabilities],
    state: seed.state,
    priority: seed.priority,
    configuration: seed.configuration,
    updatedAt: new Date(),
  };
}

export async function bootstrapAgents(deps: BootstrapAgentsDeps): Promise<BootstrapResult> {
  const { registry, catalog, recordStore, logger } = deps;

  let records = await recordStore.loadAgents();
  const seeded = records.length === 0;
  if (seeded) {
    records = (deps.seeds ?? DEFAULT_AGENTS).map(fromSeed);
    for (const record of records) {
      await recordStore.persistAgent(record);
    }
    logger.info('Agents seeded', { component: 'bootstrap', count: records.length });
  }

  const registered: AgentRecord[] = [];
  const skipped: AgentRecord[] = [];
  for (const record of records) {
    const handler = catalog.resolve(record);
    if (!handler) {
      logger.warn('No handler for agent, skipping', {
        component: 'bootstrap',
        agentId: record.id,
        type: record.type,
        handlerKeys: catalog.keys(),
      });
      skipped.push(record);
      continue;
    }
    registered.push(registry.register({ ...record, handler }).record);
  }

  logger.info('Agents registered', {
    component: 'bootstrap',
    registered: registered.length,
    skipped: skipped.length,
  });
  return { registered, skipped, seeded };
}
