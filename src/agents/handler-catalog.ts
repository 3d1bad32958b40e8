/**
 * Handler Catalog: maps handler keys to factories that build agent handlers.
 *
 * A record picks its handler through `configuration.handler` when set, and
 * through its agent type otherwise. New agent categories are new catalog
 * entries.
 */
import type { AgentHandler, AgentHandlerFactory, AgentRecord, HandlerCatalog } from './types.js';

export function createHandlerCatalog(): HandlerCatalog {
  const factories = new Map<string, AgentHandlerFactory>();

  return {
    register(key: string, factory: AgentHandlerFactory): void {
      factories.set(key, factory);
    },

    resolve(record: AgentRecord): AgentHandler | undefined {
      const configured = record.configuration['handler'];
      const key = typeof configured === 'string' ? configured : record.type;
      return factories.get(key)?.(record);
    },

    keys(): string[] {
      return [...factories.keys()];
    },
  };
}
