/**
 * The agent set seeded into an empty record store.
 */
import { toAgentId } from '@/core/ids.js';
import type { AgentSeed } from '@/config/types.js';

function seed(
  id: string,
  name: string,
  description: string,
  capabilities: string[],
): AgentSeed {
  return {
    id: toAgentId(id),
    name,
    type: id,
    description,
    capabilities,
    state: 'active',
    priority: 0,
    configuration: {},
  };
}

export const DEFAULT_AGENTS: readonly AgentSeed[] = [
  seed('planner', 'Planner Agent', 'Plans and coordinates complex tasks', ['planning']),
  seed('router', 'Router Agent', 'Routes requests to the appropriate agents', ['routing']),
  seed('crm', 'CRM Agent', 'Manages leads, opportunities and customers', ['crm']),
  seed('sales', 'Sales Agent', 'Handles orders and quotations', ['sales']),
  seed('inventory', 'Inventory Agent', 'Checks stock and warehouse operations', ['inventory']),
  seed('accounting', 'Accounting Agent', 'Handles invoices and financial records', ['accounting']),
  seed('hr', 'HR Agent', 'Handles employees, attendance and recruitment', ['hr']),
];
