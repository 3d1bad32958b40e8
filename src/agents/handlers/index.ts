import type { Planner } from '@/planning/planner.js';
import type { CapabilityMatcher } from '@/planning/types.js';
import type { Router } from '@/routing/router.js';
import type { HostRecordGateway } from '../host-record-gateway.js';
import type { HandlerCatalog } from '../types.js';
import { createBusinessHandler, customHandler } from './business.js';
import type { BusinessAgentType } from './business.js';
import { createPlannerHandler, createRouterHandler } from './engine.js';

export { BUSINESS_AGENTS, createBusinessHandler, customHandler, resolveAction } from './business.js';
export type { BusinessAgentType } from './business.js';
export { createPlannerHandler, createRouterHandler } from './engine.js';

export interface BuiltInHandlerDeps {
  gateway: HostRecordGateway;
  planner: Planner;
  matcher: CapabilityMatcher;
  router: Pick<Router, 'route'>;
  /** Capabilities open to planning and routing. */
  capabilities: () => string[];
}

/** Register the planner, router, business and custom handlers under their agent types. */
export function registerBuiltInHandlers(catalog: HandlerCatalog, deps: BuiltInHandlerDeps): void {
  const plannerHandler = createPlannerHandler(deps);
  const routerHandler = createRouterHandler(deps);
  catalog.register('planner', () => plannerHandler);
  catalog.register('router', () => routerHandler);

  const businessTypes: BusinessAgentType[] = ['crm', 'sales', 'inventory', 'accounting', 'hr'];
  for (const type of businessTypes) {
    const handler = createBusinessHandler(type, deps.gateway);
    catalog.register(type, () => handler);
  }
  catalog.register('custom', () => customHandler);
}
