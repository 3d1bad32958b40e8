/**
 * MCP protocol gateway: orchestrator tools and read-only resources.
 */
export {
  createGatewayServer,
  processRequestToolSchema,
  executeAgentToolSchema,
  getAgentStatusToolSchema,
  AGENTS_RESOURCE_URI,
  STATUS_RESOURCE_URI,
} from './gateway/server.js';
export type { GatewayServerDeps } from './gateway/server.js';
