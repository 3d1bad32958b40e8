/**
 * MCP gateway over stdio.
 *
 * Usage:
 *   CONDUCTOR_CONFIG=config/conductor.example.json tsx src/mcp/stdio.ts
 *
 * stdout carries the protocol, so logs go to stderr.
 */
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createConductorFromEnv } from '@/conductor.js';
import { createLogger } from '@/observability/logger.js';
import { createGatewayServer } from './gateway/server.js';

const logger = createLogger({ name: 'conductor-mcp', destination: 'stderr' });

async function start(): Promise<void> {
  const conductor = await createConductorFromEnv(logger);
  await conductor.orchestrator.start();

  const server = createGatewayServer({
    orchestrator: conductor.orchestrator,
    registry: conductor.registry,
    logger,
  });

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down MCP gateway', { component: 'mcp-gateway' });
    await server.close();
    await conductor.close();
  };
  const exitAfterShutdown = (): void => {
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', {
          component: 'mcp-gateway',
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      },
    );
  };
  process.on('SIGTERM', exitAfterShutdown);
  process.on('SIGINT', exitAfterShutdown);

  await server.connect(new StdioServerTransport());
  logger.info('MCP gateway listening on stdio', { component: 'mcp-gateway' });
}

start().catch((error: unknown) => {
  logger.fatal('Failed to start MCP gateway', {
    component: 'mcp-gateway',
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
