import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { registerErrorHandler } from '@/api/error-handler.js';
import { registerRoutes } from '@/api/routes/index.js';
import { createConductorFromEnv } from '@/conductor.js';
import { createLogger } from '@/observability/logger.js';

const logger = createLogger();

const server = Fastify({
  logger: false,
});

async function start(): Promise<void> {
  const port = Number(process.env['PORT'] ?? 3000);
  const host = process.env['HOST'] ?? '0.0.0.0';

  try {
    const conductor = await createConductorFromEnv(logger);
    await conductor.orchestrator.start();

    await server.register(cors, { origin: true });
    await server.register(helmet);
    registerErrorHandler(server, logger);
    registerRoutes(server, {
      orchestrator: conductor.orchestrator,
      registry: conductor.registry,
      chat: conductor.chat,
      logger,
    });

    // Graceful shutdown: stop accepting HTTP, let the orchestrator apply its stop policy
    let shuttingDown = false;
    const shutdown = async (): Promise<void> => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
      await conductor.close();
    };
    const exitAfterShutdown = (): void => {
      shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', {
            component: 'main',
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        },
      );
    };

    process.on('SIGTERM', exitAfterShutdown);
    process.on('SIGINT', exitAfterShutdown);

    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, { component: 'main' });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
