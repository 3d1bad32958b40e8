/**
 * Health check: liveness plus the orchestrator state.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';

export function healthRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { orchestrator } = deps;

  fastify.get('/health', () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    orchestrator: orchestrator.getStatus().state,
  }));
}
