/**
 * Route registration: registers every API route on the Fastify instance.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { agentRoutes } from './agents.js';
import { chatRoutes } from './chat.js';
import { healthRoutes } from './health.js';
import { orchestratorRoutes } from './orchestrator.js';
import { requestRoutes } from './requests.js';

export function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  healthRoutes(fastify, deps);
  requestRoutes(fastify, deps);
  chatRoutes(fastify, deps);
  agentRoutes(fastify, deps);
  orchestratorRoutes(fastify, deps);
}
