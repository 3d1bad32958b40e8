// Routing module: picks one active agent per task
export { createRouter } from './router.js';
export type { RouteOptions, Router } from './router.js';
