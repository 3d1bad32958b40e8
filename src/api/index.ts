export { registerErrorHandler, sendError, sendNotFound, sendSuccess } from './error-handler.js';
export { registerRoutes } from './routes/index.js';
export { callerFrom } from './caller.js';
export type { ApiError, ApiResponse, RouteDependencies } from './types.js';
