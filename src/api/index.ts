export { createApiRouter } from './routes';
export type { ApiDependencies } from './routes';

// Middleware exports
export { authenticateApiKey, hashApiKey } from './middleware/auth';
export { validateRequest, idParamsSchema, periodQuerySchema, chatQuerySchema } from './middleware/validation';
export { errorHandler, notFoundHandler, asyncHandler } from './middleware/error-handler';
export { requestLogger } from './middleware/request-logger';

// Controller exports
export { TargetsController } from './controllers/TargetsController';
export { SubscriptionsController } from './controllers/SubscriptionsController';
export { HealthController } from './controllers/HealthController';
export type { HealthDependencies } from './controllers/HealthController';
