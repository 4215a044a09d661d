export { authenticateApiKey, hashApiKey } from './auth';
export { validateRequest, idParamsSchema, periodQuerySchema, chatQuerySchema } from './validation';
export type { ValidationSchema } from './validation';
export { errorHandler, notFoundHandler, asyncHandler } from './error-handler';
export { requestLogger } from './request-logger';
