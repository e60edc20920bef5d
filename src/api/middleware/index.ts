export { corsMiddleware } from './cors';
export { apiLimiter, controlLimiter } from './rate-limit';
export { errorHandler, notFoundHandler, asyncHandler, createAPIError } from './error-handler';
export type { APIError } from './error-handler';
export { requireAuth, isAuthConfigured } from './auth';
export type { AuthenticatedRequest } from './auth';
export { validate, schemas } from './validation';
