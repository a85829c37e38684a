export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler, errorHandler } from './error-handler.js';
export { createAuthMiddleware, requireAdmin, requireUser } from './authenticate.js';
export { validateBody } from './validate-body.js';
export { bodyLimit, JSON_BODY_LIMIT, UPLOAD_BODY_LIMIT } from './body-limit.js';
export { createRateLimitMiddleware, RATE_LIMITS } from './rate-limit.js';
export type { RateLimitConfig, RateLimitName } from './rate-limit.js';
export { createLoggingMiddleware } from './logging.js';
