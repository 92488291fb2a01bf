/**
 * HTTP module exports
 */

export { rateLimit, TokenBucketRateLimiter, errorHandler } from './middleware.js';
export type { RateLimitConfig, RateLimitDecision } from './middleware.js';
