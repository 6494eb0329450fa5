export { RateLimiter, CONNECTION_RATE_LIMIT, MESSAGE_RATE_LIMIT } from './rate-limiter.js';
export type { RateLimiterOptions } from './rate-limiter.js';
