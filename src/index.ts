/**
 * Tiered Rate Limiter
 *
 * Fixed-window admission control with tiered quotas, Redis-backed counters
 * and in-memory failover.
 */

export * from './services/rateLimiting';
export {
  createRateLimitMiddleware,
  getRateLimitContext,
  getClientIp,
  getCredential,
  setRateLimitHeaders,
} from './middleware/rateLimit';
export type { RateLimitMiddlewareOptions } from './middleware/rateLimit';
export { getConfig, loadConfig, parseTierList, resetConfigCache } from './config';
export type { RateLimiterConfig } from './config';
export * from './errors';
export * from './infrastructure';
export { metrics, registry as metricsRegistry } from './observability/metrics';
export { createLogger, setLogLevel } from './utils/logger';
export type { Logger } from './utils/logger';
