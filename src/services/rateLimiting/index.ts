/**
 * Rate Limiting Service
 *
 * Tiered fixed-window rate limiting with a Redis backend and in-memory fallback.
 *
 * @module services/rateLimiting
 */

export { RateLimitService, createRateLimitService } from './rateLimitService';
export type { RateLimitServiceDeps, CreateRateLimitServiceOptions } from './rateLimitService';
export {
  PolicyTable,
  DEFAULT_TIER_QUOTAS,
  parseQuota,
  createPolicy,
  policyFromQuota,
  policiesFromQuotas,
} from './policies';
export { KeyResolver, DEFAULT_KEY_STRATEGIES } from './keyResolver';
export type { KeyResolverOptions } from './keyResolver';
export { TierResolver } from './tierResolver';
export { MemoryCounterStore } from './memoryCounterStore';
export type { MemoryCounterStoreOptions } from './memoryCounterStore';
export { RedisCounterStore, FIXED_WINDOW_SCRIPT } from './redisCounterStore';
export { StoreHealthMonitor } from './healthMonitor';
export type { HealthMonitorOptions, HealthMonitorStats } from './healthMonitor';
export { buildDecision, buildRateLimitHeaders, retryAfterSeconds, RATE_LIMIT_HEADERS } from './decision';
export type {
  RateLimitPolicy,
  RateLimitPrincipal,
  RateLimitCredential,
  RateLimitContext,
  KeyStrategy,
  StoreBackend,
  CounterRecord,
  CounterStore,
  Decision,
  StoreHealthState,
  HealthStateListener,
  IStoreHealth,
  RateLimitHealth,
  IRateLimitService,
  CheckOptions,
} from './types';
