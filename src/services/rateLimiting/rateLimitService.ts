/**
 * Rate Limit Service
 *
 * Admission control for one request: resolve key and tier, look up the
 * tier's policy, charge one request against the active counter store and
 * return a decision.
 *
 * ## Store selection
 *
 * - Redis while the health monitor reports healthy
 * - process memory while it reports degraded, or when Redis is not configured
 *
 * A failed Redis call is reported to the monitor and retried once against
 * memory within the same check, so callers only ever see "allowed" or
 * "rate limited". Rejected requests are still charged.
 *
 * ## Usage
 *
 * ```typescript
 * const limiter = createRateLimitService(getConfig());
 *
 * const decision = await limiter.check({
 *   principal: { id: '42', tier: 'pro' },
 *   remoteAddress: '203.0.113.9',
 * });
 * if (!decision.allowed) {
 *   // render 429
 * }
 * ```
 */

import { getConfig, type RateLimiterConfig } from '../../config';
import { PolicyNotFoundError } from '../../errors';
import { createRedisClient, toScriptClient, type RedisScriptClient } from '../../infrastructure/redis';
import {
  rateLimitDecisionsTotal,
  rateLimitStoreFallbacksTotal,
  recordHealthState,
} from '../../observability/metrics';
import { createLogger, extractError, setLogLevel } from '../../utils/logger';
import { buildDecision } from './decision';
import { StoreHealthMonitor } from './healthMonitor';
import { KeyResolver } from './keyResolver';
import { MemoryCounterStore } from './memoryCounterStore';
import { PolicyTable } from './policies';
import { RedisCounterStore } from './redisCounterStore';
import { TierResolver } from './tierResolver';
import type {
  CheckOptions,
  CounterRecord,
  CounterStore,
  Decision,
  IRateLimitService,
  IStoreHealth,
  RateLimitContext,
  RateLimitHealth,
  RateLimitPolicy,
  StoreBackend,
} from './types';

const log = createLogger('RATELIMIT');

export interface RateLimitServiceDeps {
  policies: PolicyTable;
  /** Process-local store; the fallback, or the only store without Redis */
  localStore: CounterStore;
  /** Shared store; requires `health` */
  distributedStore?: CounterStore | null;
  health?: (IStoreHealth & { stop?(): void }) | null;
  keyResolver?: KeyResolver;
  tierResolver?: TierResolver;
}

export class RateLimitService implements IRateLimitService {
  private readonly policies: PolicyTable;
  private readonly localStore: CounterStore;
  private readonly distributedStore: CounterStore | null;
  private readonly health: (IStoreHealth & { stop?(): void }) | null;
  private readonly keyResolver: KeyResolver;
  private readonly tierResolver: TierResolver;

  constructor(deps: RateLimitServiceDeps) {
    this.policies = deps.policies;
    this.localStore = deps.localStore;
    this.distributedStore = deps.distributedStore ?? null;
    this.health = deps.health ?? null;
    this.keyResolver = deps.keyResolver ?? new KeyResolver();
    this.tierResolver = deps.tierResolver ?? new TierResolver(deps.policies);

    if (this.distributedStore && !this.health) {
      throw new Error('A distributed counter store needs a health monitor');
    }
  }

  async check(context: RateLimitContext, options: CheckOptions = {}): Promise<Decision> {
    const tier = this.tierResolver.resolve(context);
    return this.charge(context, this.policies.lookup(tier), options.scope);
  }

  /**
   * @throws PolicyNotFoundError for a tier the table does not know; validate
   *   route-level tiers with hasTier() when wiring them up
   */
  async checkTier(context: RateLimitContext, tier: string, options: CheckOptions = {}): Promise<Decision> {
    if (!this.policies.has(tier)) {
      throw new PolicyNotFoundError(tier);
    }
    return this.charge(context, this.policies.lookup(tier), options.scope);
  }

  /**
   * Charge against a policy that is not in the tier table, e.g. a
   * route-level quota. Pass a scope so it does not share the global window.
   */
  async checkPolicy(
    context: RateLimitContext,
    policy: RateLimitPolicy,
    options: CheckOptions = {}
  ): Promise<Decision> {
    return this.charge(context, policy, options.scope);
  }

  peekPolicy(context: RateLimitContext): { key: string; policy: RateLimitPolicy } {
    return {
      key: this.keyResolver.resolve(context),
      policy: this.policies.lookup(this.tierResolver.resolve(context)),
    };
  }

  hasTier(tier: string): boolean {
    return this.policies.has(tier);
  }

  /**
   * Drop a key's window in the memory store and, when configured, in Redis.
   * A Redis failure is reported to the health monitor like any live call.
   */
  async reset(key: string): Promise<void> {
    await this.localStore.reset(key);
    if (this.distributedStore) {
      try {
        await this.distributedStore.reset(key);
      } catch (error) {
        this.health?.reportFailure(error);
        log.warn('Distributed store failed, reset applied in memory only', { key, ...extractError(error) });
      }
    }
    log.debug('Rate limit reset', { key });
  }

  getHealth(): RateLimitHealth {
    return {
      state: this.health?.getState() ?? 'healthy',
      backend: this.activeStore().getType(),
      distributed: this.distributedStore !== null,
      tiers: this.policies.tiers(),
    };
  }

  async shutdown(): Promise<void> {
    this.health?.stop?.();
    await this.localStore.shutdown();
    if (this.distributedStore) {
      await this.distributedStore.shutdown();
    }
    log.info('Rate limit service shutdown');
  }

  private activeStore(): CounterStore {
    if (this.distributedStore && this.health?.getState() === 'healthy') {
      return this.distributedStore;
    }
    return this.localStore;
  }

  private async charge(context: RateLimitContext, policy: RateLimitPolicy, scope?: string): Promise<Decision> {
    const identity = this.keyResolver.resolve(context);
    const key = scope ? `route:${scope}:${identity}` : identity;
    const { record, backend } = await this.increment(key, policy.windowSeconds);
    const decision = buildDecision(policy, record, backend);

    rateLimitDecisionsTotal.inc({
      tier: policy.tier,
      outcome: decision.allowed ? 'allowed' : 'rejected',
      backend,
    });

    if (!decision.allowed) {
      log.debug('Rate limit exceeded', {
        key,
        tier: policy.tier,
        count: record.count,
        limit: policy.limit,
        resetAt: decision.resetAt,
      });
    }

    return decision;
  }

  private async increment(
    key: string,
    windowSeconds: number
  ): Promise<{ record: CounterRecord; backend: StoreBackend }> {
    const store = this.activeStore();

    if (store === this.localStore) {
      return { record: await store.incrementAndGet(key, windowSeconds), backend: store.getType() };
    }

    try {
      return { record: await store.incrementAndGet(key, windowSeconds), backend: store.getType() };
    } catch (error) {
      this.health?.reportFailure(error);
      rateLimitStoreFallbacksTotal.inc();
      log.warn('Distributed store failed, counting in memory', { key, ...extractError(error) });

      return {
        record: await this.localStore.incrementAndGet(key, windowSeconds),
        backend: this.localStore.getType(),
      };
    }
  }
}

export interface CreateRateLimitServiceOptions {
  /** Use this client instead of connecting to config.redis.url */
  redisClient?: RedisScriptClient;
  /** Start the health probe loop (default: true) */
  startHealthMonitor?: boolean;
}

/**
 * Wire a RateLimitService from configuration
 *
 * @throws PolicyNotFoundError when the default tier has no policy
 */
export function createRateLimitService(
  config: RateLimiterConfig = getConfig(),
  options: CreateRateLimitServiceOptions = {}
): RateLimitService {
  setLogLevel(config.logLevel);

  const policies = PolicyTable.fromQuotas(config.rateLimit.tiers, config.rateLimit.defaultTier);
  const localStore = new MemoryCounterStore({ sweepIntervalMs: config.localStore.sweepIntervalMs });
  const keyResolver = new KeyResolver({ apiKeyPrefixLength: config.rateLimit.apiKeyPrefixLength });

  const client =
    options.redisClient ?? (config.redis.enabled ? toScriptClient(createRedisClient(config.redis)) : null);

  if (!client) {
    log.info('Rate limit service initialized with in-memory backend', {
      tiers: policies.tiers(),
      defaultTier: policies.defaultTier,
    });
    return new RateLimitService({ policies, localStore, keyResolver });
  }

  const distributedStore = new RedisCounterStore(client, config.rateLimit.keyPrefix);
  const health = new StoreHealthMonitor(distributedStore, {
    probeIntervalMs: config.health.probeIntervalMs,
    probeTimeoutMs: config.health.probeTimeoutMs,
    onStateChange: (state) => recordHealthState(state),
  });
  recordHealthState(health.getState());

  if (options.startHealthMonitor ?? true) {
    health.start();
  }

  log.info('Rate limit service initialized with Redis backend', {
    tiers: policies.tiers(),
    defaultTier: policies.defaultTier,
  });

  return new RateLimitService({ policies, localStore, distributedStore, health, keyResolver });
}
