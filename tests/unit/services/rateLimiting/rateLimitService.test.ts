import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { loadConfig } from '../../../../src/config';
import { PolicyNotFoundError } from '../../../../src/errors';
import {
  metrics,
  rateLimitDecisionsTotal,
  rateLimitStoreFallbacksTotal,
} from '../../../../src/observability/metrics';
import { StoreHealthMonitor } from '../../../../src/services/rateLimiting/healthMonitor';
import { MemoryCounterStore } from '../../../../src/services/rateLimiting/memoryCounterStore';
import { PolicyTable } from '../../../../src/services/rateLimiting/policies';
import {
  RateLimitService,
  createRateLimitService,
} from '../../../../src/services/rateLimiting/rateLimitService';
import { RedisCounterStore } from '../../../../src/services/rateLimiting/redisCounterStore';
import type { RateLimitContext } from '../../../../src/services/rateLimiting/types';
import { FakeRedis } from '../../../mocks/redis';

const T0 = new Date('2026-03-01T12:00:00.000Z').getTime();

const user42: RateLimitContext = { principal: { id: '42' }, remoteAddress: '203.0.113.9' };

function createPolicies(): PolicyTable {
  return PolicyTable.fromQuotas({ free: '3/10s', pro: '5/10s' }, 'free');
}

describe('RateLimitService', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    metrics.reset();
  });

  describe('with the memory store only', () => {
    let localStore: MemoryCounterStore;
    let service: RateLimitService;

    beforeEach(() => {
      localStore = new MemoryCounterStore({ sweepIntervalMs: 0 });
      service = new RateLimitService({ policies: createPolicies(), localStore });
    });

    afterEach(async () => {
      await service.shutdown();
    });

    it('admits up to the limit, then rejects until the window resets', async () => {
      const first = await service.check(user42);
      const second = await service.check(user42);
      const third = await service.check(user42);
      const fourth = await service.check(user42);

      expect([first, second, third].map((d) => d.allowed)).toEqual([true, true, true]);
      expect([first, second, third].map((d) => d.remaining)).toEqual([2, 1, 0]);
      expect(fourth).toEqual({
        allowed: false,
        limit: 3,
        remaining: 0,
        resetAt: T0 + 10000,
        tier: 'free',
        key: 'user:42',
        backend: 'memory',
      });

      vi.setSystemTime(T0 + 11000);
      const afterReset = await service.check(user42);

      expect(afterReset.allowed).toBe(true);
      expect(afterReset.remaining).toBe(2);
      expect(afterReset.resetAt).toBe(T0 + 21000);
    });

    it('admits exactly the limit under concurrent checks', async () => {
      const decisions = await Promise.all(Array.from({ length: 20 }, () => service.check(user42)));

      expect(decisions.filter((d) => d.allowed)).toHaveLength(3);
      expect(decisions.filter((d) => !d.allowed)).toHaveLength(17);
    });

    it('keeps separate keys in separate windows', async () => {
      await service.check(user42);
      await service.check(user42);
      await service.check(user42);

      const other = await service.check({ principal: { id: '43' }, remoteAddress: '203.0.113.9' });
      const anonymous = await service.check({ remoteAddress: '203.0.113.9' });

      expect(other).toMatchObject({ allowed: true, remaining: 2, key: 'user:43' });
      expect(anonymous).toMatchObject({ allowed: true, remaining: 2, key: 'ip:203.0.113.9' });
    });

    it("applies the caller's tier", async () => {
      const decision = await service.check({ principal: { id: '42', tier: 'pro' }, remoteAddress: '' });

      expect(decision).toMatchObject({ tier: 'pro', limit: 5, remaining: 4 });
    });

    it('checkTier charges against the named tier', async () => {
      const decision = await service.checkTier(user42, 'pro');

      expect(decision).toMatchObject({ tier: 'pro', limit: 5, remaining: 4 });
    });

    it('checkTier rejects an unknown tier without charging', async () => {
      await expect(service.checkTier(user42, 'platinum')).rejects.toBeInstanceOf(PolicyNotFoundError);

      expect(localStore.size()).toBe(0);
    });

    it('counts scoped checks apart from the global window', async () => {
      const pro: RateLimitContext = { principal: { id: '42', tier: 'pro' }, remoteAddress: '203.0.113.9' };

      const global = await service.check(pro);
      const route = await service.checkTier(pro, 'free', { scope: 'search' });

      expect(global).toMatchObject({ tier: 'pro', remaining: 4, key: 'user:42' });
      expect(route).toMatchObject({ tier: 'free', remaining: 2, key: 'route:search:user:42' });
    });

    it('checkPolicy charges a policy outside the tier table', async () => {
      const decision = await service.checkPolicy(
        user42,
        { tier: 'export', limit: 1, windowSeconds: 60 },
        { scope: 'export' }
      );
      const second = await service.checkPolicy(
        user42,
        { tier: 'export', limit: 1, windowSeconds: 60 },
        { scope: 'export' }
      );

      expect(decision).toMatchObject({ allowed: true, limit: 1, remaining: 0, resetAt: T0 + 60000 });
      expect(second).toMatchObject({ allowed: false, key: 'route:export:user:42' });
      expect((await service.check(user42)).remaining).toBe(2);
    });

    it('peekPolicy resolves without charging', async () => {
      expect(service.peekPolicy(user42)).toEqual({
        key: 'user:42',
        policy: { tier: 'free', limit: 3, windowSeconds: 10 },
      });
      expect(localStore.size()).toBe(0);
    });

    it('reset clears a key', async () => {
      await service.check(user42);
      await service.check(user42);
      await service.reset('user:42');

      expect((await service.check(user42)).remaining).toBe(2);
    });

    it('reports memory-only health', () => {
      expect(service.getHealth()).toEqual({
        state: 'healthy',
        backend: 'memory',
        distributed: false,
        tiers: ['free', 'pro'],
      });
      expect(service.hasTier('pro')).toBe(true);
      expect(service.hasTier('platinum')).toBe(false);
    });

    it('counts decisions by outcome', async () => {
      for (let i = 0; i < 4; i++) {
        await service.check(user42);
      }

      const { values } = await rateLimitDecisionsTotal.get();
      const byOutcome = Object.fromEntries(values.map((v) => [String(v.labels.outcome), v.value]));
      expect(byOutcome).toEqual({ allowed: 3, rejected: 1 });
    });
  });

  describe('with Redis and failover', () => {
    let redis: FakeRedis;
    let localStore: MemoryCounterStore;
    let health: StoreHealthMonitor;
    let service: RateLimitService;

    beforeEach(() => {
      redis = new FakeRedis();
      localStore = new MemoryCounterStore({ sweepIntervalMs: 0 });
      const distributedStore = new RedisCounterStore(redis);
      health = new StoreHealthMonitor(distributedStore, { probeIntervalMs: 5000, probeTimeoutMs: 1000 });
      service = new RateLimitService({ policies: createPolicies(), localStore, distributedStore, health });
    });

    afterEach(async () => {
      await service.shutdown();
    });

    it('counts in Redis while healthy', async () => {
      const decision = await service.check(user42);

      expect(decision).toMatchObject({ allowed: true, remaining: 2, backend: 'redis' });
      expect(redis.windows.get('ratelimit:user:42')?.count).toBe(1);
      expect(localStore.size()).toBe(0);
    });

    it('retries once in memory when Redis fails and marks it degraded', async () => {
      redis.failing = true;

      const decision = await service.check(user42);

      expect(decision).toMatchObject({ allowed: true, remaining: 2, backend: 'memory' });
      expect(health.getState()).toBe('degraded');
      expect(redis.eval).toHaveBeenCalledTimes(1);
      expect((await rateLimitStoreFallbacksTotal.get()).values[0].value).toBe(1);
    });

    it('skips Redis while degraded', async () => {
      redis.failing = true;
      await service.check(user42);

      const decision = await service.check(user42);

      expect(decision).toMatchObject({ remaining: 1, backend: 'memory' });
      expect(redis.eval).toHaveBeenCalledTimes(1);
      expect(service.getHealth()).toEqual({
        state: 'degraded',
        backend: 'memory',
        distributed: true,
        tiers: ['free', 'pro'],
      });
    });

    it('returns to Redis after a successful probe', async () => {
      redis.failing = true;
      await service.check(user42);

      redis.failing = false;
      await health.probe();
      const decision = await service.check(user42);

      expect(health.getState()).toBe('healthy');
      expect(decision).toMatchObject({ remaining: 2, backend: 'redis' });
    });

    it('reset clears both stores', async () => {
      await service.check(user42);
      await service.reset('user:42');

      expect(redis.del).toHaveBeenCalledWith('ratelimit:user:42');
      expect(redis.windows.size).toBe(0);
    });

    it('reset still clears memory and degrades when Redis is down', async () => {
      redis.failing = true;
      await service.check(user42);
      await service.check(user42);

      await service.reset('user:42');

      expect(health.getState()).toBe('degraded');
      expect(health.getStats().reportedFailures).toBe(2);
      expect((await service.check(user42)).remaining).toBe(2);
    });

    it('shutdown completes when closing Redis fails', async () => {
      redis.quit.mockRejectedValueOnce(new Error('Connection is closed.'));

      await expect(service.shutdown()).resolves.toBeUndefined();
    });

    it('shutdown stops probing and closes Redis', async () => {
      health.start();
      await service.shutdown();

      expect(health.isRunning()).toBe(false);
      expect(redis.quit).toHaveBeenCalledTimes(1);
    });
  });

  it('refuses a distributed store without a health monitor', () => {
    expect(
      () =>
        new RateLimitService({
          policies: createPolicies(),
          localStore: new MemoryCounterStore({ sweepIntervalMs: 0 }),
          distributedStore: new RedisCounterStore(new FakeRedis()),
        })
    ).toThrow('A distributed counter store needs a health monitor');
  });
});

describe('createRateLimitService', () => {
  it('uses memory only when Redis is not configured', async () => {
    const service = createRateLimitService(loadConfig({ LOG_LEVEL: 'error' }));

    expect(service.getHealth()).toEqual({
      state: 'healthy',
      backend: 'memory',
      distributed: false,
      tiers: ['free', 'pro', 'enterprise'],
    });
    expect(service.peekPolicy({ remoteAddress: '203.0.113.9' }).policy).toEqual({
      tier: 'free',
      limit: 100,
      windowSeconds: 3600,
    });

    await service.shutdown();
  });

  it('uses a supplied Redis client with the configured key prefix', async () => {
    const redis = new FakeRedis();
    const service = createRateLimitService(
      loadConfig({ LOG_LEVEL: 'error', RATE_LIMIT_TIERS: 'free=2/minute', RATE_LIMIT_KEY_PREFIX: 'api:' }),
      { redisClient: redis, startHealthMonitor: false }
    );

    const decision = await service.check({ credential: { id: 'abc' }, remoteAddress: '203.0.113.9' });

    expect(decision).toMatchObject({ allowed: true, limit: 2, remaining: 1, backend: 'redis', key: 'apikey:abc' });
    expect(redis.windows.has('api:apikey:abc')).toBe(true);
    expect(redis.ping).not.toHaveBeenCalled();

    await service.shutdown();
  });
});
