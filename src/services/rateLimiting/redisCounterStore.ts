/**
 * Redis Counter Store
 *
 * Fixed-window counters shared by every process that talks to the same Redis.
 * The increment and the first-touch expiry are one Lua script, so a window can
 * never exist without an expiry and a second caller can never move it.
 */

import { z } from 'zod';
import { StoreUnavailableError } from '../../errors';
import type { RedisScriptClient } from '../../infrastructure/redis';
import { createLogger, extractError } from '../../utils/logger';
import type { CounterRecord, CounterStore, StoreBackend } from './types';

/**
 * Lua script for fixed-window counting
 *
 * KEYS[1] = counter key (hash: count, started, expires)
 * ARGV[1] = window size in milliseconds
 *
 * Uses the Redis server clock so every process agrees on window boundaries.
 *
 * Returns: [count, window_started_at_ms, expires_at_ms]
 */
export const FIXED_WINDOW_SCRIPT = `
local key = KEYS[1]
local window_ms = tonumber(ARGV[1])
local t = redis.call('TIME')
local now = tonumber(t[1]) * 1000 + math.floor(tonumber(t[2]) / 1000)

local count = redis.call('HINCRBY', key, 'count', 1)
if count == 1 then
  local expires_at = now + window_ms
  redis.call('HSET', key, 'started', now, 'expires', expires_at)
  redis.call('PEXPIRE', key, window_ms)
  return {count, now, expires_at}
end

local fields = redis.call('HMGET', key, 'started', 'expires')
local started = tonumber(fields[1])
local expires_at = tonumber(fields[2])

-- A window without a TTL would never reset; give it one
if (not expires_at) or redis.call('PTTL', key) < 0 then
  started = started or now
  expires_at = expires_at or (now + window_ms)
  redis.call('HSET', key, 'started', started, 'expires', expires_at)
  redis.call('PEXPIREAT', key, expires_at)
end

return {count, started, expires_at}
`;

const log = createLogger('REDIS_STORE');

const ScriptResultSchema = z.tuple([z.number().int(), z.number(), z.number()]);

export class RedisCounterStore implements CounterStore {
  private redis: RedisScriptClient;
  private keyPrefix: string;

  constructor(redis: RedisScriptClient, keyPrefix = 'ratelimit:') {
    this.redis = redis;
    this.keyPrefix = keyPrefix;
  }

  /**
   * @throws StoreUnavailableError on any transport or script failure
   */
  async incrementAndGet(key: string, windowSeconds: number): Promise<CounterRecord> {
    const fullKey = this.keyPrefix + key;
    const windowMs = windowSeconds * 1000;

    let raw: unknown;
    try {
      raw = await this.redis.eval(FIXED_WINDOW_SCRIPT, 1, fullKey, windowMs);
    } catch (error) {
      throw new StoreUnavailableError(this.getType(), error);
    }

    const parsed = ScriptResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreUnavailableError(this.getType(), new Error('Unexpected script reply'));
    }

    const [count, windowStartedAt, expiresAt] = parsed.data;
    return { key, count, windowStartedAt, expiresAt };
  }

  async reset(key: string): Promise<void> {
    try {
      await this.redis.del(this.keyPrefix + key);
    } catch (error) {
      throw new StoreUnavailableError(this.getType(), error);
    }
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.redis.ping();
      return result === 'PONG';
    } catch {
      return false;
    }
  }

  getType(): StoreBackend {
    return 'redis';
  }

  /**
   * Close the connection. A failed QUIT during an outage is logged, not thrown.
   */
  async shutdown(): Promise<void> {
    await this.redis.quit().catch((error: unknown) => {
      log.warn('Redis quit failed during shutdown', extractError(error));
    });
  }
}
