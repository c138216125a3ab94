/**
 * Redis Infrastructure Module
 *
 * Creates the ioredis connection used by the distributed counter store.
 *
 * The client never queues commands while disconnected and every command has a
 * timeout, so an outage turns into a fast error that the rate limiter can
 * fail over on. Reconnection keeps running in the background so the health
 * monitor can fail back once Redis returns.
 */

import Redis from 'ioredis';
import type { RateLimiterConfig } from '../config';
import { createLogger, extractError } from '../utils/logger';

const log = createLogger('REDIS');

/**
 * The subset of Redis the counter store uses
 */
export interface RedisScriptClient {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

/**
 * Hide credentials before logging a connection URL
 */
export function redactRedisUrl(url: string): string {
  return url.replace(/\/\/.*@/, '//<credentials>@');
}

/**
 * Reconnect delay: linear backoff capped at 3s, retried forever
 */
export function reconnectDelay(times: number): number {
  return Math.min(times * 100, 3000);
}

/**
 * Create the ioredis client for the counter store
 */
export function createRedisClient(config: RateLimiterConfig['redis']): Redis {
  log.info('Connecting to Redis', { url: redactRedisUrl(config.url) });

  const client = new Redis(config.url, {
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    commandTimeout: config.commandTimeoutMs,
    connectTimeout: Math.max(config.commandTimeoutMs * 4, 1000),
    retryStrategy(times) {
      const delay = reconnectDelay(times);
      if (times % 10 === 0) {
        log.warn(`Redis reconnect attempt ${times}, waiting ${delay}ms`);
      }
      return delay;
    },
    reconnectOnError(err) {
      return err.message.includes('READONLY');
    },
  });

  client.on('ready', () => log.info('Redis connection ready'));
  client.on('error', (error: unknown) => log.debug('Redis connection error', extractError(error)));
  client.on('end', () => log.info('Redis connection closed'));

  return client;
}

/**
 * Narrow an ioredis client to the calls the counter store makes
 */
export function toScriptClient(redis: Redis): RedisScriptClient {
  return {
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
    del: (...keys) => redis.del(...keys),
    ping: () => redis.ping(),
    quit: () => redis.quit(),
  };
}
