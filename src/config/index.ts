/**
 * Rate Limiter Configuration
 *
 * Reads environment variables (optionally from a .env file), validates them
 * and caches the result. Invalid configuration fails at startup with a
 * ConfigurationError, never at request time.
 */

import dotenv from 'dotenv';
import { ConfigurationError } from '../errors';
import { DEFAULT_TIER_QUOTAS } from '../services/rateLimiting/policies';
import { assertValidConfig, type RateLimiterConfig } from './schema';

dotenv.config();

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}

/**
 * Parse `free=100/hour,pro=1000/hour` into a tier → quota map
 *
 * @throws ConfigurationError for entries without a `=`
 */
export function parseTierList(value: string): Record<string, string> {
  const tiers: Record<string, string> = {};
  const malformed: string[] = [];

  for (const entry of value.split(',').map((e) => e.trim()).filter((e) => e.length > 0)) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      malformed.push(entry);
      continue;
    }
    tiers[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
  }

  if (malformed.length > 0) {
    throw new ConfigurationError(
      malformed.map((entry) => `rateLimit.tiers: malformed entry "${entry}", expected "<tier>=<quota>"`)
    );
  }

  return tiers;
}

/**
 * Build and validate configuration from an environment map
 */
export function loadConfig(env: Env = process.env): RateLimiterConfig {
  const redisUrl = env.REDIS_URL?.trim() ?? '';

  return assertValidConfig({
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    rateLimit: {
      enabled: parseBoolean(env.RATE_LIMIT_ENABLED, true),
      defaultTier: env.RATE_LIMIT_DEFAULT_TIER || 'free',
      tiers: env.RATE_LIMIT_TIERS ? parseTierList(env.RATE_LIMIT_TIERS) : { ...DEFAULT_TIER_QUOTAS },
      keyPrefix: env.RATE_LIMIT_KEY_PREFIX ?? 'ratelimit:',
      apiKeyPrefixLength: parseNumber(env.RATE_LIMIT_API_KEY_PREFIX_LENGTH, 16),
      trustProxy: parseBoolean(env.RATE_LIMIT_TRUST_PROXY, false),
    },
    redis: {
      enabled: redisUrl.length > 0,
      url: redisUrl,
      commandTimeoutMs: parseNumber(env.REDIS_COMMAND_TIMEOUT_MS, 500),
    },
    health: {
      probeIntervalMs: parseNumber(env.HEALTH_PROBE_INTERVAL_MS, 5000),
      probeTimeoutMs: parseNumber(env.HEALTH_PROBE_TIMEOUT_MS, 1000),
    },
    localStore: {
      sweepIntervalMs: parseNumber(env.LOCAL_STORE_SWEEP_INTERVAL_MS, 60000),
    },
  });
}

let cachedConfig: RateLimiterConfig | null = null;

/**
 * Validated configuration from process.env, cached after first call
 */
export function getConfig(): RateLimiterConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Forget the cached configuration (tests)
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}

export type { RateLimiterConfig } from './schema';
export { validateConfigSchema, assertValidConfig } from './schema';
