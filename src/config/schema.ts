/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of the rate limiter configuration.
 * A tier table that cannot serve its default tier is rejected here, at startup.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { parseQuota } from '../services/rateLimiting/policies';

// =============================================================================
// Basic Type Schemas
// =============================================================================

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);

const QuotaSchema = z.string().refine((quota) => parseQuota(quota) !== null, {
  message: 'expected "<count>/<unit>", e.g. "100/hour" or "500/15m"',
});

// =============================================================================
// Component Schemas
// =============================================================================

export const RateLimitConfigSchema = z
  .object({
    enabled: z.boolean(),
    defaultTier: z.string().min(1),
    tiers: z.record(z.string().min(1), QuotaSchema),
    keyPrefix: z.string(),
    apiKeyPrefixLength: z.number().int().min(4).max(64),
    trustProxy: z.boolean(),
  })
  .superRefine((rateLimit, ctx) => {
    if (!(rateLimit.defaultTier in rateLimit.tiers)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultTier'],
        message: `default tier "${rateLimit.defaultTier}" is not in the tier table`,
      });
    }
  });

export const RedisConfigSchema = z
  .object({
    enabled: z.boolean(),
    url: z.string(),
    commandTimeoutMs: z.number().int().min(10).max(60000),
  })
  .refine((redis) => !redis.enabled || redis.url.length > 0, {
    path: ['url'],
    message: 'REDIS_URL is required when Redis is enabled',
  });

export const HealthConfigSchema = z.object({
  probeIntervalMs: z.number().int().min(100),
  probeTimeoutMs: z.number().int().min(10),
});

export const LocalStoreConfigSchema = z.object({
  sweepIntervalMs: z.number().int().min(1000),
});

export const RateLimiterConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  logLevel: LogLevelSchema,
  rateLimit: RateLimitConfigSchema,
  redis: RedisConfigSchema,
  health: HealthConfigSchema,
  localStore: LocalStoreConfigSchema,
});

export type RateLimiterConfig = z.infer<typeof RateLimiterConfigSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

export type ConfigValidationResult =
  | { success: true; config: RateLimiterConfig; errors: [] }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return readable errors
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = RateLimiterConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, config: result.data, errors: [] };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { success: false, errors };
}

/**
 * Validate configuration and throw if invalid
 *
 * @throws ConfigurationError listing every problem found
 */
export function assertValidConfig(config: unknown): RateLimiterConfig {
  const result = validateConfigSchema(config);

  if (!result.success) {
    throw new ConfigurationError(result.errors);
  }

  return result.config;
}
