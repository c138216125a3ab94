/**
 * Rate Limit Policies
 *
 * Tier → quota table. Quotas are written as `<count>/<unit>` or
 * `<count>/<n><unit>` (e.g. '100/hour', '500/15m') and loaded once at startup.
 */

import { PolicyNotFoundError } from '../../errors';
import type { RateLimitPolicy } from './types';

/**
 * Built-in tiers, used when RATE_LIMIT_TIERS is not set
 */
export const DEFAULT_TIER_QUOTAS: Readonly<Record<string, string>> = {
  free: '100/hour',
  pro: '1000/hour',
  enterprise: '10000/hour',
};

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  sec: 1,
  second: 1,
  seconds: 1,
  m: 60,
  min: 60,
  minute: 60,
  minutes: 60,
  h: 3600,
  hour: 3600,
  hours: 3600,
  d: 86400,
  day: 86400,
  days: 86400,
};

const QUOTA_PATTERN = /^\s*(\d+)\s*\/\s*(\d*)\s*([a-z]+)\s*$/i;

/**
 * Parse a quota string. Returns null when the string is malformed.
 *
 * @example
 * parseQuota('10/minute'); // { limit: 10, windowSeconds: 60 }
 * parseQuota('500/15m');   // { limit: 500, windowSeconds: 900 }
 */
export function parseQuota(quota: string): { limit: number; windowSeconds: number } | null {
  const match = QUOTA_PATTERN.exec(quota);
  if (!match) return null;

  const [, count, multiplier, unit] = match;
  const unitSeconds = UNIT_SECONDS[unit.toLowerCase()];
  if (unitSeconds === undefined) return null;

  const limit = parseInt(count, 10);
  const windowSeconds = unitSeconds * (multiplier ? parseInt(multiplier, 10) : 1);
  if (limit < 1 || windowSeconds < 1) return null;

  return { limit, windowSeconds };
}

/**
 * Build a frozen policy, rejecting non-positive limits and windows
 */
export function createPolicy(policy: RateLimitPolicy): RateLimitPolicy {
  if (!policy.tier) {
    throw new Error('Rate limit policy requires a tier name');
  }
  if (!Number.isInteger(policy.limit) || policy.limit < 1) {
    throw new Error(`Invalid limit for tier "${policy.tier}": ${policy.limit}`);
  }
  if (!Number.isInteger(policy.windowSeconds) || policy.windowSeconds < 1) {
    throw new Error(`Invalid window for tier "${policy.tier}": ${policy.windowSeconds}`);
  }

  return Object.freeze({
    tier: policy.tier,
    limit: policy.limit,
    windowSeconds: policy.windowSeconds,
  });
}

/**
 * Build one policy from a quota string
 */
export function policyFromQuota(tier: string, quota: string): RateLimitPolicy {
  const parsed = parseQuota(quota);
  if (!parsed) {
    throw new Error(`Invalid quota for tier "${tier}": "${quota}"`);
  }
  return createPolicy({ tier, ...parsed });
}

/**
 * Build policies from a tier → quota-string map
 */
export function policiesFromQuotas(quotas: Readonly<Record<string, string>>): RateLimitPolicy[] {
  return Object.entries(quotas).map(([tier, quota]) => policyFromQuota(tier, quota));
}

/**
 * Immutable tier → policy lookup with a mandatory default entry
 */
export class PolicyTable {
  private readonly policies: ReadonlyMap<string, RateLimitPolicy>;
  readonly defaultTier: string;

  /**
   * @throws PolicyNotFoundError when `defaultTier` has no policy
   */
  constructor(policies: RateLimitPolicy[], defaultTier: string) {
    const byTier = new Map<string, RateLimitPolicy>();
    for (const policy of policies) {
      if (byTier.has(policy.tier)) {
        throw new Error(`Duplicate rate limit policy for tier "${policy.tier}"`);
      }
      byTier.set(policy.tier, createPolicy(policy));
    }

    if (!byTier.has(defaultTier)) {
      throw new PolicyNotFoundError(defaultTier);
    }

    this.policies = byTier;
    this.defaultTier = defaultTier;
  }

  static fromQuotas(quotas: Readonly<Record<string, string>>, defaultTier: string): PolicyTable {
    return new PolicyTable(policiesFromQuotas(quotas), defaultTier);
  }

  has(tier: string): boolean {
    return this.policies.has(tier);
  }

  /**
   * Policy for a tier, or the default tier's policy when unknown
   */
  lookup(tier: string): RateLimitPolicy {
    return this.policies.get(tier) ?? this.getDefault();
  }

  getDefault(): RateLimitPolicy {
    const policy = this.policies.get(this.defaultTier);
    // Guaranteed by the constructor
    if (!policy) throw new PolicyNotFoundError(this.defaultTier);
    return policy;
  }

  tiers(): string[] {
    return Array.from(this.policies.keys());
  }
}
