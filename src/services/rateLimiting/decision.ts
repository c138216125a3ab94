/**
 * Decisions and response metadata
 */

import type { CounterRecord, Decision, RateLimitPolicy, StoreBackend } from './types';

export const RATE_LIMIT_HEADERS = {
  limit: 'X-RateLimit-Limit',
  remaining: 'X-RateLimit-Remaining',
  reset: 'X-RateLimit-Reset',
  retryAfter: 'Retry-After',
} as const;

/**
 * Turn a counter reading into an admission decision
 */
export function buildDecision(
  policy: RateLimitPolicy,
  record: CounterRecord,
  backend: StoreBackend
): Decision {
  return Object.freeze({
    allowed: record.count <= policy.limit,
    limit: policy.limit,
    remaining: Math.max(0, policy.limit - record.count),
    resetAt: record.expiresAt,
    tier: policy.tier,
    key: record.key,
    backend,
  });
}

/**
 * Whole seconds until the window resets, never negative
 */
export function retryAfterSeconds(decision: Decision, now: number = Date.now()): number {
  return Math.max(0, Math.ceil((decision.resetAt - now) / 1000));
}

/**
 * Protocol-neutral response metadata. Retry-After is only present on denial.
 */
export function buildRateLimitHeaders(decision: Decision, now: number = Date.now()): Record<string, string> {
  const headers: Record<string, string> = {
    [RATE_LIMIT_HEADERS.limit]: String(decision.limit),
    [RATE_LIMIT_HEADERS.remaining]: String(decision.remaining),
    [RATE_LIMIT_HEADERS.reset]: String(Math.ceil(decision.resetAt / 1000)),
  };

  if (!decision.allowed) {
    headers[RATE_LIMIT_HEADERS.retryAfter] = String(retryAfterSeconds(decision, now));
  }

  return headers;
}
