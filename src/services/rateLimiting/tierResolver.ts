/**
 * Tier Resolver
 *
 * Picks the quota tier for a request: the principal's tier, then the
 * credential's tier, then the default. Always returns a tier the policy
 * table knows.
 */

import { createLogger } from '../../utils/logger';
import type { PolicyTable } from './policies';
import type { RateLimitContext } from './types';

const log = createLogger('TIERS');

export class TierResolver {
  private readonly policies: PolicyTable;

  constructor(policies: PolicyTable) {
    this.policies = policies;
  }

  get defaultTier(): string {
    return this.policies.defaultTier;
  }

  resolve(context: RateLimitContext): string {
    // An empty tier on the principal counts as unset
    const requested = context.principal?.tier || context.credential?.tier;

    if (!requested) {
      return this.policies.defaultTier;
    }

    if (!this.policies.has(requested)) {
      log.debug('Unknown tier, using default', { tier: requested, default: this.policies.defaultTier });
      return this.policies.defaultTier;
    }

    return requested;
  }
}
