/**
 * Key Resolver
 *
 * Derives the counter key for a request. Strategies run in order and the
 * first one that applies wins, so an authenticated caller is always counted
 * by identity rather than by network address.
 */

import { createLogger } from '../../utils/logger';
import type { KeyStrategy, RateLimitContext } from './types';

const log = createLogger('KEYS');

export const DEFAULT_KEY_STRATEGIES: readonly KeyStrategy[] = ['user', 'apikey', 'ip'];

export interface KeyResolverOptions {
  /** Strategy order (default: user → apikey → ip) */
  strategies?: readonly KeyStrategy[];
  /** Characters of the credential embedded in the key (default: 16) */
  apiKeyPrefixLength?: number;
}

type StrategyFn = (context: RateLimitContext) => string | undefined;

export class KeyResolver {
  private readonly chain: ReadonlyArray<[KeyStrategy, StrategyFn]>;
  private readonly apiKeyPrefixLength: number;

  constructor(options: KeyResolverOptions = {}) {
    this.apiKeyPrefixLength = options.apiKeyPrefixLength ?? 16;

    const strategies = options.strategies ?? DEFAULT_KEY_STRATEGIES;
    if (!strategies.includes('ip')) {
      // Every request has an address; without it some requests would have no key
      throw new Error('Key strategies must include "ip"');
    }

    this.chain = strategies.map((name): [KeyStrategy, StrategyFn] => [name, this.strategy(name)]);
  }

  resolve(context: RateLimitContext): string {
    for (const [name, strategy] of this.chain) {
      const key = strategy(context);
      if (key !== undefined) {
        log.debug('Resolved rate limit key', { strategy: name, key });
        return key;
      }
    }

    // Unreachable while 'ip' is in the chain
    return this.byIp(context);
  }

  private strategy(name: KeyStrategy): StrategyFn {
    switch (name) {
      case 'user':
        return (context) => (context.principal?.id ? `user:${context.principal.id}` : undefined);
      case 'apikey':
        return (context) =>
          context.credential?.id
            ? `apikey:${context.credential.id.slice(0, this.apiKeyPrefixLength)}`
            : undefined;
      case 'ip':
        return (context) => this.byIp(context);
    }
  }

  private byIp(context: RateLimitContext): string {
    const address = context.remoteAddress.trim();
    return `ip:${address || 'unknown'}`;
  }
}
