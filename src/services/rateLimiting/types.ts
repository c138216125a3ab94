/**
 * Rate Limiting Types
 *
 * Interfaces and types for the tiered, fixed-window rate limiter.
 */

/**
 * Quota for one tier
 */
export interface RateLimitPolicy {
  /** Tier name, e.g. 'free', 'pro', 'enterprise' */
  tier: string;
  /** Maximum requests allowed in one window */
  limit: number;
  /** Window length in seconds */
  windowSeconds: number;
}

/**
 * Identity attached to a request by the host's auth layer
 */
export interface RateLimitPrincipal {
  id: string;
  tier?: string;
}

/**
 * API credential attached to a request (id is the raw key or its public id)
 */
export interface RateLimitCredential {
  id: string;
  tier?: string;
}

/**
 * Everything the limiter needs to know about an inbound request
 */
export interface RateLimitContext {
  principal?: RateLimitPrincipal;
  credential?: RateLimitCredential;
  remoteAddress: string;
}

/**
 * Key generation strategies, evaluated in the configured order
 */
export type KeyStrategy = 'user' | 'apikey' | 'ip';

export type StoreBackend = 'redis' | 'memory';

/**
 * One fixed window for one key. Times are ms since epoch.
 */
export interface CounterRecord {
  key: string;
  count: number;
  windowStartedAt: number;
  expiresAt: number;
}

/**
 * Atomic increment-and-read over a key with a fixed expiry
 */
export interface CounterStore {
  /**
   * Increment the key's counter, creating a window that expires
   * `windowSeconds` from now if none exists. Never extends an existing window.
   */
  incrementAndGet(key: string, windowSeconds: number): Promise<CounterRecord>;

  /**
   * Drop the key's current window
   */
  reset(key: string): Promise<void>;

  /**
   * Whether the store is reachable
   */
  ping(): Promise<boolean>;

  getType(): StoreBackend;

  /**
   * Release timers and connections
   */
  shutdown(): Promise<void>;
}

/**
 * Admission decision for one request
 */
export interface Decision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** When the current window resets (ms since epoch) */
  resetAt: number;
  tier: string;
  key: string;
  backend: StoreBackend;
}

export type StoreHealthState = 'healthy' | 'degraded';

export type HealthStateListener = (state: StoreHealthState, previous: StoreHealthState) => void;

/**
 * Read side of the health monitor used by the limiter
 */
export interface IStoreHealth {
  getState(): StoreHealthState;
  reportFailure(error: unknown): void;
}

export interface RateLimitHealth {
  state: StoreHealthState;
  backend: StoreBackend;
  distributed: boolean;
  tiers: string[];
}

/**
 * Per-call options for the check methods
 */
export interface CheckOptions {
  /**
   * Count in a separate window namespace (`route:<scope>:<key>`), so a
   * route-level limit never shares a counter with the global one
   */
  scope?: string;
}

/**
 * Rate limit service interface
 */
export interface IRateLimitService {
  /**
   * Resolve key and tier, then charge one request
   */
  check(context: RateLimitContext, options?: CheckOptions): Promise<Decision>;

  /**
   * Charge one request against an explicitly named tier
   */
  checkTier(context: RateLimitContext, tier: string, options?: CheckOptions): Promise<Decision>;

  /**
   * Charge one request against a policy outside the tier table
   */
  checkPolicy(context: RateLimitContext, policy: RateLimitPolicy, options?: CheckOptions): Promise<Decision>;

  /**
   * Resolve key, tier and policy without charging
   */
  peekPolicy(context: RateLimitContext): { key: string; policy: RateLimitPolicy };

  hasTier(tier: string): boolean;

  reset(key: string): Promise<void>;

  getHealth(): RateLimitHealth;

  shutdown(): Promise<void>;
}
