/**
 * Rate Limit Middleware
 *
 * Express adapter for the rate limit service: builds a RateLimitContext from
 * the request, charges it, and renders the decision as X-RateLimit-* headers
 * or a 429 response.
 *
 * ## Usage
 *
 * ```typescript
 * import { createRateLimitMiddleware } from '../middleware/rateLimit';
 *
 * const limiter = createRateLimitService();
 *
 * // Tier from req.user / req.apiKey, default tier otherwise
 * app.use('/api', authenticate, createRateLimitMiddleware(limiter));
 *
 * // Route with its own counter and quota, on top of the global limit
 * router.post('/export', createRateLimitMiddleware(limiter, { scope: 'export', quota: '10/minute' }), handler);
 *
 * // Route pinned to a tier (counted under scope 'free' unless one is given)
 * router.post('/search', createRateLimitMiddleware(limiter, { tier: 'free', scope: 'search' }), handler);
 * ```
 *
 * Route-level limiters always count in their own `route:<scope>:` window, so
 * a request passing through a global and a route limiter is charged once in
 * each.
 *
 * The auth layer is expected to set `req.user = { id, tier? }` and/or
 * `req.apiKey = { id, tier? }`. Without them the credential is read from
 * `Authorization: Bearer <key>` or `X-API-Key`, and the client address from
 * the socket (or the first X-Forwarded-For hop when trustProxy is on).
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { getConfig } from '../config';
import { PolicyNotFoundError, RateLimitError } from '../errors';
import { buildRateLimitHeaders, retryAfterSeconds } from '../services/rateLimiting/decision';
import { policyFromQuota } from '../services/rateLimiting/policies';
import type {
  Decision,
  IRateLimitService,
  RateLimitContext,
  RateLimitCredential,
  RateLimitPrincipal,
} from '../services/rateLimiting/types';
import { createLogger, extractError } from '../utils/logger';

const log = createLogger('RATELIMIT_MW');

const IdentitySchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  tier: z.string().min(1).optional(),
});

export interface RateLimitMiddlewareOptions {
  /** Charge every request against this tier instead of the caller's */
  tier?: string;
  /** Charge every request against this quota (e.g. '10/minute'); excludes `tier` */
  quota?: string;
  /** Counter namespace for this limiter. Defaults to `tier` or `quota` when either is set */
  scope?: string;
  /** Message in the 429 body */
  message?: string;
  /** Skip rate limiting for matching requests */
  skip?: (req: Request) => boolean;
  /** Replace the built-in request → context mapping */
  contextFromRequest?: (req: Request) => RateLimitContext;
  /** Defaults to RATE_LIMIT_ENABLED */
  enabled?: boolean;
  /** Honour X-Forwarded-For. Defaults to RATE_LIMIT_TRUST_PROXY */
  trustProxy?: boolean;
}

function readIdentity(value: unknown): RateLimitPrincipal | undefined {
  const parsed = IdentitySchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const header = Array.isArray(value) ? value[0] : value;
  const trimmed = header?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Credential from req.apiKey, then `Authorization: Bearer`, then `X-API-Key`
 */
export function getCredential(req: Request): RateLimitCredential | undefined {
  const attached = 'apiKey' in req ? readIdentity(req.apiKey) : undefined;
  if (attached) return attached;

  const authorization = firstHeader(req.headers.authorization);
  if (authorization?.startsWith('Bearer ')) {
    const token = authorization.slice('Bearer '.length).trim();
    if (token) return { id: token };
  }

  const apiKey = firstHeader(req.headers['x-api-key']);
  return apiKey ? { id: apiKey } : undefined;
}

/**
 * Client address, optionally trusting the first X-Forwarded-For hop
 */
export function getClientIp(req: Request, trustProxy: boolean): string {
  if (trustProxy) {
    const forwarded = firstHeader(req.headers['x-forwarded-for']);
    if (forwarded) {
      return forwarded.split(',')[0].trim();
    }
  }

  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Map an Express request onto the limiter's request context
 */
export function getRateLimitContext(req: Request, trustProxy: boolean): RateLimitContext {
  return {
    principal: 'user' in req ? readIdentity(req.user) : undefined,
    credential: getCredential(req),
    remoteAddress: getClientIp(req, trustProxy),
  };
}

/**
 * Set X-RateLimit-* (and Retry-After when denied) on the response
 */
export function setRateLimitHeaders(res: Response, decision: Decision, now: number = Date.now()): void {
  for (const [name, value] of Object.entries(buildRateLimitHeaders(decision, now))) {
    res.setHeader(name, value);
  }
}

function sendRateLimitResponse(res: Response, decision: Decision, now: number, message?: string): void {
  const error = new RateLimitError(retryAfterSeconds(decision, now), message, {
    limit: decision.limit,
    remaining: decision.remaining,
  });

  res.status(error.statusCode).json(error.toResponse());
}

/**
 * Build rate limiting middleware around a rate limit service
 *
 * @throws PolicyNotFoundError when `options.tier` is not a configured tier
 * @throws Error when `options.quota` is malformed, combined with `tier`, or
 *   `options.scope` is empty
 */
export function createRateLimitMiddleware(
  service: IRateLimitService,
  options: RateLimitMiddlewareOptions = {}
): RequestHandler {
  const { tier, quota, message, skip } = options;

  if (tier !== undefined && quota !== undefined) {
    throw new Error('Rate limit middleware takes a tier or a quota, not both');
  }
  if (tier !== undefined && !service.hasTier(tier)) {
    throw new PolicyNotFoundError(tier);
  }
  if (options.scope !== undefined && options.scope.trim() === '') {
    throw new Error('Rate limit scope must not be empty');
  }

  const scope = options.scope ?? tier ?? quota;
  const routePolicy = quota !== undefined ? policyFromQuota(scope ?? quota, quota) : null;

  const enabled = options.enabled ?? getConfig().rateLimit.enabled;
  const trustProxy = options.trustProxy ?? getConfig().rateLimit.trustProxy;
  const toContext = options.contextFromRequest ?? ((req: Request) => getRateLimitContext(req, trustProxy));

  if (!enabled) {
    log.info('Rate limiting disabled, middleware will pass requests through');
  }

  return async (req: Request, res: Response, next: NextFunction) => {
    if (!enabled || skip?.(req)) {
      return next();
    }

    try {
      const context = toContext(req);
      const decision = routePolicy
        ? await service.checkPolicy(context, routePolicy, { scope })
        : tier
          ? await service.checkTier(context, tier, { scope })
          : await service.check(context, { scope });
      const now = Date.now();

      setRateLimitHeaders(res, decision, now);

      if (!decision.allowed) {
        return sendRateLimitResponse(res, decision, now, message);
      }

      next();
    } catch (error) {
      log.error('Rate limit middleware error', { tier, scope, ...extractError(error) });
      next(error);
    }
  };
}
