/**
 * Prometheus Metrics
 *
 * Rate limiter metrics on a dedicated registry, so the host service can
 * merge them into its own /metrics output or expose them separately.
 *
 * ## Usage
 *
 * ```typescript
 * import { metrics } from './observability/metrics';
 *
 * res.type(metrics.contentType()).send(await metrics.getMetrics());
 * ```
 */

import { Registry, Counter, Gauge } from 'prom-client';
import type { StoreHealthState } from '../services/rateLimiting/types';

export const registry = new Registry();

/**
 * Decisions by tier, outcome ('allowed' | 'rejected') and backend
 */
export const rateLimitDecisionsTotal = new Counter({
  name: 'ratelimit_decisions_total',
  help: 'Total admission decisions',
  labelNames: ['tier', 'outcome', 'backend'],
  registers: [registry],
});

/**
 * Calls retried against the memory store after a distributed store failure
 */
export const rateLimitStoreFallbacksTotal = new Counter({
  name: 'ratelimit_store_fallbacks_total',
  help: 'Total live failovers from the distributed store to the memory store',
  registers: [registry],
});

/**
 * Distributed store health (1=healthy, 0=degraded)
 */
export const rateLimitStoreHealthState = new Gauge({
  name: 'ratelimit_store_health_state',
  help: 'Distributed counter store health (1=healthy, 0=degraded)',
  registers: [registry],
});

export function recordHealthState(state: StoreHealthState): void {
  rateLimitStoreHealthState.set(state === 'healthy' ? 1 : 0);
}

export const metrics = {
  registry,

  async getMetrics(): Promise<string> {
    return registry.metrics();
  },

  contentType(): string {
    return registry.contentType;
  },

  reset(): void {
    registry.resetMetrics();
  },
};
