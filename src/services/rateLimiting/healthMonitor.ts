/**
 * Store Health Monitor
 *
 * Decides whether the limiter counts in Redis or in process memory.
 *
 * ## States
 *
 * - healthy: counters live in the distributed store
 * - degraded: counters live in the memory store of this process
 *
 * ## Transitions
 *
 * - healthy → degraded: a probe fails, or a live call reports a failure
 * - degraded → healthy: a probe that started after the last reported
 *   failure succeeds
 *
 * Probes run on a fixed interval regardless of traffic, so failback does not
 * wait for requests. A live failure flips the state at once, so during an
 * outage only the request that hit the failure pays for a timeout.
 *
 * This class is the only writer of the state; the limiter only reads it.
 */

import { withTimeout } from '../../utils/async';
import { createLogger, extractError } from '../../utils/logger';
import type { CounterStore, HealthStateListener, IStoreHealth, StoreHealthState } from './types';

const log = createLogger('HEALTH');

export interface HealthMonitorOptions {
  /** Time between probes (ms) */
  probeIntervalMs: number;
  /** Longest a probe may take before it counts as a failure (ms) */
  probeTimeoutMs: number;
  /** Called when the state changes */
  onStateChange?: HealthStateListener;
}

export interface HealthMonitorStats {
  state: StoreHealthState;
  probes: number;
  failedProbes: number;
  reportedFailures: number;
  lastProbeAt: Date | null;
  lastFailureAt: Date | null;
  lastStateChangeAt: Date;
}

export class StoreHealthMonitor implements IStoreHealth {
  private state: StoreHealthState = 'healthy';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<StoreHealthState> | null = null;
  private listeners = new Set<HealthStateListener>();
  private probes = 0;
  private failedProbes = 0;
  private reportedFailures = 0;
  /** Bumped by reportFailure(); a probe that straddles a bump is stale */
  private failureEpoch = 0;
  private lastProbeAt: Date | null = null;
  private lastFailureAt: Date | null = null;
  private lastStateChangeAt: Date = new Date();
  private readonly store: CounterStore;
  private readonly options: HealthMonitorOptions;

  constructor(store: CounterStore, options: HealthMonitorOptions) {
    this.store = store;
    this.options = options;
    if (options.onStateChange) {
      this.listeners.add(options.onStateChange);
    }
  }

  getState(): StoreHealthState {
    return this.state;
  }

  /**
   * Start probing on the configured interval. The first probe runs immediately.
   */
  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.runScheduledProbe(), this.options.probeIntervalMs);
    // Don't keep process alive just for probing
    this.timer.unref();
    this.runScheduledProbe();

    log.info('Store health monitor started', {
      backend: this.store.getType(),
      intervalMs: this.options.probeIntervalMs,
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Store health monitor stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Probe the store once and apply the result. Concurrent callers share the
   * probe already in flight.
   */
  probe(): Promise<StoreHealthState> {
    if (!this.inFlight) {
      this.inFlight = this.executeProbe().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * A live call against the store just failed
   */
  reportFailure(error: unknown): void {
    this.reportedFailures++;
    this.failureEpoch++;
    this.lastFailureAt = new Date();

    if (this.state === 'healthy') {
      log.warn('Live store call failed', { backend: this.store.getType(), ...extractError(error) });
    }
    this.transitionTo('degraded');
  }

  /**
   * Subscribe to state changes
   *
   * @returns unsubscribe function
   */
  onStateChange(listener: HealthStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getStats(): HealthMonitorStats {
    return {
      state: this.state,
      probes: this.probes,
      failedProbes: this.failedProbes,
      reportedFailures: this.reportedFailures,
      lastProbeAt: this.lastProbeAt,
      lastFailureAt: this.lastFailureAt,
      lastStateChangeAt: this.lastStateChangeAt,
    };
  }

  private runScheduledProbe(): void {
    this.probe().catch((error: unknown) => {
      log.error('Health probe crashed', extractError(error));
    });
  }

  private async executeProbe(): Promise<StoreHealthState> {
    this.probes++;
    this.lastProbeAt = new Date();
    const epoch = this.failureEpoch;

    let healthy: boolean;
    try {
      healthy = await withTimeout(this.store.ping(), this.options.probeTimeoutMs, 'Health probe timed out');
    } catch (error) {
      log.debug('Health probe failed', extractError(error));
      healthy = false;
    }

    if (!healthy) {
      this.failedProbes++;
      this.lastFailureAt = new Date();
    } else if (epoch !== this.failureEpoch) {
      // A live call failed while this ping was in flight; its success is stale
      log.debug('Discarding probe result older than a reported failure');
      return this.state;
    }

    this.transitionTo(healthy ? 'healthy' : 'degraded');
    return this.state;
  }

  private transitionTo(next: StoreHealthState): void {
    const previous = this.state;
    if (previous === next) return;

    this.state = next;
    this.lastStateChangeAt = new Date();

    if (next === 'degraded') {
      log.warn('Distributed store unavailable, counting in memory', { backend: this.store.getType() });
    } else {
      log.info('Distributed store recovered', { backend: this.store.getType() });
    }

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        log.error('Health state listener failed', extractError(error));
      }
    }
  }
}
