/**
 * In-Memory Counter Store
 *
 * Fixed-window counters held in process memory. Used as the fallback when
 * Redis is unavailable, and as the only store when Redis is not configured.
 * Counts are private to this process.
 *
 * Each increment is a synchronous read-modify-write on the map, so it can
 * never interleave with another increment for the same key.
 */

import type { CounterRecord, CounterStore, StoreBackend } from './types';

export interface MemoryCounterStoreOptions {
  /** How often expired windows are swept (ms). 0 disables the sweep. */
  sweepIntervalMs?: number;
}

export class MemoryCounterStore implements CounterStore {
  private windows: Map<string, CounterRecord> = new Map();
  private sweepInterval: NodeJS.Timeout | null = null;

  constructor(options: MemoryCounterStoreOptions = {}) {
    const sweepIntervalMs = options.sweepIntervalMs ?? 60000;
    if (sweepIntervalMs > 0) {
      this.sweepInterval = setInterval(() => this.sweep(), sweepIntervalMs);
      // Don't keep process alive just for the sweep
      this.sweepInterval.unref();
    }
  }

  async incrementAndGet(key: string, windowSeconds: number): Promise<CounterRecord> {
    const now = Date.now();
    const existing = this.windows.get(key);

    if (existing && existing.expiresAt > now) {
      const updated: CounterRecord = { ...existing, count: existing.count + 1 };
      this.windows.set(key, updated);
      return updated;
    }

    // First touch, or the previous window has lapsed
    const created: CounterRecord = {
      key,
      count: 1,
      windowStartedAt: now,
      expiresAt: now + windowSeconds * 1000,
    };
    this.windows.set(key, created);
    return created;
  }

  async reset(key: string): Promise<void> {
    this.windows.delete(key);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  getType(): StoreBackend {
    return 'memory';
  }

  /**
   * Number of live (unexpired) windows
   */
  size(): number {
    const now = Date.now();
    let live = 0;
    for (const record of this.windows.values()) {
      if (record.expiresAt > now) live++;
    }
    return live;
  }

  /**
   * Drop every window whose expiry has passed
   *
   * @returns number of windows removed
   */
  sweep(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, record] of this.windows) {
      if (record.expiresAt <= now) {
        this.windows.delete(key);
        removed++;
      }
    }

    return removed;
  }

  async shutdown(): Promise<void> {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
    this.windows.clear();
  }
}
