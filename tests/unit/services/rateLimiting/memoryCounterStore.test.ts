import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MemoryCounterStore } from '../../../../src/services/rateLimiting/memoryCounterStore';

const T0 = new Date('2026-03-01T12:00:00.000Z').getTime();

describe('MemoryCounterStore', () => {
  let store: MemoryCounterStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    store = new MemoryCounterStore({ sweepIntervalMs: 60000 });
  });

  afterEach(async () => {
    await store.shutdown();
  });

  it('creates a window on first touch', async () => {
    const record = await store.incrementAndGet('user:1', 10);

    expect(record).toEqual({
      key: 'user:1',
      count: 1,
      windowStartedAt: T0,
      expiresAt: T0 + 10000,
    });
  });

  it('increments within the window without moving the expiry', async () => {
    await store.incrementAndGet('user:1', 10);
    vi.setSystemTime(T0 + 4000);
    await store.incrementAndGet('user:1', 10);
    vi.setSystemTime(T0 + 9999);
    const record = await store.incrementAndGet('user:1', 10);

    expect(record.count).toBe(3);
    expect(record.windowStartedAt).toBe(T0);
    expect(record.expiresAt).toBe(T0 + 10000);
  });

  it('starts a fresh window once the previous one expires', async () => {
    await store.incrementAndGet('user:1', 10);
    await store.incrementAndGet('user:1', 10);
    vi.setSystemTime(T0 + 10000);

    const record = await store.incrementAndGet('user:1', 10);

    expect(record).toEqual({
      key: 'user:1',
      count: 1,
      windowStartedAt: T0 + 10000,
      expiresAt: T0 + 20000,
    });
  });

  it('keeps keys independent', async () => {
    await store.incrementAndGet('user:1', 10);
    await store.incrementAndGet('user:1', 10);
    const other = await store.incrementAndGet('user:2', 10);

    expect(other.count).toBe(1);
  });

  it('applies every concurrent increment exactly once', async () => {
    const records = await Promise.all(
      Array.from({ length: 50 }, () => store.incrementAndGet('ip:203.0.113.9', 60))
    );

    const counts = records.map((r) => r.count).sort((a, b) => a - b);
    expect(counts).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
    expect(new Set(records.map((r) => r.expiresAt))).toEqual(new Set([T0 + 60000]));
  });

  it('reset drops the window', async () => {
    await store.incrementAndGet('user:1', 10);
    await store.incrementAndGet('user:1', 10);
    await store.reset('user:1');

    const record = await store.incrementAndGet('user:1', 10);
    expect(record.count).toBe(1);
  });

  it('sweeps expired windows on its interval', async () => {
    await store.incrementAndGet('user:short', 10);
    await store.incrementAndGet('user:long', 600);
    expect(store.size()).toBe(2);

    vi.advanceTimersByTime(60000);

    expect(store.size()).toBe(1);
    expect(store.sweep()).toBe(0);
  });

  it('sweep reports how many windows it removed', async () => {
    await store.incrementAndGet('a', 1);
    await store.incrementAndGet('b', 1);
    vi.setSystemTime(T0 + 1000);

    expect(store.sweep()).toBe(2);
  });

  it('is always healthy and reports its type', async () => {
    expect(await store.ping()).toBe(true);
    expect(store.getType()).toBe('memory');
  });

  it('shutdown stops the sweep and clears state', async () => {
    await store.incrementAndGet('user:1', 10);
    await store.shutdown();

    expect(store.size()).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });
});
