import { describe, expect, it, vi } from 'vitest';

import { withTimeout } from '../../../src/utils/async';

describe('withTimeout', () => {
  it('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('PONG'), 100)).resolves.toBe('PONG');
  });

  it('passes rejections through', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 100)).rejects.toThrow('refused');
  });

  it('rejects once the timeout elapses', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 250, 'Health probe timed out');
    const assertion = expect(pending).rejects.toThrow('Health probe timed out');

    await vi.advanceTimersByTimeAsync(250);

    await assertion;
  });

  it('clears its timer when the promise settles', async () => {
    vi.useFakeTimers();

    await withTimeout(Promise.resolve(1), 1000);

    expect(vi.getTimerCount()).toBe(0);
  });
});
