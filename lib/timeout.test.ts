import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from './errors';
import { withTimeout } from './timeout';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the operation result', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'Op')).resolves.toBe('done');
  });

  it('passes operation errors through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'Op')).rejects.toThrow('boom');
  });

  it('rejects with a TimeoutError once the bound passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 50, 'Search');
    const assertion = expect(pending).rejects.toThrow(new TimeoutError('Search', 50));

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('clears its timer after settling', async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve(1), 1000, 'Op');
    expect(vi.getTimerCount()).toBe(0);
  });
});
