import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, withTimeout } from '../with-timeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the value when it arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'lookup')).resolves.toBe(42);
  });

  it('rejects with TimeoutError once the deadline passes', async () => {
    vi.useFakeTimers();
    const never = new Promise<number>(() => {});
    const result = withTimeout(never, 50, 'lookup');
    const assertion = expect(result).rejects.toThrow('lookup timed out after 50ms');

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('passes through the underlying rejection', async () => {
    const err = await withTimeout(Promise.reject(new Error('down')), 100).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(Error);
    expect(err).not.toBeInstanceOf(TimeoutError);
  });
});
