import { describe, it, expect, vi } from 'vitest';
import { RequestCoalescer } from '../request-coalescer.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('RequestCoalescer', () => {
  it('runs one build for concurrent callers of a key', async () => {
    const coalescer = new RequestCoalescer<string>();
    const gate = deferred<string>();
    const build = vi.fn(() => gate.promise);

    const calls = Array.from({ length: 10 }, () => coalescer.run('k', build));
    expect(coalescer.state('k')).toBe('BUILDING');
    expect(coalescer.waiters('k')).toBe(9);

    gate.resolve('built');
    const results = await Promise.all(calls);

    expect(results).toEqual(Array(10).fill('built'));
    expect(build).toHaveBeenCalledTimes(1);
    expect(coalescer.state('k')).toBe('IDLE');
    expect(coalescer.stats()).toEqual({ inflight: 0, started: 1, joined: 9 });
  });

  it('keeps different keys independent', async () => {
    const coalescer = new RequestCoalescer<string>();
    const [a, b] = await Promise.all([
      coalescer.run('a', async () => 'A'),
      coalescer.run('b', async () => 'B'),
    ]);
    expect([a, b]).toEqual(['A', 'B']);
  });

  it('delivers a failure to every waiter and frees the key', async () => {
    const coalescer = new RequestCoalescer<string>();
    const gate = deferred<string>();

    const first = coalescer.run('k', () => gate.promise);
    const second = coalescer.run('k', () => gate.promise);
    gate.reject(new Error('boom'));

    await expect(first).rejects.toThrow('boom');
    await expect(second).rejects.toThrow('boom');
    expect(coalescer.size()).toBe(0);

    await expect(coalescer.run('k', async () => 'again')).resolves.toBe('again');
  });

  it('does not start the build synchronously', () => {
    const coalescer = new RequestCoalescer<number>();
    const build = vi.fn(async () => 1);
    const p = coalescer.run('k', build);
    expect(build).not.toHaveBeenCalled();
    return p;
  });

  it('settled waits for a running build whatever its outcome', async () => {
    const coalescer = new RequestCoalescer<string>();
    const gate = deferred<string>();
    const call = coalescer.run('k', () => gate.promise);
    let done = false;
    const waiting = coalescer.settled('k').then(() => {
      done = true;
    });

    await Promise.resolve();
    expect(done).toBe(false);

    gate.reject(new Error('boom'));
    await expect(call).rejects.toThrow('boom');
    await waiting;
    expect(done).toBe(true);
    await expect(coalescer.settled('other')).resolves.toBeUndefined();
  });
});
