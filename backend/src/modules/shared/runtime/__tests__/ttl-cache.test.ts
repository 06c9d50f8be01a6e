import { describe, it, expect } from 'vitest';
import { TtlCache } from '../ttl-cache.js';
import { FixedClock } from '../../../../testing/fakes.js';

describe('TtlCache', () => {
  it('returns a value until its TTL elapses', () => {
    const clock = new FixedClock('2026-03-01T10:00:00Z');
    const cache = new TtlCache<string>(1_000, clock);

    cache.set('k', 'v');
    clock.advance(1_000);
    expect(cache.get('k')).toBe('v');

    clock.advance(1);
    expect(cache.get('k')).toBeNull();
    expect(cache.size()).toBe(0);
  });

  it('honours an explicit deadline shorter than the TTL', () => {
    const clock = new FixedClock('2026-03-01T10:00:00Z');
    const cache = new TtlCache<number>(10_000, clock);

    cache.set('k', 1, clock.now() + 500);
    clock.advance(501);
    expect(cache.get('k')).toBeNull();
  });

  it('never extends an entry past the TTL', () => {
    const clock = new FixedClock('2026-03-01T10:00:00Z');
    const cache = new TtlCache<number>(1_000, clock);

    cache.set('k', 1, clock.now() + 60_000);
    clock.advance(1_001);
    expect(cache.get('k')).toBeNull();
  });

  it('counts hits and misses', () => {
    const clock = new FixedClock('2026-03-01T10:00:00Z');
    const cache = new TtlCache<number>(1_000, clock);

    cache.set('a', 1);
    cache.get('a');
    cache.get('a');
    cache.get('a');
    cache.get('missing');

    expect(cache.stats()).toEqual({ size: 1, hits: 3, misses: 1, hitRate: 75 });
  });

  it('prunes expired entries', () => {
    const clock = new FixedClock('2026-03-01T10:00:00Z');
    const cache = new TtlCache<number>(1_000, clock);

    cache.set('old', 1);
    clock.advance(800);
    cache.set('new', 2);
    clock.advance(300);

    expect(cache.prune()).toBe(1);
    expect(cache.get('new')).toBe(2);
  });
});
