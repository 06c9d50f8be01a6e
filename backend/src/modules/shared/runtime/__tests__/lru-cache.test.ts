import { describe, it, expect } from 'vitest';
import { LruCache } from '../lru-cache.js';

describe('LruCache', () => {
  it('evicts the least recently used key', () => {
    const lru = new LruCache<string, number>(2);
    lru.set('a', 1);
    lru.set('b', 2);
    lru.get('a');
    lru.set('c', 3);

    expect(lru.keys()).toEqual(['a', 'c']);
    expect(lru.has('b')).toBe(false);
    expect(lru.stats()).toEqual({ size: 2, maxSize: 2, evictions: 1 });
  });

  it('overwriting a key refreshes it without evicting', () => {
    const lru = new LruCache<string, number>(2);
    lru.set('a', 1);
    lru.set('b', 2);
    lru.set('a', 10);

    expect(lru.keys()).toEqual(['b', 'a']);
    expect(lru.get('a')).toBe(10);
    expect(lru.stats().evictions).toBe(0);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new LruCache<string, number>(0)).toThrow(RangeError);
  });
});
