/**
 * TTL CACHE
 * =========
 *
 * In-process TTL map. Every entry is timestamped on write; an entry whose
 * age exceeds the TTL, or whose own deadline has passed, is a miss and is
 * evicted on that read.
 *
 * Node runs this on a single thread: get/set/del never interleave, so
 * eviction-on-read cannot race a concurrent set.
 */

import { systemClock, type Clock } from '../../../common/clock.js';

type CacheEntry<T> = {
  value: T;
  storedAt: number;
  expiresAt: number;
};

export interface TtlCacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export class TtlCache<T> {
  private map = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private defaultTtlMs: number,
    private clock: Clock = systemClock
  ) {}

  get(key: string): T | null {
    const e = this.map.get(key);
    if (!e) {
      this.misses++;
      return null;
    }
    if (this.isExpired(e, this.clock.now())) {
      this.map.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return e.value;
  }

  /**
   * Set value. `expiresAtMs` can shorten the entry's life below the TTL,
   * never extend it.
   */
  set(key: string, value: T, expiresAtMs?: number) {
    const now = this.clock.now();
    const ttlDeadline = now + this.defaultTtlMs;
    this.map.set(key, {
      value,
      storedAt: now,
      expiresAt: expiresAtMs === undefined ? ttlDeadline : Math.min(expiresAtMs, ttlDeadline),
    });
  }

  del(key: string): boolean {
    return this.map.delete(key);
  }

  clear() {
    this.map.clear();
  }

  size(): number {
    return this.map.size;
  }

  stats(): TtlCacheStats {
    return {
      size: this.map.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }

  /**
   * Prune expired entries
   */
  prune(): number {
    const now = this.clock.now();
    let pruned = 0;
    for (const [k, e] of this.map.entries()) {
      if (this.isExpired(e, now)) {
        this.map.delete(k);
        pruned++;
      }
    }
    return pruned;
  }

  private isExpired(e: CacheEntry<T>, now: number): boolean {
    return now - e.storedAt > this.defaultTtlMs || now > e.expiresAt;
  }
}
