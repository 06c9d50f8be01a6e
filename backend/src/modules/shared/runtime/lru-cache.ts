/**
 * LRU CACHE
 * =========
 *
 * Bounded map with least-recently-used eviction. Map iteration order is
 * insertion order, so a hit re-inserts the key at the tail and the head is
 * always the eviction victim.
 */

export class LruCache<K, V> {
  private map = new Map<K, V>();
  private evictions = 0;

  constructor(private readonly maxSize: number) {
    if (maxSize < 1) {
      throw new RangeError(`LruCache maxSize must be >= 1, got ${maxSize}`);
    }
  }

  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  set(key: K, value: V): void {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (this.map.size >= this.maxSize) {
      this.evictLru();
    }
    this.map.set(key, value);
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  size(): number {
    return this.map.size;
  }

  keys(): K[] {
    return Array.from(this.map.keys());
  }

  stats() {
    return {
      size: this.map.size,
      maxSize: this.maxSize,
      evictions: this.evictions,
    };
  }

  private evictLru(): void {
    const oldest = this.map.keys().next();
    if (!oldest.done) {
      this.map.delete(oldest.value);
      this.evictions++;
    }
  }
}
