/**
 * EXPOSURE — Cache
 *
 * Two tiers in front of the exposure builder:
 * - local: in-process TtlCache, always present
 * - shared: optional store visible to every instance
 *
 * Writes go to both tiers. Reads prefer the shared tier and fall back to
 * the local one. A failing shared tier is logged and skipped; callers
 * only ever see a hit or a miss.
 */

import { systemClock, type Clock } from '../../common/clock.js';
import type { Logger } from '../../common/logger.js';
import { errorMessage } from '../../common/errors.js';
import { TtlCache, type TtlCacheStats } from '../shared/runtime/ttl-cache.js';
import type { ExposureResponse } from './exposure.types.js';

export interface SharedCacheTier {
  get(key: string): Promise<ExposureResponse | null>;
  set(key: string, payload: ExposureResponse, expiresAt: Date): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export type CacheLookup =
  | { hit: true; payload: ExposureResponse; tier: 'shared' | 'local' }
  | { hit: false; payload: null };

export interface ExposureCacheOptions {
  ttlSeconds: number;
  logger: Logger;
  shared?: SharedCacheTier | null;
  clock?: Clock;
}

export class ExposureCache {
  private readonly local: TtlCache<ExposureResponse>;
  private readonly shared: SharedCacheTier | null;
  private readonly logger: Logger;
  private sharedFailures = 0;

  constructor(opts: ExposureCacheOptions) {
    this.local = new TtlCache<ExposureResponse>(opts.ttlSeconds * 1000, opts.clock ?? systemClock);
    this.shared = opts.shared ?? null;
    this.logger = opts.logger;
  }

  async get(key: string): Promise<CacheLookup> {
    if (this.shared) {
      try {
        const payload = await this.shared.get(key);
        if (payload) return { hit: true, payload, tier: 'shared' };
      } catch (err) {
        this.onSharedFailure('get', key, err);
      }
    }
    const payload = this.local.get(key);
    return payload ? { hit: true, payload, tier: 'local' } : { hit: false, payload: null };
  }

  /**
   * `expiresAtUnix` is in seconds.
   */
  async set(key: string, payload: ExposureResponse, expiresAtUnix: number): Promise<void> {
    const expiresAtMs = expiresAtUnix * 1000;
    this.local.prune();
    this.local.set(key, payload, expiresAtMs);
    if (this.shared) {
      try {
        await this.shared.set(key, payload, new Date(expiresAtMs));
      } catch (err) {
        this.onSharedFailure('set', key, err);
      }
    }
  }

  /**
   * Without a key every entry goes.
   */
  async clear(key?: string): Promise<void> {
    if (key === undefined) {
      this.local.clear();
    } else {
      this.local.del(key);
    }
    if (this.shared) {
      try {
        await (key === undefined ? this.shared.clear() : this.shared.delete(key));
      } catch (err) {
        this.onSharedFailure('clear', key ?? '*', err);
      }
    }
  }

  stats(): TtlCacheStats & { sharedEnabled: boolean; sharedFailures: number } {
    return { ...this.local.stats(), sharedEnabled: this.shared !== null, sharedFailures: this.sharedFailures };
  }

  private onSharedFailure(op: string, key: string, err: unknown) {
    this.sharedFailures++;
    this.logger.warn({ op, key, err: errorMessage(err) }, '[ExposureCache] Shared tier unavailable, using local tier');
  }
}
