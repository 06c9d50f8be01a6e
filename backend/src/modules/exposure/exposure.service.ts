/**
 * EXPOSURE — Service
 *
 * GetExposure serves from cache and builds on a miss. Concurrent misses on
 * one cache key share a single build; the waiters all receive its result,
 * cut to their own limit. The key leaves out the limit, so a cached or
 * shared mix is always trimmed before it is returned.
 *
 * A clear waits for the key's running build before dropping the slot and
 * cache entry, so a build started earlier cannot write them back.
 */

import type { Logger } from '../../common/logger.js';
import { RequestCoalescer } from '../shared/runtime/request-coalescer.js';
import type { ExposureBuilder } from './exposure.builder.js';
import type { ExposureCache } from './exposure.cache.js';
import {
  cacheKeyFor,
  slotKeyFor,
  type ExposureConfig,
  type ExposureRequest,
  type ExposureResponse,
  type ExposureSlotStore,
} from './exposure.types.js';

export interface ExposureServiceDeps {
  builder: ExposureBuilder;
  cache: ExposureCache;
  slots: ExposureSlotStore;
  config: ExposureConfig;
  logger: Logger;
}

export interface ClearCacheRequest {
  context?: string;
  userId?: string | null;
  categoryId?: string | null;
}

export interface ClearCacheResult {
  scope: 'all' | 'key';
  slotsRemoved: number;
}

export function fitToLimit(payload: ExposureResponse, limit: number): ExposureResponse {
  if (payload.mix.length <= limit) return payload;
  return { ...payload, mix: payload.mix.slice(0, limit) };
}

export class ExposureService {
  private readonly flights = new RequestCoalescer<ExposureResponse>();

  constructor(private deps: ExposureServiceDeps) {}

  get config(): ExposureConfig {
    return this.deps.config;
  }

  async getExposure(req: ExposureRequest): Promise<ExposureResponse> {
    const key = cacheKeyFor(req.context, req.userId, req.categoryId);
    const cached = await this.deps.cache.get(key);
    if (cached.hit) {
      this.deps.logger.debug?.({ key, tier: cached.tier }, '[Exposure] Cache hit');
      return fitToLimit(cached.payload, req.limit);
    }
    return this.build(key, req);
  }

  /**
   * Rebuild ignoring the cache. Joins a build already in flight for the key.
   */
  refreshExposure(req: ExposureRequest): Promise<ExposureResponse> {
    const key = cacheKeyFor(req.context, req.userId, req.categoryId);
    return this.build(key, req);
  }

  async clearCache(req: ClearCacheRequest = {}): Promise<ClearCacheResult> {
    if (req.context === undefined) {
      await this.flights.settled();
      await this.deps.cache.clear();
      const slotsRemoved = await this.deps.slots.deleteAll();
      this.deps.logger.info({ slotsRemoved }, '[Exposure] Cache cleared');
      return { scope: 'all', slotsRemoved };
    }

    const userId = req.userId ?? null;
    const categoryId = req.categoryId ?? null;
    const key = cacheKeyFor(req.context, userId, categoryId);
    await this.flights.settled(key);
    await this.deps.cache.clear(key);
    const slotsRemoved = await this.deps.slots.delete(slotKeyFor(req.context, categoryId), userId);
    this.deps.logger.info({ key, slotsRemoved }, '[Exposure] Cache entry cleared');
    return { scope: 'key', slotsRemoved };
  }

  private async build(key: string, req: ExposureRequest): Promise<ExposureResponse> {
    const payload = await this.flights.run(key, () => this.deps.builder.build(req));
    return fitToLimit(payload, req.limit);
  }

  cacheStats() {
    return { ...this.deps.cache.stats(), inFlight: this.flights.size() };
  }
}
