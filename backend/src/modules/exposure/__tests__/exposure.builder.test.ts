import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ExposureBuilder } from '../exposure.builder.js';
import { ExposureCache } from '../exposure.cache.js';
import type { ExposureConfig, ExposureRequest } from '../exposure.types.js';
import type { ProductRanking } from '../../scoring/scoring.types.js';
import { DataStoreUnavailableError, OperationCancelledError } from '../../../common/errors.js';
import { MemoryExposureSlotStore, MemoryRankingStore } from '../../../testing/memory-stores.js';
import { FixedClock, StaticFinancials, StaticPromotions, mockLogger } from '../../../testing/fakes.js';
import { parsePromotion } from '../../catalog/promotion.parser.js';

const config: ExposureConfig = {
  popularityWeight: 0.7,
  strategicWeight: 0.3,
  categoryCap: 3,
  coldThreshold: 0.6,
  stockThreshold: 15,
  freshnessThreshold: 0.7,
  cacheTtlSeconds: 600,
  defaultLimit: 12,
};

function ranking(productId: string, exposureScore: number): ProductRanking {
  return {
    productId,
    popularityScore: 0.2,
    coldScore: 0.2,
    profitScore: 0,
    freshnessScore: 0.2,
    exposureScore,
    updatedAt: new Date('2026-03-01T11:00:00Z'),
  };
}

const request: ExposureRequest = { context: 'home', userId: 'u1', categoryId: null, limit: 3 };

describe('ExposureBuilder', () => {
  let clock: FixedClock;
  let logger: ReturnType<typeof mockLogger>;
  let rankings: MemoryRankingStore;
  let slots: MemoryExposureSlotStore;
  let cache: ExposureCache;
  let financials: StaticFinancials;
  let promotions: StaticPromotions;

  const builder = () =>
    new ExposureBuilder({ rankings, slots, cache, financials, promotions, config, logger, clock });

  beforeEach(() => {
    clock = new FixedClock('2026-03-01T12:00:00Z');
    logger = mockLogger();
    rankings = new MemoryRankingStore({ a: 'X', b: 'X', c: 'Y', d: 'Y' });
    rankings.seed([ranking('a', 0.9), ranking('b', 0.8), ranking('c', 0.7), ranking('d', 0.6)]);
    slots = new MemoryExposureSlotStore();
    cache = new ExposureCache({ ttlSeconds: 600, logger, clock });
    financials = new StaticFinancials({
      a: { stockOnHand: 20 },
      b: { stockOnHand: 20 },
      c: { stockOnHand: 20 },
      d: { stockOnHand: 20 },
    });
    promotions = new StaticPromotions();
  });

  it('builds, persists and caches a mix', async () => {
    const res = await builder().build(request);

    expect(res).toEqual({
      context: 'home',
      user_id: 'u1',
      category_id: null,
      generated_at: '2026-03-01T12:00:00.000Z',
      expires_at: '2026-03-01T12:10:00.000Z',
      mix: [
        { product_id: 'a', reason: ['in_stock'], badges: [] },
        { product_id: 'b', reason: ['in_stock'], badges: [] },
        { product_id: 'c', reason: ['in_stock'], badges: [] },
      ],
    });
    expect((await slots.find('home|all', 'u1'))?.payload).toEqual(res);
    expect(await cache.get('home:u1:all')).toEqual({ hit: true, payload: res, tier: 'local' });
  });

  it('avoids repeating the previous mix and backfills from it', async () => {
    await builder().build(request);
    const next = await builder().build(request);

    expect(next.mix.map((i) => i.product_id)).toEqual(['d', 'a', 'b']);
  });

  it('filters candidates by category', async () => {
    const res = await builder().build({ ...request, categoryId: 'Y' });
    expect(res.mix.map((i) => i.product_id)).toEqual(['c', 'd']);
    expect(await slots.find('home|Y', 'u1')).not.toBeNull();
  });

  it('badges products under an active promotion', async () => {
    const parsed = parsePromotion({
      _id: 'promo-x',
      type: 'category',
      categoryIds: ['X'],
      startAt: '2026-02-01T00:00:00Z',
      endAt: '2026-04-01T00:00:00Z',
    });
    if (!parsed.ok) throw new Error(parsed.error);
    promotions = new StaticPromotions([parsed.promotion]);

    const res = await builder().build(request);
    expect(res.mix[0]).toEqual({ product_id: 'a', reason: ['in_stock', 'promo:promo-x'], badges: ['promo'] });
    expect(res.mix[2]).toEqual({ product_id: 'c', reason: ['in_stock'], badges: [] });
  });

  it('builds without badges when promotions are unavailable', async () => {
    promotions.fail = true;
    const res = await builder().build(request);

    expect(res.mix).toHaveLength(3);
    expect(res.mix.every((i) => i.badges.length === 0)).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('treats a failed stock lookup as out of stock', async () => {
    financials = new StaticFinancials({ b: { stockOnHand: 20 }, c: { stockOnHand: 20 } }, new Set(['a']));
    const res = await builder().build(request);

    expect(res.mix[0]).toEqual({ product_id: 'a', reason: [], badges: [] });
  });

  it('looks up stock concurrently and keeps candidate order', async () => {
    const lookup = financials.getFinancialMetrics.bind(financials);
    let inFlight = 0;
    let peak = 0;
    vi.spyOn(financials, 'getFinancialMetrics').mockImplementation(async (productId) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((r) => setTimeout(r, 1));
      inFlight--;
      return lookup(productId);
    });

    const res = await builder().build(request);

    expect(peak).toBe(4);
    expect(res.mix.map((i) => i.product_id)).toEqual(['a', 'b', 'c']);
  });

  it('builds without repeat-avoidance when the previous slot is unreadable', async () => {
    await builder().build(request);
    slots.failReads = true;
    const res = await builder().build(request);

    expect(res.mix.map((i) => i.product_id)).toEqual(['a', 'b', 'c']);
  });

  it('fails when rankings are unavailable', async () => {
    rankings.failReads = true;
    await expect(builder().build(request)).rejects.toBeInstanceOf(DataStoreUnavailableError);
  });

  it('fails when the slot cannot be written', async () => {
    slots.failWrites = true;
    await expect(builder().build(request)).rejects.toBeInstanceOf(DataStoreUnavailableError);
    expect((await cache.get('home:u1:all')).hit).toBe(false);
  });

  it('stops on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(builder().build(request, { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
  });
});
