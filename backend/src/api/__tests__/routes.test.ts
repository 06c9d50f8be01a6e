import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp } from '../../testing/test-engine.js';
import { MemoryEngagementStore, MemoryRankingStore } from '../../testing/memory-stores.js';
import { StaticFinancials } from '../../testing/fakes.js';

describe('HTTP routes', () => {
  let ctx: ReturnType<typeof buildTestApp>;

  beforeEach(async () => {
    const rankings = new MemoryRankingStore({ a: 'X', b: 'X', c: 'Y' });
    rankings.seed(
      [
        ['a', 0.9],
        ['b', 0.8],
        ['c', 0.7],
      ].map(([productId, exposureScore]) => ({
        productId: String(productId),
        popularityScore: 0.6,
        coldScore: 0.1,
        profitScore: 0,
        freshnessScore: 0.1,
        exposureScore: Number(exposureScore),
        updatedAt: new Date('2026-03-01T11:00:00Z'),
      }))
    );
    ctx = buildTestApp({
      parts: {
        rankings,
        engagementStore: new MemoryEngagementStore(),
        financials: new StaticFinancials({ a: { stockOnHand: 30, margin: 4 } }),
      },
    });
    await ctx.app.ready();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('GET /health reports cache stats', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      ts: '2026-03-01T12:00:00.000Z',
      cache: { size: 0, hits: 0, misses: 0, hitRate: 0 },
    });
  });

  it('unknown routes get the error envelope', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  describe('exposure', () => {
    it('GET /exposure returns a mix', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/exposure?context=home&limit=2&user_id=' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        context: 'home',
        user_id: null,
        category_id: null,
        generated_at: '2026-03-01T12:00:00.000Z',
        expires_at: '2026-03-01T12:10:00.000Z',
        mix: [
          { product_id: 'a', reason: ['popular_70', 'in_stock'], badges: [] },
          { product_id: 'b', reason: ['popular_70'], badges: [] },
        ],
      });
    });

    it('uses the configured default limit', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/exposure?context=home&category_id=X' });
      expect(res.json().mix).toHaveLength(2);
      expect(res.json().category_id).toBe('X');
    });

    it.each([
      ['/exposure', 'missing context'],
      ['/exposure?context=h', 'short context'],
      ['/exposure?context=home&limit=0', 'limit below 1'],
      ['/exposure?context=home&limit=51', 'limit above 50'],
      ['/exposure?context=home&limit=abc', 'non-numeric limit'],
    ])('rejects %s (%s)', async (url) => {
      const res = await ctx.app.inject({ method: 'GET', url });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });

    it('POST /exposure/refresh rebuilds', async () => {
      await ctx.app.inject({ method: 'GET', url: '/exposure?context=home&limit=2' });
      const res = await ctx.app.inject({ method: 'POST', url: '/exposure/refresh?context=home&limit=2' });

      expect(res.statusCode).toBe(200);
      expect(res.json().mix.map((i: { product_id: string }) => i.product_id)).toEqual(['c', 'a']);
    });

    it('DELETE /exposure/cache clears', async () => {
      await ctx.app.inject({ method: 'GET', url: '/exposure?context=home&limit=2' });
      const res = await ctx.app.inject({ method: 'DELETE', url: '/exposure/cache?context=home' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'cleared' });
      expect(ctx.parts.slots.slots.size).toBe(0);
    });

    it('maps a ranking store outage to 503', async () => {
      ctx.parts.rankings.failReads = true;
      const res = await ctx.app.inject({ method: 'GET', url: '/exposure?context=home' });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({
        ok: false,
        error: 'DATA_STORE_UNAVAILABLE',
        message: 'Could not build mix: rankings unavailable',
      });
    });
  });

  describe('events', () => {
    it('POST /events accepts an event', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/events',
        payload: { event_type: 'view', product_id: 'p1', user_id: 'u1', timestamp: '2026-03-01T09:30:00Z' },
      });

      expect(res.statusCode).toBe(202);
      expect(res.json()).toEqual({
        product_id: 'p1',
        date: '2026-03-01',
        views: 1,
        clicks: 0,
        carts: 0,
        purchases: 0,
        revenue: 0,
      });
    });

    it('POST /events rejects an unknown event type', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/events',
        payload: { event_type: 'hover', product_id: 'p1' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });

    it('GET /events/customers/:id lists daily rows', async () => {
      await ctx.app.inject({
        method: 'POST',
        url: '/events',
        payload: {
          event_type: 'purchase',
          product_id: 'p1',
          user_id: 'u1',
          price: 12.5,
          timestamp: '2026-03-01T09:30:00Z',
          metadata: { quantity: 2 },
        },
      });
      const res = await ctx.app.inject({ method: 'GET', url: '/events/customers/u1?day=2026-03-01' });

      expect(res.json()).toEqual([
        { customer_id: 'u1', date: '2026-03-01', views: 0, clicks: 0, carts: 0, purchases: 2, points_earned: 20 },
      ]);
      const products = await ctx.app.inject({ method: 'GET', url: '/events/products/p1' });
      expect(products.json()[0].revenue).toBe(25);
    });

    it('rejects a malformed day filter', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/events/products/p1?day=March' });
      expect(res.statusCode).toBe(400);
    });
  });

  describe('scoring', () => {
    beforeEach(() => {
      ctx.parts.engagementStore.seed([
        { productId: 'p1', date: '2026-03-01', views: 10, clicks: 2, carts: 1, purchases: 2, revenue: 40 },
        { productId: 'p2', date: '2026-02-27', views: 5, clicks: 0, carts: 0, purchases: 0, revenue: 0 },
      ]);
    });

    it('POST /internal/scoring/run scores the window', async () => {
      const res = await ctx.app.inject({ method: 'POST', url: '/internal/scoring/run', payload: { window_days: 7 } });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ updated: ['p1', 'p2'], count: 2, window_days: 7 });
    });

    it('rejects an out-of-range window', async () => {
      const res = await ctx.app.inject({ method: 'POST', url: '/internal/scoring/run?window_days=400' });
      expect(res.statusCode).toBe(400);
    });

    it('GET /internal/scoring/rankings returns wire rows', async () => {
      await ctx.app.inject({ method: 'POST', url: '/internal/scoring/run' });
      const res = await ctx.app.inject({ method: 'GET', url: '/internal/scoring/rankings?limit=1' });

      expect(res.statusCode).toBe(200);
      const rows = res.json();
      expect(rows).toHaveLength(1);
      expect(rows[0].product_id).toBe('p1');
      expect(Object.keys(rows[0]).sort()).toEqual([
        'cold_score',
        'computed_at',
        'exposure_score',
        'freshness_score',
        'popularity_score',
        'product_id',
        'profit_score',
      ]);
      expect(rows[0].computed_at).toBe('2026-03-01T12:00:00.000Z');
    });
  });
});
