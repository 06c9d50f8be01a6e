/**
 * EXPOSURE — Builder
 *
 * BuildExposure(context, userId, categoryId, limit):
 *   promotions → top limit*4 ranked candidates → previous slot → stock per
 *   candidate (batched) → selection passes → persist slot → write-through cache.
 *
 * Rankings are read, never written here. A failed promotion, stock or
 * previous-slot read degrades the mix; failing to read rankings or to
 * persist the slot fails the build.
 */

import { systemClock, type Clock } from '../../common/clock.js';
import type { Logger } from '../../common/logger.js';
import { DataStoreUnavailableError, OperationCancelledError, errorMessage } from '../../common/errors.js';
import { withTimeout } from '../shared/runtime/with-timeout.js';
import type { FinancialMetricsProvider, Promotion, PromotionProvider } from '../catalog/catalog.types.js';
import { buildPromotionIndex, resolvePromotion } from '../catalog/promotion.matcher.js';
import type { RankingCandidate, RankingStore } from '../scoring/scoring.types.js';
import type { ExposureCache } from './exposure.cache.js';
import { selectMix, type SelectionCandidate } from './exposure.selection.js';
import {
  cacheKeyFor,
  slotKeyFor,
  type ExposureConfig,
  type ExposureRequest,
  type ExposureResponse,
  type ExposureSlot,
  type ExposureSlotStore,
} from './exposure.types.js';

const CANDIDATE_MULTIPLIER = 4;
/** stock lookups in flight at once */
const STOCK_LOOKUP_BATCH = 8;

export interface ExposureBuilderDeps {
  rankings: RankingStore;
  slots: ExposureSlotStore;
  cache: ExposureCache;
  financials: FinancialMetricsProvider;
  promotions: PromotionProvider;
  config: ExposureConfig;
  logger: Logger;
  clock?: Clock;
  collaboratorTimeoutMs?: number;
}

export interface BuildOptions {
  signal?: AbortSignal;
}

export function previouslyShown(slot: ExposureSlot | null): Set<string> {
  if (!slot) return new Set();
  return new Set(slot.payload.mix.map((item) => item.product_id).filter((id) => id.length > 0));
}

export class ExposureBuilder {
  private readonly clock: Clock;
  private readonly timeoutMs: number;

  constructor(private deps: ExposureBuilderDeps) {
    this.clock = deps.clock ?? systemClock;
    this.timeoutMs = deps.collaboratorTimeoutMs ?? 2_000;
  }

  async build(req: ExposureRequest, opts: BuildOptions = {}): Promise<ExposureResponse> {
    const { config, logger } = this.deps;
    const startedAt = this.clock.now();
    const slotKey = slotKeyFor(req.context, req.categoryId);
    const cacheKey = cacheKeyFor(req.context, req.userId, req.categoryId);

    const promotionIndex = buildPromotionIndex(await this.loadPromotions(slotKey));

    let ranked: RankingCandidate[];
    try {
      ranked = await this.deps.rankings.topCandidates({
        categoryId: req.categoryId,
        limit: req.limit * CANDIDATE_MULTIPLIER,
      });
    } catch (err) {
      logger.error({ slotKey, err: errorMessage(err) }, '[Exposure] Rankings unavailable');
      throw new DataStoreUnavailableError('Could not build mix: rankings unavailable', errorMessage(err));
    }

    const previous = await this.loadPreviousSlot(slotKey, req.userId);
    const shown = previouslyShown(previous);

    const candidates: SelectionCandidate[] = [];
    for (let i = 0; i < ranked.length; i += STOCK_LOOKUP_BATCH) {
      this.checkCancelled(opts.signal);
      const batch = ranked.slice(i, i + STOCK_LOOKUP_BATCH);
      const stock = await Promise.all(batch.map(({ ranking }) => this.stockFor(ranking.productId)));
      batch.forEach(({ ranking, categoryId }, j) => {
        candidates.push({
          productId: ranking.productId,
          categoryId,
          popularityScore: ranking.popularityScore,
          coldScore: ranking.coldScore,
          freshnessScore: ranking.freshnessScore,
          exposureScore: ranking.exposureScore,
          stockOnHand: stock[j],
          promotion: resolvePromotion(promotionIndex, { productId: ranking.productId, categoryId }, req.userId),
        });
      });
    }

    const mix = selectMix(candidates, shown, {
      limit: req.limit,
      categoryCap: config.categoryCap,
      coldThreshold: config.coldThreshold,
      stockThreshold: config.stockThreshold,
      freshnessThreshold: config.freshnessThreshold,
      popularityWeight: config.popularityWeight,
      strategicWeight: config.strategicWeight,
    });

    const generatedAt = this.clock.utcNow();
    const expiresAt = new Date(generatedAt.getTime() + config.cacheTtlSeconds * 1000);
    const payload: ExposureResponse = {
      context: req.context,
      user_id: req.userId,
      category_id: req.categoryId,
      generated_at: generatedAt.toISOString(),
      expires_at: expiresAt.toISOString(),
      mix,
    };

    try {
      await this.deps.slots.upsert({ slotKey, userId: req.userId, payload, generatedAt, expiresAt });
    } catch (err) {
      logger.error({ slotKey, userId: req.userId, err: errorMessage(err) }, '[Exposure] Slot write failed');
      throw new DataStoreUnavailableError('Could not build mix: slot store unavailable', errorMessage(err));
    }
    await this.deps.cache.set(cacheKey, payload, expiresAt.getTime() / 1000);

    logger.info(
      {
        slotKey,
        cacheKey,
        candidates: candidates.length,
        repeatsAvoided: shown.size,
        mix: mix.length,
        durationMs: this.clock.now() - startedAt,
      },
      '[Exposure] Mix built'
    );

    return payload;
  }

  private async loadPromotions(slotKey: string): Promise<Promotion[]> {
    try {
      return await withTimeout(
        this.deps.promotions.listActivePromotions(this.clock.utcNow()),
        this.timeoutMs,
        'listActivePromotions'
      );
    } catch (err) {
      this.deps.logger.warn({ slotKey, err: errorMessage(err) }, '[Exposure] Promotions unavailable, building without badges');
      return [];
    }
  }

  private async loadPreviousSlot(slotKey: string, userId: string | null): Promise<ExposureSlot | null> {
    try {
      return await this.deps.slots.find(slotKey, userId);
    } catch (err) {
      this.deps.logger.warn({ slotKey, userId, err: errorMessage(err) }, '[Exposure] Previous slot unreadable, no repeat-avoidance');
      return null;
    }
  }

  private async stockFor(productId: string): Promise<number> {
    try {
      const fin = await withTimeout(
        this.deps.financials.getFinancialMetrics(productId),
        this.timeoutMs,
        'getFinancialMetrics'
      );
      return Number.isFinite(fin.stockOnHand) ? Math.max(0, fin.stockOnHand) : 0;
    } catch (err) {
      this.deps.logger.warn({ productId, err: errorMessage(err) }, '[Exposure] Stock unavailable, treating as 0');
      return 0;
    }
  }

  private checkCancelled(signal?: AbortSignal) {
    if (signal?.aborted) {
      throw new OperationCancelledError('Exposure build');
    }
  }
}
