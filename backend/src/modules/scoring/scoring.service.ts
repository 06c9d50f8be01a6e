/**
 * SCORING — Service
 *
 * Batch job turning the engagement window into one ProductRanking per
 * product with activity in the window. Products without activity keep
 * their previous (stale) ranking.
 *
 * Runs are serialised through an AsyncLock; a run requested while another
 * is in progress starts after it. A run is not transactional: upserts
 * already written stay if a later product fails, and re-running is safe.
 */

import { v4 as uuidv4 } from 'uuid';
import { addUtcDays, toUtcDay, systemClock, type Clock } from '../../common/clock.js';
import type { Logger } from '../../common/logger.js';
import { DataStoreUnavailableError, OperationCancelledError, errorMessage } from '../../common/errors.js';
import { AsyncLock } from '../shared/runtime/async-lock.js';
import { withTimeout } from '../shared/runtime/with-timeout.js';
import type { EngagementDaily, EngagementStore } from '../engagement/engagement.types.js';
import {
  ZERO_FINANCIALS,
  type FinancialMetrics,
  type FinancialMetricsProvider,
} from '../catalog/catalog.types.js';
import { aggregateWindow, computeRawSignals, normalizeBatch, type RawSignals } from './scoring.math.js';
import type { ProductRanking, RankingStore, ScoringConfig, ScoringResult } from './scoring.types.js';

export interface ScoringServiceDeps {
  engagement: EngagementStore;
  rankings: RankingStore;
  financials: FinancialMetricsProvider;
  config: ScoringConfig;
  logger: Logger;
  clock?: Clock;
  collaboratorTimeoutMs?: number;
}

export interface RunScoringOptions {
  signal?: AbortSignal;
}

function sanitizeFinancials(fin: FinancialMetrics): FinancialMetrics {
  return {
    margin: Number.isFinite(fin.margin) ? fin.margin : 0,
    stockOnHand: Number.isFinite(fin.stockOnHand) ? Math.max(0, fin.stockOnHand) : 0,
    categoryId: fin.categoryId,
  };
}

export class ScoringService {
  private readonly lock = new AsyncLock();
  private readonly clock: Clock;
  private readonly timeoutMs: number;

  constructor(private deps: ScoringServiceDeps) {
    this.clock = deps.clock ?? systemClock;
    this.timeoutMs = deps.collaboratorTimeoutMs ?? 2_000;
  }

  get config(): ScoringConfig {
    return this.deps.config;
  }

  isRunning(): boolean {
    return this.lock.isLocked();
  }

  /**
   * RunScoring(windowDays)
   */
  runScoring(windowDays: number = this.deps.config.windowDays, opts: RunScoringOptions = {}): Promise<ScoringResult> {
    return this.lock.runExclusive(() => this.execute(windowDays, opts.signal));
  }

  async getLatestRankings(limit: number): Promise<ProductRanking[]> {
    return this.deps.rankings.topRankings(limit);
  }

  private async execute(windowDays: number, signal?: AbortSignal): Promise<ScoringResult> {
    const { config, logger } = this.deps;
    const runId = uuidv4();
    const startedAt = this.clock.now();
    const now = this.clock.utcNow();
    const today = toUtcDay(now);
    const since = addUtcDays(today, -(windowDays - 1));

    logger.info({ runId, windowDays, since, today }, '[Scoring] Run starting');

    let rows: EngagementDaily[];
    try {
      rows = await this.deps.engagement.listProductDailySince(since);
    } catch (err) {
      logger.error({ runId, err: errorMessage(err) }, '[Scoring] Could not load engagement window');
      throw new DataStoreUnavailableError('Engagement aggregates unavailable', errorMessage(err));
    }

    const aggregates = aggregateWindow(rows, today, config);
    if (aggregates.size === 0) {
      logger.info({ runId, windowDays }, '[Scoring] No engagement in window, nothing to score');
      return { runId, updatedProductIds: [], count: 0, windowDays };
    }

    const productIds = [...aggregates.keys()].sort();
    const raws = new Map<string, RawSignals>();
    let degraded = 0;

    for (const productId of productIds) {
      this.checkCancelled(signal);
      const agg = aggregates.get(productId);
      if (!agg) continue;
      const fin = await this.fetchFinancials(productId, runId);
      if (fin === null) degraded++;
      raws.set(productId, computeRawSignals(agg, fin ?? ZERO_FINANCIALS));
    }

    const scores = normalizeBatch(raws, config);
    const updatedProductIds: string[] = [];

    for (const productId of productIds) {
      this.checkCancelled(signal);
      const s = scores.get(productId);
      if (!s) continue;
      await this.deps.rankings.upsertRanking({ productId, ...s, updatedAt: now });
      updatedProductIds.push(productId);
    }

    logger.info(
      {
        runId,
        windowDays,
        count: updatedProductIds.length,
        degraded,
        durationMs: this.clock.now() - startedAt,
      },
      '[Scoring] Run completed'
    );

    return { runId, updatedProductIds, count: updatedProductIds.length, windowDays };
  }

  /**
   * Financial metrics for one product, or null when the lookup failed or
   * timed out (the caller scores it as zero margin / zero stock).
   */
  private async fetchFinancials(productId: string, runId: string): Promise<FinancialMetrics | null> {
    try {
      const fin = await withTimeout(
        this.deps.financials.getFinancialMetrics(productId),
        this.timeoutMs,
        'getFinancialMetrics'
      );
      return sanitizeFinancials(fin);
    } catch (err) {
      this.deps.logger.warn(
        { runId, productId, err: errorMessage(err) },
        '[Scoring] Financial metrics unavailable, scoring with zero margin/stock'
      );
      return null;
    }
  }

  private checkCancelled(signal?: AbortSignal) {
    if (signal?.aborted) {
      throw new OperationCancelledError('Scoring run');
    }
  }
}
