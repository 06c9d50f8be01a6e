/**
 * SCORING — Math
 *
 * Pure pieces of a scoring run: time decay over the window, raw signals
 * per product, batch-relative normalisation and the exposure blend.
 *
 * Normalisation divides by the max of the current batch, so scores are
 * comparable within one run only; a product's exposureScore is not an
 * absolute quality measure across runs.
 */

import { daysBetween } from '../../common/clock.js';
import type { EngagementDaily } from '../engagement/engagement.types.js';
import type { FinancialMetrics } from '../catalog/catalog.types.js';
import type { ScoringConfig, ScoringWeights } from './scoring.types.js';

const EPSILON = 1e-6;
const COLD_STOCK_DIVISOR = 50.0;

// Popularity blend per decayed counter
const POPULARITY_COEFFS = {
  views: 0.2,
  clicks: 0.3,
  carts: 0.5,
  purchases: 1.2,
} as const;

export interface DecayedAggregate {
  views: number;
  clicks: number;
  carts: number;
  purchases: number;
  revenue: number;
  /** max freshness factor over the product's rows */
  freshness: number;
}

export interface RawSignals {
  popularityRaw: number;
  profitRaw: number;
  coldRaw: number;
  freshness: number;
}

export interface NormalizedScores {
  popularityScore: number;
  profitScore: number;
  coldScore: number;
  freshnessScore: number;
  exposureScore: number;
}

export function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/** exp(-age·ln2 / halfLife); a non-positive half-life disables decay. */
export function decayFactor(ageDays: number, halfLifeDays: number): number {
  if (halfLifeDays <= 0) return 1.0;
  return Math.exp((-ageDays * Math.LN2) / halfLifeDays);
}

/**
 * Decayed per-product sums for rows dated within the window ending `today`.
 * Rows dated after `today` count as age 0.
 */
export function aggregateWindow(
  rows: EngagementDaily[],
  today: string,
  cfg: Pick<ScoringConfig, 'halfLifeDays' | 'freshnessHalfLifeDays'>
): Map<string, DecayedAggregate> {
  const grouped = new Map<string, DecayedAggregate>();

  for (const row of rows) {
    const ageDays = Math.max(0, daysBetween(row.date, today));
    const decay = decayFactor(ageDays, cfg.halfLifeDays);
    const freshness = decayFactor(ageDays, cfg.freshnessHalfLifeDays);

    let agg = grouped.get(row.productId);
    if (!agg) {
      agg = { views: 0, clicks: 0, carts: 0, purchases: 0, revenue: 0, freshness: 0 };
      grouped.set(row.productId, agg);
    }
    agg.views += row.views * decay;
    agg.clicks += row.clicks * decay;
    agg.carts += row.carts * decay;
    agg.purchases += row.purchases * decay;
    agg.revenue += row.revenue * decay;
    agg.freshness = Math.max(agg.freshness, freshness);
  }

  return grouped;
}

/**
 * Raw (un-normalised) signals. cold_raw mixes an inverse-popularity ratio
 * with stock/50; the two terms share no unit, treat it as a heuristic.
 */
export function computeRawSignals(agg: DecayedAggregate, fin: FinancialMetrics): RawSignals {
  const popularity =
    POPULARITY_COEFFS.views * agg.views +
    POPULARITY_COEFFS.clicks * agg.clicks +
    POPULARITY_COEFFS.carts * agg.carts +
    POPULARITY_COEFFS.purchases * agg.purchases;
  const popularityRaw = Math.max(0, popularity);

  const conversion = agg.purchases / Math.max(agg.views, 1.0);
  const profitRaw = Math.max(0, fin.margin * conversion);

  const coldRaw = Math.max(
    0,
    1 - Math.min(1, popularityRaw / (agg.views + EPSILON)) + fin.stockOnHand / COLD_STOCK_DIVISOR
  );

  return { popularityRaw, profitRaw, coldRaw, freshness: agg.freshness };
}

export function exposureScore(
  scores: Pick<NormalizedScores, 'popularityScore' | 'coldScore' | 'freshnessScore'>,
  weights: ScoringWeights
): number {
  const strategic = (scores.coldScore + scores.freshnessScore) / 2;
  return round4(clamp01(weights.popularityWeight * scores.popularityScore + weights.strategicWeight * strategic));
}

/**
 * Scales each signal by the batch max (a zero max leaves every score 0)
 * and blends the exposure score. All outputs are in [0, 1], 4 decimals.
 */
export function normalizeBatch(
  raws: Map<string, RawSignals>,
  weights: ScoringWeights
): Map<string, NormalizedScores> {
  let maxPopularity = 0;
  let maxProfit = 0;
  let maxCold = 0;
  for (const r of raws.values()) {
    maxPopularity = Math.max(maxPopularity, r.popularityRaw);
    maxProfit = Math.max(maxProfit, r.profitRaw);
    maxCold = Math.max(maxCold, r.coldRaw);
  }
  const popDen = maxPopularity || 1.0;
  const profitDen = maxProfit || 1.0;
  const coldDen = maxCold || 1.0;

  const out = new Map<string, NormalizedScores>();
  for (const [productId, r] of raws) {
    const popularityScore = round4(clamp01(r.popularityRaw / popDen));
    const profitScore = round4(clamp01(r.profitRaw / profitDen));
    const coldScore = round4(clamp01(r.coldRaw / coldDen));
    const freshnessScore = round4(clamp01(r.freshness));
    out.set(productId, {
      popularityScore,
      profitScore,
      coldScore,
      freshnessScore,
      exposureScore: exposureScore({ popularityScore, coldScore, freshnessScore }, weights),
    });
  }
  return out;
}
