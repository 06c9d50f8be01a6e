/**
 * SCORING — Types
 */

export interface ProductRanking {
  productId: string;
  popularityScore: number;
  coldScore: number;
  profitScore: number;
  freshnessScore: number;
  exposureScore: number;
  updatedAt: Date;
}

/** A ranking joined with the product's category, as the exposure builder reads it */
export interface RankingCandidate {
  ranking: ProductRanking;
  categoryId: string | null;
}

export interface ScoringWeights {
  popularityWeight: number;
  strategicWeight: number;
}

export interface ScoringConfig extends ScoringWeights {
  windowDays: number;
  halfLifeDays: number;
  freshnessHalfLifeDays: number;
}

export interface ScoringResult {
  runId: string;
  updatedProductIds: string[];
  count: number;
  windowDays: number;
}

/** Body of POST /internal/scoring/run */
export interface ScoringRunResponse {
  updated: string[];
  count: number;
  window_days: number;
}

/** Row of GET /internal/scoring/rankings */
export interface RankingRead {
  product_id: string;
  popularity_score: number;
  cold_score: number;
  profit_score: number;
  freshness_score: number;
  exposure_score: number;
  computed_at: string;
}

/**
 * Ranking persistence. The scoring engine is its only writer.
 * Orderings are exposure_score DESC, then productId ASC.
 */
export interface RankingStore {
  upsertRanking(ranking: ProductRanking): Promise<void>;
  topRankings(limit: number): Promise<ProductRanking[]>;
  topCandidates(opts: { categoryId: string | null; limit: number }): Promise<RankingCandidate[]>;
}

export function toScoringRunResponse(result: ScoringResult): ScoringRunResponse {
  return {
    updated: result.updatedProductIds,
    count: result.count,
    window_days: result.windowDays,
  };
}

export function toRankingRead(r: ProductRanking): RankingRead {
  return {
    product_id: r.productId,
    popularity_score: r.popularityScore,
    cold_score: r.coldScore,
    profit_score: r.profitScore,
    freshness_score: r.freshnessScore,
    exposure_score: r.exposureScore,
    computed_at: r.updatedAt.toISOString(),
  };
}
