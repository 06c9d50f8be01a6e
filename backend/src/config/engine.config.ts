import type { ExposureConfig } from '../modules/exposure/exposure.types.js';
import type { ScoringConfig } from '../modules/scoring/scoring.types.js';
import type { Env } from './env.js';

export function scoringConfigFrom(env: Env): ScoringConfig {
  return {
    windowDays: env.SCORING_WINDOW_DAYS,
    halfLifeDays: env.SCORING_HALF_LIFE_DAYS,
    freshnessHalfLifeDays: env.SCORING_FRESHNESS_HALF_LIFE,
    popularityWeight: env.EXPOSURE_POPULARITY_WEIGHT,
    strategicWeight: env.EXPOSURE_STRATEGIC_WEIGHT,
  };
}

export function exposureConfigFrom(env: Env): ExposureConfig {
  return {
    popularityWeight: env.EXPOSURE_POPULARITY_WEIGHT,
    strategicWeight: env.EXPOSURE_STRATEGIC_WEIGHT,
    categoryCap: env.EXPOSURE_CATEGORY_CAP,
    coldThreshold: env.EXPOSURE_COLD_THRESHOLD,
    stockThreshold: env.EXPOSURE_STOCK_THRESHOLD,
    freshnessThreshold: env.EXPOSURE_FRESHNESS_THRESHOLD,
    cacheTtlSeconds: env.EXPOSURE_CACHE_TTL,
    defaultLimit: env.EXPOSURE_DEFAULT_LIMIT,
  };
}
