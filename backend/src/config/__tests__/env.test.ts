import { describe, it, expect } from 'vitest';
import { EnvValidationError, loadEnv, weightSumDrift } from '../env.js';
import { exposureConfigFrom, scoringConfigFrom } from '../engine.config.js';

describe('loadEnv', () => {
  it('applies defaults to an empty environment', () => {
    const env = loadEnv({});
    expect(env.PORT).toBe(8001);
    expect(env.EXPOSURE_POPULARITY_WEIGHT).toBe(0.7);
    expect(env.EXPOSURE_STRATEGIC_WEIGHT).toBe(0.3);
    expect(env.EXPOSURE_CATEGORY_CAP).toBe(3);
    expect(env.EXPOSURE_CACHE_TTL).toBe(600);
    expect(env.EXPOSURE_SHARED_CACHE).toBe(true);
    expect(env.SCORING_WINDOW_DAYS).toBe(14);
    expect(env.SCORING_CRON).toBe('0 * * * *');
    expect(env.INGEST_FLUSH_CRON).toBe('*/5 * * * *');
  });

  it('coerces string values', () => {
    const env = loadEnv({
      PORT: '9000',
      EXPOSURE_CATEGORY_CAP: '0',
      EXPOSURE_SHARED_CACHE: 'false',
      SCORING_HALF_LIFE_DAYS: '7.5',
      SCORING_CRON: '',
    });
    expect(env.PORT).toBe(9000);
    expect(env.EXPOSURE_CATEGORY_CAP).toBe(0);
    expect(env.EXPOSURE_SHARED_CACHE).toBe(false);
    expect(env.SCORING_HALF_LIFE_DAYS).toBe(7.5);
    expect(env.SCORING_CRON).toBe('');
  });

  it('rejects out-of-range weights', () => {
    try {
      loadEnv({ EXPOSURE_POPULARITY_WEIGHT: '1.5' });
      expect.unreachable('loadEnv should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(EnvValidationError);
      if (err instanceof EnvValidationError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^EXPOSURE_POPULARITY_WEIGHT: /);
      }
    }
  });

  it('measures how far the weights drift from 1.0', () => {
    expect(weightSumDrift({ EXPOSURE_POPULARITY_WEIGHT: 0.5, EXPOSURE_STRATEGIC_WEIGHT: 0.5 })).toBe(0);
    expect(weightSumDrift({ EXPOSURE_POPULARITY_WEIGHT: 0.75, EXPOSURE_STRATEGIC_WEIGHT: 0.5 })).toBe(0.25);
  });
});

describe('engine config', () => {
  it('maps the environment onto scoring and exposure settings', () => {
    const env = loadEnv({ EXPOSURE_STOCK_THRESHOLD: '20', SCORING_WINDOW_DAYS: '7' });

    expect(scoringConfigFrom(env)).toEqual({
      windowDays: 7,
      halfLifeDays: 3,
      freshnessHalfLifeDays: 1.5,
      popularityWeight: 0.7,
      strategicWeight: 0.3,
    });
    expect(exposureConfigFrom(env)).toEqual({
      popularityWeight: 0.7,
      strategicWeight: 0.3,
      categoryCap: 3,
      coldThreshold: 0.6,
      stockThreshold: 20,
      freshnessThreshold: 0.7,
      cacheTtlSeconds: 600,
      defaultLimit: 12,
    });
  });
});
