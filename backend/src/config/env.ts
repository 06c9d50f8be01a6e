/**
 * ENVIRONMENT CONFIG
 * ==================
 *
 * Every tunable of the engine, validated once at startup.
 * Values come from process.env (loaded from .env by dotenv in server.ts).
 */

import { z } from 'zod';

const bool = z
  .union([z.boolean(), z.string()])
  .transform((v) => v === true || v === 'true' || v === '1');

// Empty string disables a cron schedule
const cronExpr = (fallback: string) => z.string().trim().default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),
  MONGO_URL: z.string().min(1).default('mongodb://127.0.0.1:27017/exposure_engine'),

  EXPOSURE_POPULARITY_WEIGHT: z.coerce.number().min(0).max(1).default(0.7),
  EXPOSURE_STRATEGIC_WEIGHT: z.coerce.number().min(0).max(1).default(0.3),
  EXPOSURE_CATEGORY_CAP: z.coerce.number().int().min(0).default(3),
  EXPOSURE_COLD_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  EXPOSURE_STOCK_THRESHOLD: z.coerce.number().int().min(0).default(15),
  EXPOSURE_FRESHNESS_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  EXPOSURE_CACHE_TTL: z.coerce.number().int().min(1).default(600),
  EXPOSURE_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(50).default(12),
  EXPOSURE_SHARED_CACHE: bool.default(true),

  SCORING_WINDOW_DAYS: z.coerce.number().int().min(1).max(365).default(14),
  SCORING_HALF_LIFE_DAYS: z.coerce.number().default(3.0),
  SCORING_FRESHNESS_HALF_LIFE: z.coerce.number().default(1.5),
  SCORING_CRON: cronExpr('0 * * * *'),

  INGEST_FLUSH_CRON: cronExpr('*/5 * * * *'),
  INGEST_DEDUP_CAPACITY: z.coerce.number().int().min(1).default(10_000),
  INGEST_MAX_PENDING_EVENTS: z.coerce.number().int().min(1).default(5_000),

  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().min(1).default(2_000),
});

export type Env = z.infer<typeof EnvSchema>;

export class EnvValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment: ${issues.join('; ')}`);
    this.name = 'EnvValidationError';
  }
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new EnvValidationError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
  }
  return parsed.data;
}

/**
 * Weights are not forced to sum to 1.0; callers log a warning instead.
 */
export function weightSumDrift(env: Pick<Env, 'EXPOSURE_POPULARITY_WEIGHT' | 'EXPOSURE_STRATEGIC_WEIGHT'>): number {
  return Math.abs(env.EXPOSURE_POPULARITY_WEIGHT + env.EXPOSURE_STRATEGIC_WEIGHT - 1);
}
