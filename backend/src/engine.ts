/**
 * Engine composition
 *
 * createEngine() wires services over whatever stores it is given;
 * mongoParts() supplies the production (MongoDB) ones.
 */

import { systemClock, type Clock } from './common/clock.js';
import type { Logger } from './common/logger.js';
import type { Env } from './config/env.js';
import { exposureConfigFrom, scoringConfigFrom } from './config/engine.config.js';
import { EventIngestor } from './modules/engagement/engagement.ingestor.js';
import { MongoEngagementStore } from './modules/engagement/engagement.repository.js';
import type { EngagementStore } from './modules/engagement/engagement.types.js';
import { MongoCatalogClient, MongoPromotionProvider } from './modules/catalog/catalog.client.js';
import type { FinancialMetricsProvider, PromotionProvider } from './modules/catalog/catalog.types.js';
import { MongoRankingStore } from './modules/scoring/ranking.repository.js';
import { ScoringService } from './modules/scoring/scoring.service.js';
import type { RankingStore, ScoringConfig } from './modules/scoring/scoring.types.js';
import { ExposureBuilder } from './modules/exposure/exposure.builder.js';
import { ExposureCache, type SharedCacheTier } from './modules/exposure/exposure.cache.js';
import { MongoExposureSlotStore, MongoSharedCacheTier } from './modules/exposure/exposure.repository.js';
import { ExposureService } from './modules/exposure/exposure.service.js';
import type { ExposureConfig, ExposureSlotStore } from './modules/exposure/exposure.types.js';

export interface EngineParts {
  engagementStore: EngagementStore;
  rankings: RankingStore;
  slots: ExposureSlotStore;
  financials: FinancialMetricsProvider;
  promotions: PromotionProvider;
  sharedCache: SharedCacheTier | null;
}

export interface EngineSettings {
  scoring: ScoringConfig;
  exposure: ExposureConfig;
  dedupCapacity: number;
  maxPendingEvents: number;
  collaboratorTimeoutMs: number;
}

export interface Engine {
  clock: Clock;
  engagementStore: EngagementStore;
  ingestor: EventIngestor;
  scoring: ScoringService;
  exposure: ExposureService;
  cache: ExposureCache;
}

export function settingsFrom(env: Env): EngineSettings {
  return {
    scoring: scoringConfigFrom(env),
    exposure: exposureConfigFrom(env),
    dedupCapacity: env.INGEST_DEDUP_CAPACITY,
    maxPendingEvents: env.INGEST_MAX_PENDING_EVENTS,
    collaboratorTimeoutMs: env.COLLABORATOR_TIMEOUT_MS,
  };
}

export function mongoParts(env: Env, logger: Logger, clock: Clock = systemClock): EngineParts {
  return {
    engagementStore: new MongoEngagementStore(),
    rankings: new MongoRankingStore(),
    slots: new MongoExposureSlotStore(),
    financials: new MongoCatalogClient(),
    promotions: new MongoPromotionProvider(logger),
    sharedCache: env.EXPOSURE_SHARED_CACHE ? new MongoSharedCacheTier(clock) : null,
  };
}

export function createEngine(
  parts: EngineParts,
  settings: EngineSettings,
  logger: Logger,
  clock: Clock = systemClock
): Engine {
  const ingestor = new EventIngestor({
    store: parts.engagementStore,
    logger,
    clock,
    dedupCapacity: settings.dedupCapacity,
    maxPendingEvents: settings.maxPendingEvents,
  });

  const scoring = new ScoringService({
    engagement: parts.engagementStore,
    rankings: parts.rankings,
    financials: parts.financials,
    config: settings.scoring,
    logger,
    clock,
    collaboratorTimeoutMs: settings.collaboratorTimeoutMs,
  });

  const cache = new ExposureCache({
    ttlSeconds: settings.exposure.cacheTtlSeconds,
    logger,
    shared: parts.sharedCache,
    clock,
  });

  const builder = new ExposureBuilder({
    rankings: parts.rankings,
    slots: parts.slots,
    cache,
    financials: parts.financials,
    promotions: parts.promotions,
    config: settings.exposure,
    logger,
    clock,
    collaboratorTimeoutMs: settings.collaboratorTimeoutMs,
  });

  const exposure = new ExposureService({
    builder,
    cache,
    slots: parts.slots,
    config: settings.exposure,
    logger,
  });

  return { clock, engagementStore: parts.engagementStore, ingestor, scoring, exposure, cache };
}
