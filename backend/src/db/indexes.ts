/**
 * Database Indexes
 * Run on startup. Only the collections this service owns; products and
 * promotions belong to the catalog.
 */

import type { Logger } from '../common/logger.js';
import { errorMessage } from '../common/errors.js';
import {
  CustomerEngagementDailyModel,
  ProductEngagementDailyModel,
} from '../modules/engagement/engagement.model.js';
import { ProductRankingModel } from '../modules/scoring/ranking.model.js';
import { ExposureCacheEntryModel, ExposureSlotModel } from '../modules/exposure/exposure.model.js';

interface IndexedModel {
  createIndexes(): Promise<unknown>;
  collection: { collectionName: string };
}

const OWNED_MODELS: IndexedModel[] = [
  ProductEngagementDailyModel,
  CustomerEngagementDailyModel,
  ProductRankingModel,
  ExposureSlotModel,
  ExposureCacheEntryModel,
];

export async function ensureIndexes(logger: Logger): Promise<void> {
  for (const model of OWNED_MODELS) {
    try {
      await model.createIndexes();
    } catch (err) {
      logger.warn({ collection: model.collection.collectionName, err: errorMessage(err) }, '[DB] Index creation failed');
    }
  }
  logger.info({ collections: OWNED_MODELS.length }, '[DB] Indexes ensured');
}
