/**
 * EXPOSURE — Mongo slot store and shared cache tier
 */

import { systemClock, type Clock } from '../../common/clock.js';
import {
  ExposureCacheEntryModel,
  ExposureSlotModel,
  type ExposureCacheEntryDoc,
  type ExposureSlotDoc,
} from './exposure.model.js';
import type { SharedCacheTier } from './exposure.cache.js';
import {
  ExposureResponseSchema,
  type ExposureResponse,
  type ExposureSlot,
  type ExposureSlotStore,
} from './exposure.types.js';

/** Stored payloads are Mixed; anything that no longer parses reads as absent */
function readPayload(raw: unknown): ExposureResponse | null {
  const parsed = ExposureResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export class MongoExposureSlotStore implements ExposureSlotStore {
  async find(slotKey: string, userId: string | null): Promise<ExposureSlot | null> {
    const doc = await ExposureSlotModel.findOne({ slotKey, userId }).lean<ExposureSlotDoc>().exec();
    if (!doc) return null;
    const payload = readPayload(doc.payload);
    if (!payload) return null;
    return {
      slotKey: doc.slotKey,
      userId: doc.userId,
      payload,
      generatedAt: doc.generatedAt,
      expiresAt: doc.expiresAt,
    };
  }

  async upsert(slot: ExposureSlot): Promise<void> {
    await ExposureSlotModel.updateOne(
      { slotKey: slot.slotKey, userId: slot.userId },
      { $set: { payload: slot.payload, generatedAt: slot.generatedAt, expiresAt: slot.expiresAt } },
      { upsert: true }
    ).exec();
  }

  async delete(slotKey: string, userId: string | null): Promise<number> {
    const res = await ExposureSlotModel.deleteOne({ slotKey, userId }).exec();
    return res.deletedCount;
  }

  async deleteAll(): Promise<number> {
    const res = await ExposureSlotModel.deleteMany({}).exec();
    return res.deletedCount;
  }
}

/**
 * Shared tier on MongoDB. The TTL index removes expired entries
 * eventually; reads filter on expiresAt so a late purge is never a hit.
 */
export class MongoSharedCacheTier implements SharedCacheTier {
  constructor(private clock: Clock = systemClock) {}

  async get(key: string): Promise<ExposureResponse | null> {
    const doc = await ExposureCacheEntryModel.findOne({ key, expiresAt: { $gt: this.clock.utcNow() } })
      .lean<ExposureCacheEntryDoc>()
      .exec();
    return doc ? readPayload(doc.payload) : null;
  }

  async set(key: string, payload: ExposureResponse, expiresAt: Date): Promise<void> {
    await ExposureCacheEntryModel.updateOne({ key }, { $set: { payload, expiresAt } }, { upsert: true }).exec();
  }

  async delete(key: string): Promise<void> {
    await ExposureCacheEntryModel.deleteOne({ key }).exec();
  }

  async clear(): Promise<void> {
    await ExposureCacheEntryModel.deleteMany({}).exec();
  }
}
