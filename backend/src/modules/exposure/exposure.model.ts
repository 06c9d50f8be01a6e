/**
 * EXPOSURE — MongoDB models
 *
 * exposure_slots          last mix per (slotKey, userId); kept after expiry
 *                         because the next build reads it for repeat-avoidance
 * exposure_cache_entries  shared cache tier, purged by a TTL index
 */

import { Schema, model } from 'mongoose';

export interface ExposureSlotDoc {
  slotKey: string;
  userId: string | null;
  payload: unknown;
  generatedAt: Date;
  expiresAt: Date;
}

export interface ExposureCacheEntryDoc {
  key: string;
  payload: unknown;
  expiresAt: Date;
}

const ExposureSlotSchema = new Schema<ExposureSlotDoc>(
  {
    slotKey: { type: String, required: true, maxlength: 200 },
    userId: { type: String, default: null },
    payload: { type: Schema.Types.Mixed, required: true },
    generatedAt: { type: Date, required: true },
    expiresAt: { type: Date, required: true, index: true },
  },
  { collection: 'exposure_slots', timestamps: true }
);

ExposureSlotSchema.index({ slotKey: 1, userId: 1 }, { unique: true, name: 'exposure_slots_key_user' });

const ExposureCacheEntrySchema = new Schema<ExposureCacheEntryDoc>(
  {
    key: { type: String, required: true },
    payload: { type: Schema.Types.Mixed, required: true },
    expiresAt: { type: Date, required: true },
  },
  { collection: 'exposure_cache_entries' }
);

ExposureCacheEntrySchema.index({ key: 1 }, { unique: true, name: 'exposure_cache_key' });
ExposureCacheEntrySchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0, name: 'exposure_cache_ttl' });

export const ExposureSlotModel = model<ExposureSlotDoc>('ExposureSlot', ExposureSlotSchema);
export const ExposureCacheEntryModel = model<ExposureCacheEntryDoc>('ExposureCacheEntry', ExposureCacheEntrySchema);
