/**
 * EXPOSURE — Types
 *
 * ExposureResponse is the wire payload of GET /exposure. The same object
 * is stored in the exposure slot and in both cache tiers, so its field
 * names are snake_case.
 */

import { z } from 'zod';

export const ExposureItemSchema = z.object({
  product_id: z.string(),
  reason: z.array(z.string()),
  badges: z.array(z.string()),
});

export const ExposureResponseSchema = z.object({
  context: z.string(),
  user_id: z.string().nullable(),
  category_id: z.string().nullable(),
  generated_at: z.string(),
  expires_at: z.string(),
  mix: z.array(ExposureItemSchema),
});

export type ExposureItem = z.infer<typeof ExposureItemSchema>;
export type ExposureResponse = z.infer<typeof ExposureResponseSchema>;

export interface ExposureRequest {
  context: string;
  userId: string | null;
  categoryId: string | null;
  limit: number;
}

export interface ExposureConfig {
  popularityWeight: number;
  strategicWeight: number;
  /** 0 disables the cap */
  categoryCap: number;
  coldThreshold: number;
  stockThreshold: number;
  freshnessThreshold: number;
  cacheTtlSeconds: number;
  defaultLimit: number;
}

/** Last mix built for a (slotKey, userId) pair */
export interface ExposureSlot {
  slotKey: string;
  userId: string | null;
  payload: ExposureResponse;
  generatedAt: Date;
  expiresAt: Date;
}

export interface ExposureSlotStore {
  find(slotKey: string, userId: string | null): Promise<ExposureSlot | null>;
  upsert(slot: ExposureSlot): Promise<void>;
  delete(slotKey: string, userId: string | null): Promise<number>;
  deleteAll(): Promise<number>;
}

export function slotKeyFor(context: string, categoryId: string | null): string {
  return `${context}|${categoryId ?? 'all'}`;
}

export function cacheKeyFor(context: string, userId: string | null, categoryId: string | null): string {
  return `${context}:${userId ?? 'anon'}:${categoryId ?? 'all'}`;
}
