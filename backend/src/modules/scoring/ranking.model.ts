/**
 * SCORING — Ranking model
 *
 * Collection: product_rankings (one document per product, upserted)
 */

import { Schema, model } from 'mongoose';

export interface ProductRankingDoc {
  productId: string;
  popularityScore: number;
  coldScore: number;
  profitScore: number;
  freshnessScore: number;
  exposureScore: number;
  updatedAt: Date;
}

const score = { type: Number, required: true, default: 0, min: 0, max: 1 };

const ProductRankingSchema = new Schema<ProductRankingDoc>(
  {
    productId: { type: String, required: true },
    popularityScore: score,
    coldScore: score,
    profitScore: score,
    freshnessScore: score,
    exposureScore: score,
    updatedAt: { type: Date, required: true, index: true },
  },
  { collection: 'product_rankings' }
);

ProductRankingSchema.index({ productId: 1 }, { unique: true, name: 'product_rankings_product' });
ProductRankingSchema.index({ exposureScore: -1, productId: 1 }, { name: 'product_rankings_exposure_order' });

export const ProductRankingModel = model<ProductRankingDoc>('ProductRanking', ProductRankingSchema);
