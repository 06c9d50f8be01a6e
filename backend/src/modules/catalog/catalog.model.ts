/**
 * CATALOG — Read models
 *
 * Collections owned by the catalog service. The engine never writes them.
 */

import { Schema, model } from 'mongoose';

export interface ProductDoc {
  _id: string;
  name: string;
  price: number;
  categoryId: string | null;
  stockOnHand?: number;
}

export interface PromotionDoc {
  _id: string;
  name: string;
  type: string;
  scope: string;
  status: 'draft' | 'active' | 'paused' | 'ended';
  criteria: unknown;
  benefits: unknown;
  productIds: string[];
  categoryIds: string[];
  customerIds: string[];
  startAt: Date;
  endAt: Date;
}

const ProductSchema = new Schema<ProductDoc>(
  {
    _id: { type: String, required: true },
    name: { type: String, required: true },
    price: { type: Number, required: true, default: 0 },
    categoryId: { type: String, default: null, index: true },
    stockOnHand: { type: Number },
  },
  { collection: 'products', timestamps: true }
);

const PromotionSchema = new Schema<PromotionDoc>(
  {
    _id: { type: String, required: true },
    name: { type: String, required: true },
    type: { type: String, required: true },
    scope: { type: String, default: 'global' },
    status: { type: String, enum: ['draft', 'active', 'paused', 'ended'], default: 'draft' },
    criteria: { type: Schema.Types.Mixed, default: () => ({}) },
    benefits: { type: Schema.Types.Mixed, default: () => ({}) },
    productIds: { type: [String], default: [] },
    categoryIds: { type: [String], default: [] },
    customerIds: { type: [String], default: [] },
    startAt: { type: Date, required: true },
    endAt: { type: Date, required: true },
  },
  { collection: 'promotions', timestamps: true }
);

PromotionSchema.index({ status: 1, startAt: 1, endAt: 1 });

export const ProductModel = model<ProductDoc>('Product', ProductSchema);
export const PromotionModel = model<PromotionDoc>('Promotion', PromotionSchema);
