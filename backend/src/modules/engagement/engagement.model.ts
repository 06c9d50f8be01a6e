/**
 * ENGAGEMENT — MongoDB models
 *
 * Collections: product_engagement_daily, customer_engagement_daily
 */

import { Schema, model } from 'mongoose';

export interface ProductEngagementDailyDoc {
  productId: string;
  date: string;
  views: number;
  clicks: number;
  carts: number;
  purchases: number;
  revenue: number;
  updatedAt?: Date;
}

export interface CustomerEngagementDailyDoc {
  customerId: string;
  date: string;
  views: number;
  clicks: number;
  carts: number;
  purchases: number;
  pointsEarned: number;
  updatedAt?: Date;
}

const counter = { type: Number, required: true, default: 0, min: 0 };

const ProductEngagementDailySchema = new Schema<ProductEngagementDailyDoc>(
  {
    productId: { type: String, required: true },
    date: { type: String, required: true, index: true },
    views: counter,
    clicks: counter,
    carts: counter,
    purchases: counter,
    revenue: counter,
  },
  {
    timestamps: { createdAt: false, updatedAt: true },
    collection: 'product_engagement_daily',
  }
);

ProductEngagementDailySchema.index(
  { productId: 1, date: 1 },
  { unique: true, name: 'product_engagement_daily_product_date' }
);

const CustomerEngagementDailySchema = new Schema<CustomerEngagementDailyDoc>(
  {
    customerId: { type: String, required: true },
    date: { type: String, required: true, index: true },
    views: counter,
    clicks: counter,
    carts: counter,
    purchases: counter,
    pointsEarned: counter,
  },
  {
    timestamps: { createdAt: false, updatedAt: true },
    collection: 'customer_engagement_daily',
  }
);

CustomerEngagementDailySchema.index(
  { customerId: 1, date: 1 },
  { unique: true, name: 'customer_engagement_daily_customer_date' }
);

export const ProductEngagementDailyModel = model<ProductEngagementDailyDoc>(
  'ProductEngagementDaily',
  ProductEngagementDailySchema
);

export const CustomerEngagementDailyModel = model<CustomerEngagementDailyDoc>(
  'CustomerEngagementDaily',
  CustomerEngagementDailySchema
);
