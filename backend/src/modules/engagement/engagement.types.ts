/**
 * ENGAGEMENT — Types
 *
 * Daily per-product / per-customer counters read by the scoring engine,
 * and the raw tracker events that feed them.
 */

import { z } from 'zod';

export const ENGAGEMENT_EVENT_TYPES = ['view', 'click', 'add_to_cart', 'purchase'] as const;
export type EngagementEventType = (typeof ENGAGEMENT_EVENT_TYPES)[number];

const Id = z.string().trim().min(1).max(64);

export const EngagementEventSchema = z.object({
  event_type: z.enum(ENGAGEMENT_EVENT_TYPES),
  product_id: Id,
  user_id: Id.nullish(),
  session_id: Id.nullish(),
  timestamp: z.coerce.date().nullish(),
  price: z.number().min(0).nullish(),
  metadata: z
    .object({
      context: z.string().max(50).nullish(),
      referrer: z.string().nullish(),
      device: z.string().nullish(),
      quantity: z.number().int().min(1).nullish(),
      order_id: Id.nullish(),
    })
    .nullish(),
});

export type EngagementEvent = z.infer<typeof EngagementEventSchema>;

export interface EngagementCounters {
  views: number;
  clicks: number;
  carts: number;
  purchases: number;
}

export interface EngagementDaily extends EngagementCounters {
  productId: string;
  date: string; // YYYY-MM-DD (UTC)
  revenue: number;
}

export interface CustomerEngagementDaily extends EngagementCounters {
  customerId: string;
  date: string;
  pointsEarned: number;
}

export type ProductDelta = EngagementCounters & { revenue: number };
export type CustomerDelta = EngagementCounters & { pointsEarned: number };

/**
 * Read/increment access to the daily aggregates. Increments only ever add,
 * so a (product, date) row never goes down.
 */
export interface EngagementStore {
  listProductDailySince(sinceDay: string): Promise<EngagementDaily[]>;
  incrementProduct(productId: string, date: string, delta: ProductDelta): Promise<EngagementDaily>;
  incrementCustomer(customerId: string, date: string, delta: CustomerDelta): Promise<void>;
  findProductDaily(productId: string, date?: string): Promise<EngagementDaily[]>;
  findCustomerDaily(customerId: string, date?: string): Promise<CustomerEngagementDaily[]>;
}

/** Wire shape of a product row */
export interface ProductEngagementRead {
  product_id: string;
  date: string;
  views: number;
  clicks: number;
  carts: number;
  purchases: number;
  revenue: number;
}

export interface CustomerEngagementRead {
  customer_id: string;
  date: string;
  views: number;
  clicks: number;
  carts: number;
  purchases: number;
  points_earned: number;
}

export function toProductRead(row: EngagementDaily): ProductEngagementRead {
  return {
    product_id: row.productId,
    date: row.date,
    views: row.views,
    clicks: row.clicks,
    carts: row.carts,
    purchases: row.purchases,
    revenue: row.revenue,
  };
}

export function toCustomerRead(row: CustomerEngagementDaily): CustomerEngagementRead {
  return {
    customer_id: row.customerId,
    date: row.date,
    views: row.views,
    clicks: row.clicks,
    carts: row.carts,
    purchases: row.purchases,
    points_earned: row.pointsEarned,
  };
}
