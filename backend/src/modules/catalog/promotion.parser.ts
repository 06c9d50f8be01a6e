/**
 * CATALOG — Promotion parser
 *
 * Promotion documents carry free-form criteria/benefits blobs. They are
 * turned into the typed Promotion union here, once, when loaded; a
 * document that does not fit its type is rejected with a reason.
 */

import { z } from 'zod';
import type { Promotion, PromotionBenefits } from './catalog.types.js';

const IdList = z.array(z.string().trim().min(1)).default([]);

const CriteriaSchema = z.object({
  category_ids: IdList,
  product_ids: IdList,
  customer_ids: IdList,
  loyalty_levels: z.array(z.string()).default([]),
  min_order_total: z.number().min(0).nullable().default(null),
});

const BenefitsSchema = z.object({
  percent_off: z.number().min(0).max(100).nullable().default(null),
  amount_off: z.number().min(0).nullable().default(null),
  free_shipping: z.boolean().default(false),
});

const orEmpty = (v: unknown) => (v === null || v === undefined ? {} : v);

const RawPromotionSchema = z.object({
  _id: z.string().trim().min(1),
  name: z.string().default(''),
  type: z.enum(['category', 'product', 'customer']),
  scope: z.string().default('global'),
  criteria: z.preprocess(orEmpty, CriteriaSchema),
  benefits: z.preprocess(orEmpty, BenefitsSchema),
  productIds: IdList,
  categoryIds: IdList,
  customerIds: IdList,
  startAt: z.coerce.date(),
  endAt: z.coerce.date(),
});

export type PromotionParseResult =
  | { ok: true; promotion: Promotion }
  | { ok: false; id: string | null; error: string };

function union(a: string[], b: string[]): string[] {
  return [...new Set([...a, ...b])];
}

function rawId(raw: unknown): string | null {
  if (typeof raw === 'object' && raw !== null && '_id' in raw) {
    const id = raw._id;
    return id === null || id === undefined ? null : String(id);
  }
  return null;
}

export function parsePromotion(raw: unknown): PromotionParseResult {
  const parsed = RawPromotionSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      id: rawId(raw),
      error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    };
  }

  const doc = parsed.data;
  if (doc.endAt.getTime() < doc.startAt.getTime()) {
    return { ok: false, id: doc._id, error: 'endAt precedes startAt' };
  }

  const benefits: PromotionBenefits = {
    percentOff: doc.benefits.percent_off,
    amountOff: doc.benefits.amount_off,
    freeShipping: doc.benefits.free_shipping,
  };
  const base = {
    id: doc._id,
    name: doc.name,
    scope: doc.scope,
    startAt: doc.startAt,
    endAt: doc.endAt,
    benefits,
  };

  switch (doc.type) {
    case 'category':
      return {
        ok: true,
        promotion: {
          ...base,
          type: 'category',
          categoryIds: union(doc.criteria.category_ids, doc.categoryIds),
          minOrderTotal: doc.criteria.min_order_total,
        },
      };
    case 'product': {
      const productIds = union(doc.criteria.product_ids, doc.productIds);
      if (productIds.length === 0) {
        return { ok: false, id: doc._id, error: 'product promotion lists no products' };
      }
      return { ok: true, promotion: { ...base, type: 'product', productIds } };
    }
    case 'customer': {
      const customerIds = union(doc.criteria.customer_ids, doc.customerIds);
      if (customerIds.length === 0) {
        return { ok: false, id: doc._id, error: 'customer promotion lists no customers' };
      }
      return {
        ok: true,
        promotion: {
          ...base,
          type: 'customer',
          customerIds,
          loyaltyLevels: doc.criteria.loyalty_levels,
          minOrderTotal: doc.criteria.min_order_total,
        },
      };
    }
  }
}
