/**
 * CATALOG — Promotion matching
 *
 * Resolution order for a candidate: product-scoped, then category-scoped,
 * then customer-scoped (only when a user is known). Within a type the
 * first promotion in list order wins.
 */

import type {
  CategoryPromotion,
  CustomerPromotion,
  ProductPromotion,
  Promotion,
} from './catalog.types.js';

export interface PromotionIndex {
  byProduct: Map<string, ProductPromotion>;
  category: CategoryPromotion[];
  customer: CustomerPromotion[];
}

export function buildPromotionIndex(promotions: Promotion[]): PromotionIndex {
  const index: PromotionIndex = { byProduct: new Map(), category: [], customer: [] };
  for (const promo of promotions) {
    switch (promo.type) {
      case 'product':
        for (const productId of promo.productIds) {
          if (!index.byProduct.has(productId)) {
            index.byProduct.set(productId, promo);
          }
        }
        break;
      case 'category':
        index.category.push(promo);
        break;
      case 'customer':
        index.customer.push(promo);
        break;
    }
  }
  return index;
}

export function resolvePromotion(
  index: PromotionIndex,
  product: { productId: string; categoryId: string | null },
  userId: string | null
): Promotion | null {
  const direct = index.byProduct.get(product.productId);
  if (direct) return direct;

  for (const promo of index.category) {
    if (
      promo.categoryIds.length === 0 ||
      (product.categoryId !== null && promo.categoryIds.includes(product.categoryId))
    ) {
      return promo;
    }
  }

  if (userId !== null) {
    for (const promo of index.customer) {
      if (promo.customerIds.includes(userId)) return promo;
    }
  }

  return null;
}
