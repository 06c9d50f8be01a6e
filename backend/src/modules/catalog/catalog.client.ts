/**
 * CATALOG — Mongo-backed collaborators
 */

import type { Logger } from '../../common/logger.js';
import { ProductModel, PromotionModel, type ProductDoc, type PromotionDoc } from './catalog.model.js';
import { parsePromotion } from './promotion.parser.js';
import {
  ZERO_FINANCIALS,
  type FinancialMetrics,
  type FinancialMetricsProvider,
  type Promotion,
  type PromotionProvider,
} from './catalog.types.js';

// Margin is approximated from list price until inventory exposes unit cost
const MARGIN_RATE = 0.35;

export class MongoCatalogClient implements FinancialMetricsProvider {
  async getFinancialMetrics(productId: string): Promise<FinancialMetrics> {
    const product = await ProductModel.findById(productId)
      .select({ price: 1, categoryId: 1, stockOnHand: 1 })
      .lean<Pick<ProductDoc, '_id' | 'price' | 'categoryId' | 'stockOnHand'>>()
      .exec();
    if (!product) {
      return { ...ZERO_FINANCIALS };
    }
    return {
      margin: (product.price ?? 0) * MARGIN_RATE,
      stockOnHand: Math.max(0, Math.floor(product.stockOnHand ?? 0)),
      categoryId: product.categoryId ?? null,
    };
  }
}

export class MongoPromotionProvider implements PromotionProvider {
  constructor(private logger: Logger) {}

  async listActivePromotions(now: Date): Promise<Promotion[]> {
    const docs = await PromotionModel.find({
      status: 'active',
      startAt: { $lte: now },
      endAt: { $gte: now },
    })
      .sort({ startAt: 1, _id: 1 })
      .lean<PromotionDoc[]>()
      .exec();

    const promotions: Promotion[] = [];
    for (const doc of docs) {
      const result = parsePromotion(doc);
      if (result.ok) {
        promotions.push(result.promotion);
      } else {
        this.logger.warn({ promotionId: result.id, error: result.error }, '[Catalog] Skipping malformed promotion');
      }
    }
    return promotions;
  }
}
