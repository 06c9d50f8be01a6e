/**
 * CATALOG — Collaborator contracts
 *
 * The engine only reads from the catalog/inventory system: financial
 * metrics per product and the currently active promotions.
 */

export interface FinancialMetrics {
  margin: number;
  stockOnHand: number;
  categoryId: string | null;
}

export const ZERO_FINANCIALS: FinancialMetrics = Object.freeze({
  margin: 0,
  stockOnHand: 0,
  categoryId: null,
});

export interface FinancialMetricsProvider {
  getFinancialMetrics(productId: string): Promise<FinancialMetrics>;
}

export interface PromotionBenefits {
  percentOff: number | null;
  amountOff: number | null;
  freeShipping: boolean;
}

interface PromotionBase {
  id: string;
  name: string;
  scope: string;
  startAt: Date;
  endAt: Date;
  benefits: PromotionBenefits;
}

export interface CategoryPromotion extends PromotionBase {
  type: 'category';
  /** Empty list: every category qualifies */
  categoryIds: string[];
  minOrderTotal: number | null;
}

export interface ProductPromotion extends PromotionBase {
  type: 'product';
  productIds: string[];
}

export interface CustomerPromotion extends PromotionBase {
  type: 'customer';
  customerIds: string[];
  loyaltyLevels: string[];
  minOrderTotal: number | null;
}

export type Promotion = CategoryPromotion | ProductPromotion | CustomerPromotion;
export type PromotionType = Promotion['type'];

export interface PromotionProvider {
  listActivePromotions(now: Date): Promise<Promotion[]>;
}
