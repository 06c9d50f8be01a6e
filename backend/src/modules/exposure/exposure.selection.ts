/**
 * EXPOSURE — Selection passes
 *
 * Three passes over the ranked candidates, always in this order since
 * each one reads the category counts left by the previous:
 *
 *   1. fresh     ranking order; skips capped categories and products shown
 *                in the previous mix
 *   2. backfill  re-tries the repeat-skipped products while under quota
 *   3. coldBoost by cold score; adds cold, stocked products not yet chosen
 *
 * Category cap holds identically in every pass. Given the same candidate
 * list the result is the same list.
 */

import type { Promotion } from '../catalog/catalog.types.js';
import type { ExposureItem } from './exposure.types.js';

export interface SelectionCandidate {
  productId: string;
  categoryId: string | null;
  popularityScore: number;
  coldScore: number;
  freshnessScore: number;
  exposureScore: number;
  stockOnHand: number;
  promotion: Promotion | null;
}

export interface SelectionParams {
  limit: number;
  categoryCap: number;
  coldThreshold: number;
  stockThreshold: number;
  freshnessThreshold: number;
  popularityWeight: number;
  strategicWeight: number;
}

const POPULAR_THRESHOLD = 0.5;
const NO_CATEGORY = '__none__';

function pct(weight: number): number {
  return Math.round(weight * 100);
}

export function buildItem(c: SelectionCandidate, params: SelectionParams, coldBoost: boolean): ExposureItem {
  const reason: string[] = [];
  const badges: string[] = [];

  if (c.popularityScore >= POPULAR_THRESHOLD) {
    reason.push(`popular_${pct(params.popularityWeight)}`);
  }
  if (c.stockOnHand >= params.stockThreshold) {
    reason.push('in_stock');
  }
  if (coldBoost && c.coldScore >= params.coldThreshold) {
    reason.push(`cold_boost_${pct(params.strategicWeight)}`);
  }
  if (c.freshnessScore >= params.freshnessThreshold) {
    reason.push('fresh');
  }
  if (c.promotion) {
    badges.push('promo');
    reason.push(`promo:${c.promotion.id}`);
  }

  return { product_id: c.productId, reason, badges };
}

export class SelectionState {
  readonly items: ExposureItem[] = [];
  private readonly selected = new Set<string>();
  private readonly categoryCounts = new Map<string, number>();

  constructor(readonly params: SelectionParams) {}

  get full(): boolean {
    return this.items.length >= this.params.limit;
  }

  has(productId: string): boolean {
    return this.selected.has(productId);
  }

  capReached(categoryId: string | null): boolean {
    if (this.params.categoryCap <= 0) return false;
    return (this.categoryCounts.get(categoryId ?? NO_CATEGORY) ?? 0) >= this.params.categoryCap;
  }

  add(c: SelectionCandidate, coldBoost: boolean) {
    const key = c.categoryId ?? NO_CATEGORY;
    this.items.push(buildItem(c, this.params, coldBoost));
    this.selected.add(c.productId);
    this.categoryCounts.set(key, (this.categoryCounts.get(key) ?? 0) + 1);
  }
}

export interface FreshPassResult {
  /** previously shown, left for backfill */
  skippedForRepeat: SelectionCandidate[];
  /** every candidate reached and not capped; the cold-boost pool */
  considered: SelectionCandidate[];
}

export function freshPass(
  state: SelectionState,
  candidates: SelectionCandidate[],
  previouslyShown: ReadonlySet<string>
): FreshPassResult {
  const skippedForRepeat: SelectionCandidate[] = [];
  const considered: SelectionCandidate[] = [];

  for (const c of candidates) {
    if (state.full) break;
    if (state.has(c.productId)) continue;
    if (state.capReached(c.categoryId)) continue;

    considered.push(c);
    if (previouslyShown.has(c.productId)) {
      skippedForRepeat.push(c);
      continue;
    }
    state.add(c, false);
  }

  return { skippedForRepeat, considered };
}

export function backfillPass(state: SelectionState, skippedForRepeat: SelectionCandidate[]) {
  for (const c of skippedForRepeat) {
    if (state.full) break;
    if (state.has(c.productId)) continue;
    if (state.capReached(c.categoryId)) continue;
    state.add(c, false);
  }
}

export function coldBoostPass(state: SelectionState, considered: SelectionCandidate[]) {
  // stable sort: equal cold scores keep ranking order
  const byCold = [...considered].sort((a, b) => b.coldScore - a.coldScore);
  for (const c of byCold) {
    if (state.full) break;
    if (state.has(c.productId)) continue;
    if (c.coldScore < state.params.coldThreshold) continue;
    if (state.capReached(c.categoryId)) continue;
    if (c.stockOnHand < state.params.stockThreshold) continue;
    state.add(c, true);
  }
}

/**
 * Candidates must arrive in ranking order (exposureScore DESC, productId ASC).
 */
export function selectMix(
  candidates: SelectionCandidate[],
  previouslyShown: ReadonlySet<string>,
  params: SelectionParams
): ExposureItem[] {
  const state = new SelectionState(params);
  const { skippedForRepeat, considered } = freshPass(state, candidates, previouslyShown);
  backfillPass(state, skippedForRepeat);
  coldBoostPass(state, considered);
  return state.items.slice(0, params.limit);
}
