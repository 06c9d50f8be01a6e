/**
 * SCORING — Mongo ranking store
 */

import type { PipelineStage } from 'mongoose';
import { ProductRankingModel, type ProductRankingDoc } from './ranking.model.js';
import type { ProductRanking, RankingCandidate, RankingStore } from './scoring.types.js';

const RANKING_ORDER = { exposureScore: -1, productId: 1 } as const;

interface CandidateRow extends ProductRankingDoc {
  categoryId: string | null;
}

function fromDoc(doc: ProductRankingDoc): ProductRanking {
  return {
    productId: doc.productId,
    popularityScore: doc.popularityScore,
    coldScore: doc.coldScore,
    profitScore: doc.profitScore,
    freshnessScore: doc.freshnessScore,
    exposureScore: doc.exposureScore,
    updatedAt: doc.updatedAt,
  };
}

export class MongoRankingStore implements RankingStore {
  async upsertRanking(ranking: ProductRanking): Promise<void> {
    const { productId, ...scores } = ranking;
    await ProductRankingModel.updateOne({ productId }, { $set: scores }, { upsert: true }).exec();
  }

  async topRankings(limit: number): Promise<ProductRanking[]> {
    const docs = await ProductRankingModel.find()
      .sort(RANKING_ORDER)
      .limit(limit)
      .lean<ProductRankingDoc[]>()
      .exec();
    return docs.map(fromDoc);
  }

  /**
   * Rankings inner-joined with products (category drives the diversity cap).
   */
  async topCandidates(opts: { categoryId: string | null; limit: number }): Promise<RankingCandidate[]> {
    const pipeline: PipelineStage[] = [
      {
        $lookup: {
          from: 'products',
          localField: 'productId',
          foreignField: '_id',
          as: 'product',
        },
      },
      { $unwind: '$product' },
    ];
    if (opts.categoryId !== null) {
      pipeline.push({ $match: { 'product.categoryId': opts.categoryId } });
    }
    pipeline.push(
      { $sort: { ...RANKING_ORDER } },
      { $limit: opts.limit },
      {
        $project: {
          _id: 0,
          productId: 1,
          popularityScore: 1,
          coldScore: 1,
          profitScore: 1,
          freshnessScore: 1,
          exposureScore: 1,
          updatedAt: 1,
          categoryId: { $ifNull: ['$product.categoryId', null] },
        },
      }
    );

    const rows = await ProductRankingModel.aggregate<CandidateRow>(pipeline).exec();
    return rows.map((row) => ({ ranking: fromDoc(row), categoryId: row.categoryId }));
  }
}
