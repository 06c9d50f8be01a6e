/**
 * ENGAGEMENT — Mongo store
 */

import { DataStoreUnavailableError } from '../../common/errors.js';
import {
  CustomerEngagementDailyModel,
  ProductEngagementDailyModel,
  type CustomerEngagementDailyDoc,
  type ProductEngagementDailyDoc,
} from './engagement.model.js';
import type {
  CustomerDelta,
  CustomerEngagementDaily,
  EngagementDaily,
  EngagementStore,
  ProductDelta,
} from './engagement.types.js';

function fromProductDoc(doc: ProductEngagementDailyDoc): EngagementDaily {
  return {
    productId: doc.productId,
    date: doc.date,
    views: doc.views,
    clicks: doc.clicks,
    carts: doc.carts,
    purchases: doc.purchases,
    revenue: doc.revenue,
  };
}

function fromCustomerDoc(doc: CustomerEngagementDailyDoc): CustomerEngagementDaily {
  return {
    customerId: doc.customerId,
    date: doc.date,
    views: doc.views,
    clicks: doc.clicks,
    carts: doc.carts,
    purchases: doc.purchases,
    pointsEarned: doc.pointsEarned,
  };
}

export class MongoEngagementStore implements EngagementStore {
  async listProductDailySince(sinceDay: string): Promise<EngagementDaily[]> {
    const docs = await ProductEngagementDailyModel.find({ date: { $gte: sinceDay } })
      .sort({ productId: 1, date: 1 })
      .lean<ProductEngagementDailyDoc[]>()
      .exec();
    return docs.map(fromProductDoc);
  }

  async incrementProduct(productId: string, date: string, delta: ProductDelta): Promise<EngagementDaily> {
    const doc = await ProductEngagementDailyModel.findOneAndUpdate(
      { productId, date },
      { $inc: { ...delta } },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    )
      .lean<ProductEngagementDailyDoc>()
      .exec();
    if (!doc) {
      throw new DataStoreUnavailableError(`Upsert of engagement ${productId}/${date} returned nothing`);
    }
    return fromProductDoc(doc);
  }

  async incrementCustomer(customerId: string, date: string, delta: CustomerDelta): Promise<void> {
    await CustomerEngagementDailyModel.updateOne(
      { customerId, date },
      { $inc: { ...delta } },
      { upsert: true }
    ).exec();
  }

  async findProductDaily(productId: string, date?: string): Promise<EngagementDaily[]> {
    const docs = await ProductEngagementDailyModel.find(date ? { productId, date } : { productId })
      .sort({ date: 1 })
      .lean<ProductEngagementDailyDoc[]>()
      .exec();
    return docs.map(fromProductDoc);
  }

  async findCustomerDaily(customerId: string, date?: string): Promise<CustomerEngagementDaily[]> {
    const docs = await CustomerEngagementDailyModel.find(date ? { customerId, date } : { customerId })
      .sort({ date: 1 })
      .lean<CustomerEngagementDailyDoc[]>()
      .exec();
    return docs.map(fromCustomerDoc);
  }
}
