/**
 * ENGAGEMENT — Event ingestor
 *
 * Owns the ingestion state that feeds the daily aggregates:
 * - dedup LRU keyed by (actor, product, hour bucket, event type)
 * - pending events grouped by hour bucket, bounded in total size
 *
 * Flushing a bucket folds its events into $inc increments on the
 * product/customer daily rows. An event's dedup key is held only while the
 * event is queued or written; a flush that fails before an event's product
 * row lands releases its key, so the client can send it again.
 */

import { toUtcDay, systemClock, type Clock } from '../../common/clock.js';
import type { Logger } from '../../common/logger.js';
import { errorMessage } from '../../common/errors.js';
import { LruCache } from '../shared/runtime/lru-cache.js';
import type {
  CustomerDelta,
  EngagementDaily,
  EngagementEvent,
  EngagementStore,
  ProductDelta,
} from './engagement.types.js';

const HOUR_MS = 60 * 60 * 1000;
const POINTS_PER_PURCHASED_UNIT = 10;

export interface EventIngestorOptions {
  store: EngagementStore;
  logger: Logger;
  clock?: Clock;
  dedupCapacity: number;
  maxPendingEvents: number;
}

export interface FlushSummary {
  buckets: number;
  events: number;
  products: number;
  customers: number;
}

function emptyProductDelta(): ProductDelta {
  return { views: 0, clicks: 0, carts: 0, purchases: 0, revenue: 0 };
}

function emptyCustomerDelta(): CustomerDelta {
  return { views: 0, clicks: 0, carts: 0, purchases: 0, pointsEarned: 0 };
}

export function hourBucket(ts: Date): string {
  return new Date(Math.floor(ts.getTime() / HOUR_MS) * HOUR_MS).toISOString();
}

export function dedupKey(event: EngagementEvent, bucket: string): string {
  const actor = event.user_id ?? event.session_id ?? 'anon';
  return `${actor}:${event.product_id}:${bucket}:${event.event_type}`;
}

/**
 * Folds one bucket's events into per-product and per-customer increments.
 */
export function aggregateEvents(events: EngagementEvent[]): {
  products: Map<string, ProductDelta>;
  customers: Map<string, CustomerDelta>;
} {
  const products = new Map<string, ProductDelta>();
  const customers = new Map<string, CustomerDelta>();

  for (const event of events) {
    let p = products.get(event.product_id);
    if (!p) {
      p = emptyProductDelta();
      products.set(event.product_id, p);
    }

    let c: CustomerDelta | undefined;
    if (event.user_id) {
      c = customers.get(event.user_id);
      if (!c) {
        c = emptyCustomerDelta();
        customers.set(event.user_id, c);
      }
    }

    const qty = event.metadata?.quantity ?? 1;

    switch (event.event_type) {
      case 'view':
        p.views += 1;
        if (c) c.views += 1;
        break;
      case 'click':
        p.clicks += 1;
        if (c) c.clicks += 1;
        break;
      case 'add_to_cart':
        p.carts += qty;
        if (c) c.carts += qty;
        break;
      case 'purchase':
        p.purchases += qty;
        if (event.price !== null && event.price !== undefined) {
          p.revenue += event.price * qty;
        }
        if (c) {
          c.purchases += qty;
          c.pointsEarned += qty * POINTS_PER_PURCHASED_UNIT;
        }
        break;
    }
  }

  return { products, customers };
}

export class EventIngestor {
  private readonly store: EngagementStore;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly maxPendingEvents: number;
  private readonly dedup: LruCache<string, true>;
  private readonly pending = new Map<string, EngagementEvent[]>();
  private pendingCount = 0;

  constructor(opts: EventIngestorOptions) {
    this.store = opts.store;
    this.logger = opts.logger;
    this.clock = opts.clock ?? systemClock;
    this.maxPendingEvents = opts.maxPendingEvents;
    this.dedup = new LruCache<string, true>(opts.dedupCapacity);
  }

  /**
   * Queue an event under its hour bucket.
   * Returns the bucket, or null when the event is a duplicate.
   */
  async enqueue(event: EngagementEvent): Promise<string | null> {
    const ts = event.timestamp ?? this.clock.utcNow();
    const bucket = hourBucket(ts);
    const key = dedupKey(event, bucket);
    if (this.dedup.has(key)) {
      return null;
    }

    if (this.pendingCount >= this.maxPendingEvents) {
      const oldest = this.oldestBucket();
      if (oldest) {
        this.logger.warn(
          { bucket: oldest, pending: this.pendingCount },
          '[Ingest] Pending queue full, flushing oldest bucket'
        );
        await this.flushBucket(oldest);
      }
      // the same event may have been queued while the flush was running
      if (this.dedup.has(key)) {
        return null;
      }
    }

    this.dedup.set(key, true);
    const events = this.pending.get(bucket) ?? [];
    events.push({ ...event, timestamp: ts });
    this.pending.set(bucket, events);
    this.pendingCount++;
    return bucket;
  }

  /**
   * Enqueue and flush the event's bucket right away.
   * Returns the product's daily row after the write, or null for a duplicate.
   */
  async record(event: EngagementEvent): Promise<EngagementDaily | null> {
    const bucket = await this.enqueue(event);
    if (bucket === null) {
      return null;
    }
    const written = await this.flushBucket(bucket);
    const row = written.get(event.product_id);
    if (row) {
      return row;
    }
    // Another flush already drained this bucket
    const day = toUtcDay(new Date(bucket));
    const rows = await this.store.findProductDaily(event.product_id, day);
    return rows[0] ?? null;
  }

  async flushBucket(bucket: string): Promise<Map<string, EngagementDaily>> {
    const events = this.pending.get(bucket);
    const written = new Map<string, EngagementDaily>();
    if (!events || events.length === 0) {
      this.pending.delete(bucket);
      return written;
    }
    this.pending.delete(bucket);
    this.pendingCount -= events.length;

    const day = toUtcDay(new Date(bucket));
    const { products, customers } = aggregateEvents(events);

    try {
      for (const [productId, delta] of products) {
        written.set(productId, await this.store.incrementProduct(productId, day, delta));
      }
      for (const [customerId, delta] of customers) {
        await this.store.incrementCustomer(customerId, day, delta);
      }
    } catch (err) {
      const unwritten = events.filter((e) => !written.has(e.product_id));
      for (const e of unwritten) {
        this.dedup.delete(dedupKey(e, bucket));
      }
      this.logger.error(
        { bucket, events: events.length, released: unwritten.length, err: errorMessage(err) },
        '[Ingest] Bucket flush failed'
      );
      throw err;
    }

    return written;
  }

  async flushAll(): Promise<FlushSummary> {
    const summary: FlushSummary = { buckets: 0, events: 0, products: 0, customers: 0 };
    for (const bucket of [...this.pending.keys()].sort()) {
      const events = this.pending.get(bucket) ?? [];
      const { customers } = aggregateEvents(events);
      const written = await this.flushBucket(bucket);
      summary.buckets++;
      summary.events += events.length;
      summary.products += written.size;
      summary.customers += customers.size;
    }
    return summary;
  }

  pendingEvents(): number {
    return this.pendingCount;
  }

  private oldestBucket(): string | undefined {
    return [...this.pending.keys()].sort()[0];
  }
}
