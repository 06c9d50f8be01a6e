/**
 * ENGAGEMENT — Routes
 *
 * POST /events                         tracker event intake (202)
 * GET  /events/products/:productId     daily product rows
 * GET  /events/customers/:customerId   daily customer rows
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { toUtcDay, isUtcDay, type Clock } from '../../common/clock.js';
import { parseOrThrow } from '../../common/validation.js';
import type { EventIngestor } from './engagement.ingestor.js';
import {
  EngagementEventSchema,
  toCustomerRead,
  toProductRead,
  type EngagementStore,
  type ProductEngagementRead,
} from './engagement.types.js';

export interface EngagementRouteDeps {
  ingestor: EventIngestor;
  engagementStore: EngagementStore;
  clock: Clock;
}

const DayQuery = z.object({
  day: z.string().refine(isUtcDay, 'expected YYYY-MM-DD').optional(),
});

const Id = z.string().trim().min(1).max(64);
const ProductParams = z.object({ productId: Id });
const CustomerParams = z.object({ customerId: Id });

export async function registerEngagementRoutes(fastify: FastifyInstance, deps: EngagementRouteDeps) {
  fastify.post('/events', async (req, reply) => {
    const event = parseOrThrow(EngagementEventSchema, req.body ?? {});
    const row = await deps.ingestor.record(event);

    const body: ProductEngagementRead = row
      ? toProductRead(row)
      : {
          product_id: event.product_id,
          date: toUtcDay(event.timestamp ?? deps.clock.utcNow()),
          views: 0,
          clicks: 0,
          carts: 0,
          purchases: 0,
          revenue: 0,
        };
    return reply.code(202).send(body);
  });

  fastify.get('/events/products/:productId', async (req) => {
    const { productId } = parseOrThrow(ProductParams, req.params);
    const { day } = parseOrThrow(DayQuery, req.query);
    const rows = await deps.engagementStore.findProductDaily(productId, day);
    return rows.map(toProductRead);
  });

  fastify.get('/events/customers/:customerId', async (req) => {
    const { customerId } = parseOrThrow(CustomerParams, req.params);
    const { day } = parseOrThrow(DayQuery, req.query);
    const rows = await deps.engagementStore.findCustomerDaily(customerId, day);
    return rows.map(toCustomerRead);
  });
}
