/**
 * EXPOSURE — Routes
 *
 * GET    /exposure           mix for (context, user, category), cached
 * POST   /exposure/refresh   rebuild, bypassing the cache
 * DELETE /exposure/cache     drop one cache key + slot, or everything
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseOrThrow } from '../../common/validation.js';
import type { ExposureService } from './exposure.service.js';
import type { ExposureRequest } from './exposure.types.js';

// Empty query values (?user_id=) read as absent
const optionalId = z.preprocess(
  (v) => (v === '' ? undefined : v),
  z.string().trim().min(1).max(64).optional()
);

const Context = z.string().trim().min(2).max(50);

const ExposureQuery = z.object({
  context: Context,
  user_id: optionalId,
  category_id: optionalId,
  limit: z.coerce.number().int().min(1).max(50).optional(),
});

const ClearQuery = z.object({
  context: Context.optional(),
  user_id: optionalId,
  category_id: optionalId,
});

export async function registerExposureRoutes(fastify: FastifyInstance, deps: { exposure: ExposureService }) {
  const toRequest = (query: unknown): ExposureRequest => {
    const q = parseOrThrow(ExposureQuery, query ?? {});
    return {
      context: q.context,
      userId: q.user_id ?? null,
      categoryId: q.category_id ?? null,
      limit: q.limit ?? deps.exposure.config.defaultLimit,
    };
  };

  fastify.get('/exposure', async (req) => {
    return deps.exposure.getExposure(toRequest(req.query));
  });

  fastify.post('/exposure/refresh', async (req) => {
    return deps.exposure.refreshExposure(toRequest(req.query));
  });

  fastify.delete('/exposure/cache', async (req) => {
    const q = parseOrThrow(ClearQuery, req.query ?? {});
    await deps.exposure.clearCache({
      context: q.context,
      userId: q.user_id ?? null,
      categoryId: q.category_id ?? null,
    });
    return { status: 'cleared' };
  });
}
