/**
 * SCORING — Routes
 *
 * POST /internal/scoring/run        run a scoring batch now
 * GET  /internal/scoring/rankings   top-N rankings by exposure_score
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseOrThrow } from '../../common/validation.js';
import type { ScoringService } from './scoring.service.js';
import { toRankingRead, toScoringRunResponse } from './scoring.types.js';

const RunQuery = z.object({
  window_days: z.coerce.number().int().min(1).max(365).optional(),
});

const RankingsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export async function registerScoringRoutes(fastify: FastifyInstance, deps: { scoring: ScoringService }) {
  const prefix = '/internal/scoring';

  fastify.post(`${prefix}/run`, async (req) => {
    const fromQuery = parseOrThrow(RunQuery, req.query ?? {});
    const fromBody = parseOrThrow(RunQuery, req.body ?? {});
    const windowDays = fromBody.window_days ?? fromQuery.window_days ?? deps.scoring.config.windowDays;

    const result = await deps.scoring.runScoring(windowDays);
    return toScoringRunResponse(result);
  });

  fastify.get(`${prefix}/rankings`, async (req) => {
    const { limit } = parseOrThrow(RankingsQuery, req.query ?? {});
    const rankings = await deps.scoring.getLatestRankings(limit);
    return rankings.map(toRankingRead);
  });
}
