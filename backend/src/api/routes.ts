import type { FastifyInstance } from 'fastify';
import type { Engine } from '../engine.js';
import { registerEngagementRoutes } from '../modules/engagement/engagement.routes.js';
import { registerScoringRoutes } from '../modules/scoring/scoring.routes.js';
import { registerExposureRoutes } from '../modules/exposure/exposure.routes.js';

export async function registerRoutes(fastify: FastifyInstance, engine: Engine) {
  fastify.get('/health', async () => {
    const { size, hits, misses, hitRate } = engine.cache.stats();
    return {
      ok: true,
      ts: engine.clock.utcNow().toISOString(),
      cache: { size, hits, misses, hitRate },
    };
  });

  await registerEngagementRoutes(fastify, {
    ingestor: engine.ingestor,
    engagementStore: engine.engagementStore,
    clock: engine.clock,
  });
  await registerScoringRoutes(fastify, { scoring: engine.scoring });
  await registerExposureRoutes(fastify, { exposure: engine.exposure });
}
