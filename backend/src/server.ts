import 'dotenv/config';
import type { ScheduledTask } from 'node-cron';
import { buildApp } from './app.js';
import { consoleLogger } from './common/logger.js';
import { errorMessage } from './common/errors.js';
import { loadEnv, weightSumDrift } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import { createEngine, mongoParts, settingsFrom } from './engine.js';
import { startScoringCron } from './jobs/scoring.job.js';
import { startIngestFlushCron } from './jobs/ingest-flush.job.js';

async function main() {
  const env = loadEnv();

  const { app, engine } = buildApp(
    (log) => createEngine(mongoParts(env, log), settingsFrom(env), log),
    {
      logLevel: env.LOG_LEVEL,
      corsOrigins: env.CORS_ORIGINS,
      production: env.NODE_ENV === 'production',
    }
  );
  const log = app.log;

  const drift = weightSumDrift(env);
  if (drift > 1e-6) {
    log.warn(
      {
        popularityWeight: env.EXPOSURE_POPULARITY_WEIGHT,
        strategicWeight: env.EXPOSURE_STRATEGIC_WEIGHT,
      },
      '[Config] Exposure weights do not sum to 1.0'
    );
  }

  await connectMongo(env.MONGO_URL, log);
  await ensureIndexes(log);

  const tasks: ScheduledTask[] = [];
  const scoringTask = startScoringCron(env.SCORING_CRON, engine.scoring, log);
  if (scoringTask) tasks.push(scoringTask);
  const flushTask = startIngestFlushCron(env.INGEST_FLUSH_CRON, engine.ingestor, log);
  if (flushTask) tasks.push(flushTask);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, '[Server] Shutting down');
    for (const task of tasks) task.stop();
    try {
      const summary = await engine.ingestor.flushAll();
      log.info({ ...summary }, '[Server] Pending events flushed');
    } catch (err) {
      log.error({ err: errorMessage(err) }, '[Server] Could not flush pending events');
    }
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch((err) => {
  consoleLogger.error({ err: errorMessage(err) }, '[Server] Fatal error');
  process.exit(1);
});
