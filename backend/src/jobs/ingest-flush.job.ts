/**
 * INGEST FLUSH CRON JOB
 *
 * Drains events still pending in the ingestor.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Logger } from '../common/logger.js';
import { errorMessage } from '../common/errors.js';
import type { EventIngestor } from '../modules/engagement/engagement.ingestor.js';

export function startIngestFlushCron(expr: string, ingestor: EventIngestor, logger: Logger): ScheduledTask | null {
  if (!expr) {
    logger.info({}, '[Ingest Cron] Disabled');
    return null;
  }
  if (!cron.validate(expr)) {
    throw new Error(`Invalid INGEST_FLUSH_CRON expression: ${expr}`);
  }

  const task = cron.schedule(expr, async () => {
    if (ingestor.pendingEvents() === 0) return;
    try {
      const summary = await ingestor.flushAll();
      logger.info({ ...summary }, '[Ingest Cron] Flushed pending events');
    } catch (err) {
      logger.error({ err: errorMessage(err) }, '[Ingest Cron] Flush failed');
    }
  });

  logger.info({ expr }, '[Ingest Cron] Started');
  return task;
}
