/**
 * SCORING CRON JOB
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Logger } from '../common/logger.js';
import { errorMessage } from '../common/errors.js';
import type { ScoringService } from '../modules/scoring/scoring.service.js';

/**
 * Returns null when the expression is empty (job disabled).
 */
export function startScoringCron(expr: string, scoring: ScoringService, logger: Logger): ScheduledTask | null {
  if (!expr) {
    logger.info({}, '[Scoring Cron] Disabled');
    return null;
  }
  if (!cron.validate(expr)) {
    throw new Error(`Invalid SCORING_CRON expression: ${expr}`);
  }

  const task = cron.schedule(expr, async () => {
    if (scoring.isRunning()) {
      logger.warn({}, '[Scoring Cron] Previous run still in progress, skipping tick');
      return;
    }
    try {
      const res = await scoring.runScoring();
      logger.info({ runId: res.runId, count: res.count }, '[Scoring Cron] Run finished');
    } catch (err) {
      logger.error({ err: errorMessage(err) }, '[Scoring Cron] Run failed');
    }
  });

  logger.info({ expr }, '[Scoring Cron] Started');
  return task;
}
