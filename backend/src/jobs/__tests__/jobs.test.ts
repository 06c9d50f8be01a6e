import { describe, it, expect } from 'vitest';
import { startScoringCron } from '../scoring.job.js';
import { startIngestFlushCron } from '../ingest-flush.job.js';
import { buildTestApp } from '../../testing/test-engine.js';
import { mockLogger } from '../../testing/fakes.js';

describe('cron jobs', () => {
  const { engine } = buildTestApp();

  it('an empty expression disables the job', () => {
    const logger = mockLogger();
    expect(startScoringCron('', engine.scoring, logger)).toBeNull();
    expect(startIngestFlushCron('', engine.ingestor, logger)).toBeNull();
  });

  it('rejects an invalid expression', () => {
    expect(() => startScoringCron('every hour', engine.scoring, mockLogger())).toThrow(
      'Invalid SCORING_CRON expression: every hour'
    );
  });

  it('schedules a valid expression', () => {
    const task = startIngestFlushCron('*/5 * * * *', engine.ingestor, mockLogger());
    expect(task).not.toBeNull();
    task?.stop();
  });
});
