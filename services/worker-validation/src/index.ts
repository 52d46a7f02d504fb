/**
 * Validation Worker
 *
 * Consumes validate_job and cross-checks the stored payroll and feedback
 * extractions.
 */

import { Job } from 'bullmq';
import {
  logger,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  enableDefaultMetrics,
  PgRecordStore,
  ProcessingService,
  MissingExtractionError,
  QUEUE_NAMES,
  type ValidateJobJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@tutorlog/shared';

enableDefaultMetrics();

const store = new PgRecordStore();
const service = new ProcessingService({ store });

async function processValidateJob(job: Job<ValidateJobJob, void>): Promise<void> {
  const { correlation_id, job_id } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, jobId: job_id }, async () => {
    const startTime = Date.now();

    try {
      const result = await service.validateJob(job_id);
      logger.info('Validation stored', {
        result_id: result.id,
        status: result.status,
        total_issues: result.total_issues,
      });

      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.VALIDATE_JOB, status: 'success' });
      jobDurationHistogram.observe(
        { queue: QUEUE_NAMES.VALIDATE_JOB, status: 'success' },
        (Date.now() - startTime) / 1000
      );
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.VALIDATE_JOB, status: 'failed' });
      // Job is already marked failed; no retry
      if (error instanceof MissingExtractionError) {
        logger.warn('Validation skipped', { reason: error.message });
        return;
      }
      throw error;
    }
  });
}

serveMetrics(parseInt(process.env.METRICS_PORT || '9092', 10));

const worker = createWorker<ValidateJobJob, void>(QUEUE_NAMES.VALIDATE_JOB, processValidateJob);

logger.info('Validation worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await store.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((err: unknown) => logger.error('Shutdown failed', err));
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((err: unknown) => logger.error('Shutdown failed', err));
});
