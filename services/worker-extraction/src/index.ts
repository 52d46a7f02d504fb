/**
 * Extraction Worker
 *
 * Consumes extract_documents: reads the payroll PDF through the OCR cascade
 * and the feedback workbook, stores both extractions, and enqueues
 * validate_job when both succeed.
 */

import { Job } from 'bullmq';
import {
  logger,
  runWithContextAsync,
  createWorker,
  createQueue,
  serveMetrics,
  enableDefaultMetrics,
  registerDefaultEngines,
  PgRecordStore,
  ProcessingService,
  QUEUE_NAMES,
  type ExtractDocumentsJob,
  type ValidateJobJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@tutorlog/shared';

registerDefaultEngines();
enableDefaultMetrics();

const store = new PgRecordStore();
const service = new ProcessingService({ store });
const validateQueue = createQueue<ValidateJobJob, void>(QUEUE_NAMES.VALIDATE_JOB);

async function processExtractDocuments(job: Job<ExtractDocumentsJob, void>): Promise<void> {
  const { correlation_id, job_id } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, jobId: job_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing extract_documents', {
      queueJobId: job.id,
      attempt: job.attemptsMade + 1,
    });

    try {
      const { failures } = await service.runExtraction(job_id);

      if (failures.length > 0) {
        // Already marked failed by runExtraction
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENTS, status: 'failed' });
        return;
      }

      await validateQueue.add(
        'validate_job',
        { correlation_id, job_id },
        { jobId: `validate_${job_id}` }
      );
      logger.info('Enqueued validate_job');

      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENTS, status: 'success' });
      jobDurationHistogram.observe(
        { queue: QUEUE_NAMES.EXTRACT_DOCUMENTS, status: 'success' },
        duration
      );
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENTS, status: 'failed' });
      throw error;
    }
  });
}

// Expose /metrics for Prometheus
serveMetrics(parseInt(process.env.METRICS_PORT || '9091', 10));

const worker = createWorker<ExtractDocumentsJob, void>(
  QUEUE_NAMES.EXTRACT_DOCUMENTS,
  processExtractDocuments
);

logger.info('Extraction worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await validateQueue.close();
  await store.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((err: unknown) => logger.error('Shutdown failed', err));
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((err: unknown) => logger.error('Shutdown failed', err));
});
