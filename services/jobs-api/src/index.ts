/**
 * Jobs API server
 */

import {
  logger,
  enableDefaultMetrics,
  createQueue,
  checkBackpressure,
  reportQueueMetrics,
  PgRecordStore,
  ProcessingService,
  QUEUE_NAMES,
  type ExtractDocumentsJob,
} from '@tutorlog/shared';
import { createApp } from './app';

const port = parseInt(process.env.PORT || '8080', 10);

enableDefaultMetrics();

const store = new PgRecordStore();
const service = new ProcessingService({ store });
const extractQueue = createQueue<ExtractDocumentsJob, void>(QUEUE_NAMES.EXTRACT_DOCUMENTS);

const app = createApp({
  service,
  enqueueExtraction: async (payload) => {
    await extractQueue.add('extract_documents', payload, {
      jobId: `extract_${payload.job_id}`,
    });
    logger.info('Enqueued extract_documents job', { job_id: payload.job_id });
  },
  checkCapacity: async () => {
    await reportQueueMetrics([{ name: QUEUE_NAMES.EXTRACT_DOCUMENTS, queue: extractQueue }]);
    return checkBackpressure(extractQueue);
  },
  checkHealth: async () => {
    await store.ping();
  },
});

const server = app.listen(port, () => {
  logger.info('Jobs API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await extractQueue.close();
  await store.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((err: unknown) => logger.error('Shutdown failed', err));
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((err: unknown) => logger.error('Shutdown failed', err));
});
