import 'reflect-metadata';
import { Worker } from 'bullmq';
import IORedis from 'ioredis';
import { handleSegmentJob } from './queue/segmentJob';
import { createRuntime } from './runtime';
import { getErrorMessage } from './utils/errors';
import { logger } from './utils/logger';

async function start(): Promise<void> {
  const runtime = await createRuntime();
  const { redisUrl, segmentQueue } = runtime.env;

  const connection = new IORedis(redisUrl, { maxRetriesPerRequest: null });

  const worker = new Worker(segmentQueue, async (job) => {
    logger.info(`Job ${job.id ?? '?'} started`);
    const result = await handleSegmentJob(job.data, runtime);
    logger.info(`Job ${job.id ?? '?'} done: ${result.processed} processed, ${result.skipped} skipped, ${result.failed.length} failed`);
    return result;
  }, {
    connection,
    // one batch at a time; each batch runs its own parallel workers
    concurrency: 1,
  });

  worker.on('failed', (job, err) => {
    logger.error(`Job ${job?.id ?? '?'} failed: ${err.message}`, err);
  });

  worker.on('ready', () => {
    logger.info(`Worker ready on queue ${segmentQueue}`);
  });
}

start().catch((error: unknown) => {
  logger.error(getErrorMessage(error), error);
  process.exitCode = 1;
});
