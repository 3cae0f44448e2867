// packages/worker/src/transport/worker-runner.ts
// Worker entrypoint wiring BullMQ to processSceneJob.
//   npm start --workspace @splat-pipeline/worker
import { fileURLToPath } from 'node:url';

import { errorMessage } from '@splat-pipeline/contracts';
import { loadEnvFiles } from '@splat-pipeline/shared-infrastructure';
import type { Worker } from 'bullmq';

import { processSceneJob } from '../application/process-scene-job.js';
import { loadConfig } from '../config/env.js';
import { logger } from '../infrastructure/logger.js';
import { getPipeline } from '../infrastructure/orchestrator-service.js';
import { createSceneWorker } from '../infrastructure/queue-bullmq.js';
import { closeRedisClient } from '../infrastructure/redis.js';

export function startWorker(): Worker {
  const config = loadConfig();
  // fail fast on bad pipeline or sink configuration
  getPipeline();

  const worker = createSceneWorker(
    (job) => processSceneJob(job, { timeoutMs: config.worker.jobTimeoutMs }),
    config,
  );

  const shutdown = async (signal: string) => {
    logger.info(`Shutting down worker (${signal})`, { component: 'worker' });
    try {
      await worker.close();
      await closeRedisClient();
      logger.info('Worker closed cleanly', { component: 'worker' });
      process.exit(0);
    } catch (error: unknown) {
      logger.error(`Error during worker shutdown: ${errorMessage(error)}`, { component: 'worker' });
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  logger.info('Worker started', {
    component: 'worker',
    queue: config.queue.name,
    concurrency: config.worker.concurrency,
  });
  return worker;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  try {
    loadEnvFiles();
    startWorker();
  } catch (error: unknown) {
    logger.error(`Failed to start worker: ${errorMessage(error)}`, { component: 'worker' });
    process.exit(1);
  }
}
