// packages/worker/src/infrastructure/queue-bullmq.ts
// BullMQ worker adapter. Retries and backoff belong to whoever enqueues;
// a failed Job Result is a normal return value here.
import { type Job, type Processor, Worker } from 'bullmq';

import type { JobResult } from '@splat-pipeline/contracts';
import type { JobRequest } from '@splat-pipeline/orchestrator';

import { loadConfig, type WorkerConfig } from '../config/env.js';
import { createJobLogger, logger } from './logger.js';
import { createRedisClient } from './redis.js';

export type SceneQueueJob = Job<JobRequest, JobResult>;

export function createSceneWorker(
  processor: Processor<JobRequest, JobResult>,
  config: WorkerConfig = loadConfig(),
): Worker<JobRequest, JobResult> {
  const connection = createRedisClient(config);

  const worker = new Worker<JobRequest, JobResult>(config.queue.name, processor, {
    connection,
    concurrency: config.worker.concurrency,
  });

  worker.on('active', (job: SceneQueueJob) => {
    createJobLogger(String(job.id)).info('Processing job', { event: 'worker_active' });
  });

  worker.on('completed', (job: SceneQueueJob, result: JobResult) => {
    createJobLogger(String(job.id)).info('Job completed', {
      event: 'worker_completed',
      status: result.status,
      progress: result.progress,
    });
  });

  worker.on('failed', (job: SceneQueueJob | undefined, err: Error) => {
    createJobLogger(job?.id ?? 'unknown').error(err, { event: 'worker_failed' });
  });

  worker.on('error', (err: Error) => {
    logger.error(err, { component: 'bullmq-worker' });
  });

  return worker;
}
