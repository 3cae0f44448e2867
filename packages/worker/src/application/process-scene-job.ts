// packages/worker/src/application/process-scene-job.ts
// Application service executed by the BullMQ worker:
// run the pipeline for one queue job, forward progress to BullMQ and
// return the Job Result as the job's return value.
import { errorMessage, type JobResult, type ProgressReport } from '@splat-pipeline/contracts';
import type { ScenePipeline } from '@splat-pipeline/orchestrator';

import type { SceneQueueJob } from '../infrastructure/queue-bullmq.js';
import { createJobLogger } from '../infrastructure/logger.js';
import { getPipeline } from '../infrastructure/orchestrator-service.js';

export type ProcessableJob = Pick<SceneQueueJob, 'id' | 'data' | 'updateProgress'>;

export interface ProcessSceneJobOptions {
  pipeline?: ScenePipeline;
  /** 0 or undefined disables the timeout. */
  timeoutMs?: number;
}

export async function processSceneJob(
  job: ProcessableJob,
  options: ProcessSceneJobOptions = {},
): Promise<JobResult> {
  const runId = job.id ?? 'unknown';
  const log = createJobLogger(runId, runId);
  const pipeline = options.pipeline ?? getPipeline();
  const signal =
    options.timeoutMs && options.timeoutMs > 0 ? AbortSignal.timeout(options.timeoutMs) : undefined;

  // updateProgress is async; keep updates ordered and report the first failure once the job ends
  let updates: Promise<void> = Promise.resolve();
  let updateError: unknown;
  let updateFailed = false;
  const onProgress = (report: ProgressReport) => {
    updates = updates
      .then(() => job.updateProgress({ progress: report.progress, stage: report.stage }))
      .catch((error: unknown) => {
        if (!updateFailed) {
          updateFailed = true;
          updateError = error;
        }
      });
  };

  const request = { id: job.id, ...job.data };
  const started = Date.now();
  const result = await pipeline.runJob(request, { onProgress }, { signal, runId });

  await updates;
  if (updateFailed) {
    log.warn('Progress update failed', { event: 'progress_update_failed', error: errorMessage(updateError) });
  }

  const fields = { durationMs: Date.now() - started, progress: result.progress };
  if (result.status === 'success') {
    log.info('Scene job succeeded', { ...fields, sceneId: result.scene_id, url: result.plt_url });
  } else {
    log.error('Scene job failed', {
      ...fields,
      sceneId: result.scene_id,
      error: result.error,
      timedOut: signal?.aborted ?? false,
    });
  }
  return result;
}
