import { randomUUID } from 'node:crypto';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { fetchArtifact } from '@splat-pipeline/artifact-fetcher';
import { runCommand, type CommandRunner } from '@splat-pipeline/command-runner';
import {
  errorMessage,
  noopLogger,
  noopMetrics,
  type JobCallbacks,
  type JobResult,
  type JobState,
  type PipelineLogger,
  type PipelineMetrics,
  type ProgressStage,
} from '@splat-pipeline/contracts';
import { prepareScene } from '@splat-pipeline/dataset-preparer';
import { createSink, publishResult, type ResultSink, type S3ModuleLoader } from '@splat-pipeline/result-publisher';
import { resolveSinkConfig, type SinkConfig } from '@splat-pipeline/shared-infrastructure';

import { loadPipelineConfig, trainerArgs, type PipelineConfig } from './config.js';
import { parseJobRequest } from './job-request.js';
import { createWorkspaceManager, releaseQuietly, type WorkspaceManager } from './workspace.js';

export type PipelineStage = 'download' | 'prepare' | 'train' | 'upload';
type StageStatus = 'start' | 'success' | 'failed';

export interface CreatePipelineOptions {
  config?: PipelineConfig;
  /** Ignored when `sink` is given. */
  sinkConfig?: SinkConfig;
  sink?: ResultSink;
  runner?: CommandRunner;
  fetchImplementation?: typeof fetch;
  loadS3Module?: S3ModuleLoader;
  workspaces?: WorkspaceManager;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
}

export interface RunJobOptions {
  /** Aborting terminates the running external tool and fails the job. */
  signal?: AbortSignal;
  runId?: string;
}

export interface ScenePipeline {
  config: PipelineConfig;
  sink?: ResultSink;
  logger: PipelineLogger;
  metrics: PipelineMetrics;
  runJob(request: unknown, callbacks?: JobCallbacks, options?: RunJobOptions): Promise<JobResult>;
}

export function createPipeline(options: CreatePipelineOptions = {}): ScenePipeline {
  const config = options.config ?? loadPipelineConfig();
  const logger = options.logger ?? noopLogger;
  const metrics = options.metrics ?? noopMetrics;
  const runner = options.runner ?? runCommand;
  const workspaces = options.workspaces ?? createWorkspaceManager(config.workdir);
  const sink =
    options.sink ??
    createSink(options.sinkConfig ?? resolveSinkConfig(), {
      fetchImplementation: options.fetchImplementation,
      loadS3Module: options.loadS3Module,
      logger,
    });

  async function runJob(
    request: unknown,
    callbacks: JobCallbacks = {},
    runOptions: RunJobOptions = {},
  ): Promise<JobResult> {
    const runId = runOptions.runId ?? randomUUID();
    const { signal } = runOptions;
    const pipelineStartedAt = Date.now();
    const stageStartTimes = new Map<PipelineStage, number>();
    let state: JobState = 'created';
    let progress = 0;
    let sceneId: string | undefined;
    let workspace: string | undefined;

    const report = (stage: ProgressStage, value: number) => {
      progress = value;
      callbacks.onProgress?.({ progress: value, stage });
    };

    const emitStage = (stage: PipelineStage, status: StageStatus, detail?: Record<string, unknown>) => {
      if (status === 'start') {
        stageStartTimes.set(stage, Date.now());
        logger.log({ level: 'info', message: `stage.${stage}.start`, runId, stage, detail });
        return;
      }

      const startedAt = stageStartTimes.get(stage);
      stageStartTimes.delete(stage);
      const durationMs = startedAt !== undefined ? Math.max(Date.now() - startedAt, 0) : undefined;
      const detailWithDuration = durationMs !== undefined ? { ...(detail ?? {}), durationMs } : detail;

      if (status === 'success') {
        logger.log({
          level: 'info',
          message: `stage.${stage}.success`,
          runId,
          stage,
          detail: detailWithDuration,
        });
        if (durationMs !== undefined) {
          metrics.timing('splat.pipeline.stage.duration_ms', durationMs, { stage, status });
        }
        metrics.increment('splat.pipeline.stage.success', 1, { stage });
      } else {
        logger.log({
          level: 'error',
          message: `stage.${stage}.failed`,
          runId,
          stage,
          detail: detailWithDuration,
        });
      }
    };

    try {
      const job = parseJobRequest(request);
      sceneId = job.sceneId;
      logger.log({
        level: 'info',
        message: 'pipeline.job.start',
        runId,
        stage: 'pipeline',
        detail: { jobId: job.jobId, sceneId, videoUrl: job.videoUrl, params: job.params },
      });

      workspace = await workspaces.allocate(sceneId);

      state = 'downloading';
      report('downloading_video', 0);
      emitStage('download', 'start', { url: job.videoUrl });
      const videoPath = join(workspace, 'input.mp4');
      const fetched = await fetchArtifact(job.videoUrl, videoPath, {
        timeoutMs: config.downloadTimeoutMs,
        fetchImplementation: options.fetchImplementation,
        logger,
        runId,
        stage: 'downloading',
        signal,
      });
      emitStage('download', 'success', { bytes: fetched.bytesWritten });
      report('video_downloaded', 10);

      state = 'preparing';
      report('preparing_dataset', 10);
      emitStage('prepare', 'start', { fps: job.params.fps });
      const prepared = await prepareScene({
        videoPath,
        sceneDir: workspace,
        fps: job.params.fps,
        tools: config.tools,
        runner,
        logger,
        runId,
        signal,
        strict: config.strictReconstruction,
      });
      emitStage('prepare', 'success', {
        frameCount: prepared.frameCount,
        reconstructionDir: prepared.reconstructionDir,
      });
      report('dataset_ready', 30);

      state = 'training';
      report('training', 30);
      emitStage('train', 'start', { iterations: job.params.iterations });
      const outputDir = join(workspace, 'output');
      await mkdir(outputDir, { recursive: true });
      await runner(config.trainer.command, trainerArgs(config.trainer, workspace, outputDir, job.params.iterations), {
        cwd: config.trainer.cwd,
        label: 'trainer',
        logger,
        runId,
        stage: 'training',
        signal,
      });
      emitStage('train', 'success');
      report('training_complete', 90);

      state = 'uploading';
      report('uploading', 90);
      emitStage('upload', 'start', { sink: sink?.kind ?? 'none' });
      const published = await publishResult(outputDir, sceneId, { sink, logger, runId, signal });
      emitStage('upload', 'success', { url: published.url, archiveBytes: published.archiveBytes });

      state = 'done';
      report('done', 100);
      logger.log({
        level: 'info',
        message: 'pipeline.job.success',
        runId,
        stage: 'pipeline',
        detail: { sceneId, url: published.url, durationMs: Math.max(Date.now() - pipelineStartedAt, 0) },
      });
      return { status: 'success', scene_id: sceneId, progress: 100, plt_url: published.url };
    } catch (error: unknown) {
      const message = errorMessage(error);
      const failedFrom = state;
      state = 'failed';
      // a stage still holding a start time is the one that failed
      const failedStage = [...stageStartTimes.keys()].pop();
      if (failedStage) emitStage(failedStage, 'failed', { error: message });
      logger.log({
        level: 'error',
        message: 'pipeline.job.failed',
        runId,
        stage: 'pipeline',
        detail: {
          sceneId,
          state,
          failedFrom,
          progress,
          error: message,
          errorType: error instanceof Error ? error.name : typeof error,
          durationMs: Math.max(Date.now() - pipelineStartedAt, 0),
        },
      });
      metrics.increment('splat.pipeline.job.failed', 1, failedStage ? { stage: failedStage } : {});
      return sceneId === undefined
        ? { status: 'fail', error: message, progress }
        : { status: 'fail', scene_id: sceneId, error: message, progress };
    } finally {
      if (workspace !== undefined) {
        await releaseQuietly(workspaces, workspace, logger, runId);
      }
    }
  }

  return { config, sink, logger, metrics, runJob };
}
