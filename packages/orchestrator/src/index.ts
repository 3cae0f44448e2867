export {
  createPipeline,
  type CreatePipelineOptions,
  type PipelineStage,
  type RunJobOptions,
  type ScenePipeline,
} from './pipeline.js';
export {
  DEFAULT_WORKDIR,
  loadPipelineConfig,
  trainerArgs,
  type PipelineConfig,
  type TrainerConfig,
} from './config.js';
export { JobRequestSchema, parseJobRequest, SCENE_ID_PATTERN, type JobRequest } from './job-request.js';
export { createWorkspaceManager, releaseQuietly, type WorkspaceManager } from './workspace.js';
export { createLogger, type LogEvent, type Logger } from './logger.js';

export type {
  JobCallbacks,
  JobResult,
  PipelineLogEvent,
  PipelineLogger,
  PipelineMetrics,
  ProgressReport,
  ProgressStage,
  SceneJob,
} from '@splat-pipeline/contracts';
export { loadEnvFiles, type LoadEnvOptions, type LoadEnvSummary } from '@splat-pipeline/shared-infrastructure';
