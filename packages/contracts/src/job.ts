// packages/contracts/src/job.ts
//
// Shared shapes between the invoking runtime and the orchestrator.

export type JobState =
  | 'created'
  | 'downloading'
  | 'preparing'
  | 'training'
  | 'uploading'
  | 'done'
  | 'failed';

/**
 * Fixed stage vocabulary reported to the caller, in emission order.
 */
export const PROGRESS_STAGES = [
  'downloading_video',
  'video_downloaded',
  'preparing_dataset',
  'dataset_ready',
  'training',
  'training_complete',
  'uploading',
  'done',
] as const;

export type ProgressStage = (typeof PROGRESS_STAGES)[number];

export interface ProgressReport {
  progress: number;
  stage: ProgressStage;
}

export interface JobParams {
  iterations: number;
  fps: number;
}

export const DEFAULT_JOB_PARAMS: JobParams = {
  iterations: 30_000,
  fps: 2,
};

/** Validated work request handed to the orchestrator. */
export interface SceneJob {
  jobId: string;
  videoUrl: string;
  sceneId: string;
  params: JobParams;
}

export interface JobSuccess {
  status: 'success';
  scene_id: string;
  progress: 100;
  plt_url: string;
}

export interface JobFailure {
  status: 'fail';
  scene_id?: string;
  error: string;
  progress: number;
}

export type JobResult = JobSuccess | JobFailure;

export interface JobCallbacks {
  onProgress?: (report: ProgressReport) => void;
}
