export { loadConfig, type NodeEnv, type WorkerConfig } from './config/env.js';
export { processSceneJob, type ProcessableJob, type ProcessSceneJobOptions } from './application/process-scene-job.js';
export { createSceneWorker, type SceneQueueJob } from './infrastructure/queue-bullmq.js';
export { startWorker } from './transport/worker-runner.js';
