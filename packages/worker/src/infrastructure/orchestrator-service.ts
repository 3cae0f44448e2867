// packages/worker/src/infrastructure/orchestrator-service.ts
// Keeps pipeline wiring in one place: one pipeline (and one sink) per process,
// created lazily on first use.
import { createPipeline, type ScenePipeline } from '@splat-pipeline/orchestrator';

import { logger as rootLogger, toPipelineLogger } from './logger.js';
import { metrics } from './metrics.js';

let cachedPipeline: ScenePipeline | null = null;

export function resetPipelineCache() {
  cachedPipeline = null;
}

export function getPipeline(): ScenePipeline {
  if (cachedPipeline) {
    return cachedPipeline;
  }

  const pipeline = createPipeline({
    logger: toPipelineLogger(rootLogger.child({ component: 'pipeline' })),
    metrics,
  });

  rootLogger.info('Pipeline configured', {
    component: 'orchestrator-service',
    workdir: pipeline.config.workdir,
    sink: pipeline.sink?.kind ?? 'none',
  });
  if (!pipeline.sink) {
    rootLogger.warn('No result sink configured; every job will fail at the upload stage', {
      component: 'orchestrator-service',
    });
  }

  cachedPipeline = pipeline;
  return pipeline;
}
