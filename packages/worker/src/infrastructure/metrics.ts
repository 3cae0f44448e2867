// packages/worker/src/infrastructure/metrics.ts
// Metrics facade handed to the pipeline. Without a metrics backend the
// samples go to the debug log; swap `metrics` to export elsewhere.
import type { PipelineMetrics } from '@splat-pipeline/contracts';

import { logger, type Logger } from './logger.js';

export function createLogMetrics(target: Logger): PipelineMetrics {
  return {
    increment(metric, value = 1, tags) {
      target.debug('metric', { metric, kind: 'counter', value, ...tags });
    },
    timing(metric, durationMs, tags) {
      target.debug('metric', { metric, kind: 'timing', durationMs, ...tags });
    },
  };
}

export const metrics: PipelineMetrics = createLogMetrics({
  ...logger,
  debug: (msg, fields) => logger.debug(msg, { component: 'metrics', ...fields }),
});
