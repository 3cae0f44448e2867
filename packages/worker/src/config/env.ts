// packages/worker/src/config/env.ts
// Environment-based configuration for the queue worker.
// - Defaults match a docker-compose setup with a `redis` service.
// - Pipeline settings (tools, sinks) are read by the orchestrator itself.
import { readInt, readString } from '@splat-pipeline/shared-infrastructure';

export type NodeEnv = 'development' | 'test' | 'production';

export interface WorkerConfig {
  nodeEnv: NodeEnv;
  logLevel: string;
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  queue: {
    name: string;
  };
  worker: {
    concurrency: number;
    /** 0 disables the per-job timeout. */
    jobTimeoutMs: number;
  };
}

function readNodeEnv(): NodeEnv {
  const value = readString('NODE_ENV');
  return value === 'test' || value === 'production' ? value : 'development';
}

// loadConfig.declaration()
export function loadConfig(): WorkerConfig {
  const concurrency = readInt('WORKER_CONCURRENCY', 1);
  if (concurrency < 1) {
    throw new Error(`WORKER_CONCURRENCY must be at least 1 (got ${concurrency})`);
  }
  const jobTimeoutMs = readInt('SPLAT_JOB_TIMEOUT_MS', 0);
  if (jobTimeoutMs < 0) {
    throw new Error(`SPLAT_JOB_TIMEOUT_MS must not be negative (got ${jobTimeoutMs})`);
  }

  return {
    nodeEnv: readNodeEnv(),
    logLevel: readString('LOG_LEVEL', 'info'),
    redis: {
      host: readString('REDIS_HOST', 'redis'),
      port: readInt('REDIS_PORT', 6379),
      password: readString('REDIS_PASSWORD'),
    },
    queue: {
      name: readString('SPLAT_QUEUE_NAME', 'splat-jobs'),
    },
    worker: {
      concurrency,
      jobTimeoutMs,
    },
  };
}
