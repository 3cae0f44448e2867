import type { PipelineLogger } from '@splat-pipeline/contracts';
import type { SinkConfig } from '@splat-pipeline/shared-infrastructure';

import { HttpSink } from './http.js';
import { ObjectStoreSink, type S3ModuleLoader } from './s3.js';
import type { ResultSink } from './types.js';

export interface CreateSinkOptions {
  fetchImplementation?: typeof fetch;
  loadS3Module?: S3ModuleLoader;
  logger?: PipelineLogger;
}

/** Build the single active sink, or undefined when none is configured. */
export function createSink(config: SinkConfig, options: CreateSinkOptions = {}): ResultSink | undefined {
  const http = config.http
    ? new HttpSink(config.http, {
        fetchImplementation: options.fetchImplementation,
        logger: options.logger,
      })
    : undefined;

  switch (config.provider) {
    case 's3':
      if (!config.s3) return undefined;
      return new ObjectStoreSink(config.s3, {
        fallback: http,
        loadModule: options.loadS3Module,
        logger: options.logger,
      });
    case 'http':
      return http;
    case 'none':
      return undefined;
  }
}
