import { dirname, join } from 'node:path';

import { noopLogger, PublishFailure, type PipelineLogger } from '@splat-pipeline/contracts';

import { createArchive } from './archive.js';
import type { ResultSink, SinkKind } from './types.js';

export { createArchive } from './archive.js';
export { HttpSink, locatorFromBody, type HttpSinkOptions } from './http.js';
export { ObjectStoreSink, objectLocator, type ObjectStoreSinkOptions, type S3ModuleLoader, type S3Modules } from './s3.js';
export { createSink, type CreateSinkOptions } from './sinks.js';
export type { Delivery, DeliverOptions, ResultSink, SinkKind } from './types.js';

export interface PublishResultOptions {
  sink?: ResultSink;
  logger?: PipelineLogger;
  runId?: string;
  signal?: AbortSignal;
}

export interface PublishedResult {
  url: string;
  archivePath: string;
  archiveBytes: number;
  sink: SinkKind;
  key?: string;
}

/**
 * Archive `resultDir` as `<sceneId>.zip` next to it and hand the archive to the sink.
 */
export async function publishResult(
  resultDir: string,
  sceneId: string,
  options: PublishResultOptions = {},
): Promise<PublishedResult> {
  const { sink, runId, signal } = options;
  const logger = options.logger ?? noopLogger;
  if (!sink) {
    throw new PublishFailure(
      'No result sink configured: set S3_BUCKET_NAME with credentials or an endpoint, or OUTPUT_BUCKET_URL',
    );
  }

  const archivePath = join(dirname(resultDir), `${sceneId}.zip`);
  const archiveBytes = await createArchive(resultDir, archivePath);
  logger.log({
    level: 'info',
    message: 'archive.created',
    runId,
    stage: 'uploading',
    detail: { archivePath, archiveBytes },
  });

  const delivery = await sink.deliver(archivePath, { signal, runId });
  logger.log({
    level: 'info',
    message: 'archive.delivered',
    runId,
    stage: 'uploading',
    detail: { sink: sink.kind, url: delivery.url },
  });

  return { url: delivery.url, archivePath, archiveBytes, sink: sink.kind, key: delivery.key };
}
