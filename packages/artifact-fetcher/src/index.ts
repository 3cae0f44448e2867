import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { ReadableStream as NodeReadableStream } from 'node:stream/web';

import {
  errorMessage,
  FetchFailure,
  noopLogger,
  type PipelineLogger,
} from '@splat-pipeline/contracts';

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 120_000;

export interface FetchArtifactOptions {
  timeoutMs?: number;
  fetchImplementation?: typeof fetch;
  logger?: PipelineLogger;
  runId?: string;
  stage?: string;
  signal?: AbortSignal;
}

export interface FetchArtifactResult {
  bytesWritten: number;
  contentLength?: number;
}

function parseContentLength(header: string | null): number | undefined {
  if (!header) return undefined;
  const value = Number(header);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
}

/**
 * Download `url` to `destination`, overwriting any existing file. The status is
 * checked before the destination is touched, so a rejected request leaves no file.
 */
export async function fetchArtifact(
  url: string,
  destination: string,
  options: FetchArtifactOptions = {},
): Promise<FetchArtifactResult> {
  const fetchImpl = options.fetchImplementation ?? globalThis.fetch;
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  const { runId, stage, signal } = options;

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new Error(`timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );
  timeout.unref?.();
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) onAbort();
  signal?.addEventListener('abort', onAbort, { once: true });

  logger.log({ level: 'info', message: 'fetch.start', runId, stage, detail: { url, destination } });

  try {
    let response: Response;
    try {
      response = await fetchImpl(url, { method: 'GET', signal: controller.signal });
    } catch (error: unknown) {
      throw new FetchFailure(url, `download error: ${describeAbort(controller.signal, error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new FetchFailure(
        url,
        `download error: ${response.status} ${response.statusText}`.trimEnd(),
        response.status,
      );
    }
    if (!response.body) {
      throw new FetchFailure(url, 'download error: response has no body', response.status);
    }

    const contentLength = parseContentLength(response.headers.get('content-length'));
    let bytesWritten = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytesWritten += chunk.length;
        callback(null, chunk);
      },
    });

    try {
      await mkdir(dirname(destination), { recursive: true });
      await pipeline(
        Readable.fromWeb(response.body as unknown as NodeReadableStream),
        counter,
        createWriteStream(destination),
        { signal: controller.signal },
      );
    } catch (error: unknown) {
      throw new FetchFailure(url, `download error: ${describeAbort(controller.signal, error)}`, response.status, {
        cause: error,
      });
    }

    logger.log({
      level: 'info',
      message: 'fetch.complete',
      runId,
      stage,
      detail: { url, destination, bytesWritten, contentLength },
    });
    return { bytesWritten, contentLength };
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', onAbort);
  }
}

function describeAbort(signal: AbortSignal, error: unknown): string {
  if (signal.aborted && signal.reason !== undefined) {
    return errorMessage(signal.reason);
  }
  return errorMessage(error);
}
