import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';

import {
  errorMessage,
  noopLogger,
  PublishFailure,
  type PipelineLogger,
} from '@splat-pipeline/contracts';
import type { HttpSinkConfig } from '@splat-pipeline/shared-infrastructure';

import type { Delivery, DeliverOptions, ResultSink } from './types.js';

export interface HttpSinkOptions {
  fetchImplementation?: typeof fetch;
  logger?: PipelineLogger;
}

const LOCATOR_KEYS = ['url', 'public_url', 'publicUrl', 'plt_url', 'location', 'Location'] as const;

/** First string locator in a JSON response body, if any. */
export function locatorFromBody(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null) return undefined;
  for (const key of LOCATOR_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === 'string' && value) return value;
  }
  return undefined;
}

export class HttpSink implements ResultSink {
  readonly kind = 'http';
  private readonly config: HttpSinkConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: PipelineLogger;

  constructor(config: HttpSinkConfig, options: HttpSinkOptions = {}) {
    this.config = config;
    this.fetchImpl = options.fetchImplementation ?? globalThis.fetch;
    this.logger = options.logger ?? noopLogger;
  }

  async deliver(archivePath: string, options: DeliverOptions = {}): Promise<Delivery> {
    const name = basename(archivePath);
    const blob = await openAsBlob(archivePath, { type: 'application/zip' });

    let url: string;
    let init: RequestInit;
    if (this.config.uploadRoute) {
      const form = new FormData();
      form.append('file', blob, name);
      url = `${this.config.baseUrl}${this.config.uploadRoute}`;
      init = { method: 'POST', body: form, headers: this.buildHeaders() };
    } else {
      url = `${this.config.baseUrl}/${encodeURIComponent(name)}`;
      init = {
        method: 'PUT',
        body: blob,
        headers: this.buildHeaders({ 'content-type': 'application/zip' }),
      };
    }

    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(new Error(`timed out after ${this.config.timeoutMs}ms`)),
      this.config.timeoutMs,
    );
    timeout.unref?.();
    const onAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) onAbort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      } catch (error: unknown) {
        const reason = controller.signal.aborted ? controller.signal.reason : error;
        throw new PublishFailure(
          `HTTP upload to ${url} failed: ${errorMessage(reason)}`,
          { sink: 'http' },
          { cause: error },
        );
      }

      const body = await response.text();
      if (!response.ok) {
        const excerpt = body.trim().slice(0, 500);
        throw new PublishFailure(
          `HTTP upload to ${url} failed: ${response.status} ${response.statusText}`.trimEnd() +
            (excerpt ? ` - ${excerpt}` : ''),
          { sink: 'http', status: response.status },
        );
      }

      const located = locatorFromBody(body) ?? this.defaultLocator(name);
      this.logger.log({
        level: 'debug',
        message: 'sink.http.response',
        runId: options.runId,
        stage: 'uploading',
        detail: { url, status: response.status },
      });
      return { url: located };
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private defaultLocator(name: string): string {
    const segments = [this.config.baseUrl];
    if (this.config.publicPath) segments.push(this.config.publicPath);
    segments.push(encodeURIComponent(name));
    return segments.join('/');
  }

  private buildHeaders(overrides?: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = overrides ? { ...overrides } : {};
    if (this.config.token) {
      headers.authorization = `Bearer ${this.config.token}`;
    }
    return headers;
  }
}
