import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';

import {
  errorMessage,
  noopLogger,
  PublishFailure,
  type PipelineLogger,
} from '@splat-pipeline/contracts';
import type { ObjectStoreSinkConfig } from '@splat-pipeline/shared-infrastructure';

import type { Delivery, DeliverOptions, ResultSink } from './types.js';

export interface S3Modules {
  s3: typeof import('@aws-sdk/client-s3');
  storage: typeof import('@aws-sdk/lib-storage');
}
type S3ClientInstance = InstanceType<S3Modules['s3']['S3Client']>;
type LoadedClient = { storage: S3Modules['storage']; client: S3ClientInstance };

export type S3ModuleLoader = () => Promise<S3Modules>;

const loadS3Module: S3ModuleLoader = async () => {
  const [s3, storage] = await Promise.all([import('@aws-sdk/client-s3'), import('@aws-sdk/lib-storage')]);
  return { s3, storage };
};

export interface ObjectStoreSinkOptions {
  /** Used when the storage client cannot be loaded. */
  fallback?: ResultSink;
  loadModule?: S3ModuleLoader;
  logger?: PipelineLogger;
}

function isAclNotSupported(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code = 'Code' in error ? error.Code : 'name' in error ? error.name : undefined;
  const message = 'message' in error ? String(error.message) : '';
  return code === 'AccessControlListNotSupported' || /AccessControlListNotSupported/i.test(message);
}

export function objectLocator(config: ObjectStoreSinkConfig, key: string): string {
  return config.endpoint
    ? `${config.endpoint}/${config.bucket}/${key}`
    : `https://${config.bucket}.s3.amazonaws.com/${key}`;
}

export class ObjectStoreSink implements ResultSink {
  readonly kind = 's3';
  private readonly config: ObjectStoreSinkConfig;
  private readonly fallback?: ResultSink;
  private readonly loadModule: S3ModuleLoader;
  private readonly logger: PipelineLogger;
  private client?: Promise<LoadedClient>;

  constructor(config: ObjectStoreSinkConfig, options: ObjectStoreSinkOptions = {}) {
    this.config = config;
    this.fallback = options.fallback;
    this.loadModule = options.loadModule ?? loadS3Module;
    this.logger = options.logger ?? noopLogger;
  }

  async deliver(archivePath: string, options: DeliverOptions = {}): Promise<Delivery> {
    let loaded: LoadedClient;
    try {
      loaded = await this.getClient();
    } catch (error: unknown) {
      this.client = undefined;
      if (this.fallback) {
        this.logger.log({
          level: 'warn',
          message: 'sink.s3.unavailable',
          runId: options.runId,
          stage: 'uploading',
          detail: { error: errorMessage(error), fallback: this.fallback.kind },
        });
        return this.fallback.deliver(archivePath, options);
      }
      throw new PublishFailure(
        `Object storage client unavailable: ${errorMessage(error)}`,
        { sink: 's3' },
        { cause: error },
      );
    }

    const name = basename(archivePath);
    const key = this.config.keyPrefix ? `${this.config.keyPrefix}/${name}` : name;

    try {
      const { size } = await stat(archivePath);
      try {
        await this.upload(loaded, archivePath, key, size, true, options.signal);
      } catch (error: unknown) {
        if (!isAclNotSupported(error)) throw error;
        this.logger.log({
          level: 'warn',
          message: 'sink.s3.acl_unsupported',
          runId: options.runId,
          stage: 'uploading',
          detail: { bucket: this.config.bucket, key },
        });
        await this.upload(loaded, archivePath, key, size, false, options.signal);
      }
    } catch (error: unknown) {
      throw new PublishFailure(
        `Upload to s3://${this.config.bucket}/${key} failed: ${errorMessage(error)}`,
        { sink: 's3' },
        { cause: error },
      );
    }

    return { url: objectLocator(this.config, key), key };
  }

  /** Managed multipart upload streamed from disk; each attempt opens its own stream. */
  private async upload(
    { storage, client }: LoadedClient,
    archivePath: string,
    key: string,
    size: number,
    publicRead: boolean,
    signal?: AbortSignal,
  ): Promise<void> {
    signal?.throwIfAborted();
    const body = createReadStream(archivePath);
    const upload = new storage.Upload({
      client,
      params: {
        Bucket: this.config.bucket,
        Key: key,
        Body: body,
        ContentType: 'application/zip',
        ContentLength: size,
        ...(publicRead ? { ACL: 'public-read' as const } : {}),
      },
    });
    const onAbort = () => {
      upload.abort().catch((error: unknown) => {
        this.logger.log({
          level: 'warn',
          message: 'sink.s3.abort_failed',
          stage: 'uploading',
          detail: { key, error: errorMessage(error) },
        });
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      await upload.done();
    } finally {
      signal?.removeEventListener('abort', onAbort);
      body.destroy();
    }
  }

  private getClient(): Promise<LoadedClient> {
    this.client ??= this.loadModule().then(({ s3, storage }) => {
      const { region, endpoint, forcePathStyle, accessKeyId, secretAccessKey } = this.config;
      const client = new s3.S3Client({
        region,
        endpoint,
        forcePathStyle,
        credentials:
          accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
      });
      return { storage, client };
    });
    return this.client;
  }
}
