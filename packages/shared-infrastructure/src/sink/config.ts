/**
 * Result sink configuration.
 *
 * Exactly one sink strategy is active per process. It is chosen from the
 * environment at startup: an explicit SPLAT_SINK_PROVIDER wins, otherwise a
 * complete object-store configuration, otherwise an HTTP base URL.
 */
import { ConfigurationError } from '@splat-pipeline/contracts';

import { readFirst, readInt, readString } from '../env/loaders.js';

export type SinkProvider = 's3' | 'http' | 'none';

export interface ObjectStoreSinkConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  keyPrefix: string;
  forcePathStyle: boolean;
}

export interface HttpSinkConfig {
  baseUrl: string;
  token?: string;
  /** Fixed route on a dedicated upload server; switches to multipart POST. */
  uploadRoute?: string;
  publicPath?: string;
  timeoutMs: number;
}

export interface SinkConfig {
  provider: SinkProvider;
  s3?: ObjectStoreSinkConfig;
  /** Active sink when provider is http; runtime fallback when provider is s3. */
  http?: HttpSinkConfig;
}

const DEFAULT_KEY_PREFIX = 'results';
const DEFAULT_UPLOAD_TIMEOUT_MS = 600_000;

export function resolveSinkConfig(): SinkConfig {
  const bucket = readFirst('S3_BUCKET_NAME', 'S3_BUCKET');
  const endpoint = readFirst('S3_ENDPOINT_URL', 'S3_ENDPOINT')?.replace(/\/+$/, '');
  const accessKeyId = readFirst('AWS_ACCESS_KEY_ID', 'S3_ACCESS_KEY_ID');
  const secretAccessKey = readFirst('AWS_SECRET_ACCESS_KEY', 'S3_SECRET_ACCESS_KEY');
  const hasCredentials = Boolean(accessKeyId && secretAccessKey);

  const s3: ObjectStoreSinkConfig | undefined =
    bucket && (endpoint || hasCredentials)
      ? {
          bucket,
          region: readFirst('AWS_REGION', 'S3_REGION') ?? 'us-east-1',
          endpoint,
          accessKeyId: hasCredentials ? accessKeyId : undefined,
          secretAccessKey: hasCredentials ? secretAccessKey : undefined,
          keyPrefix: normalizeSegment(readString('S3_KEY_PREFIX', DEFAULT_KEY_PREFIX)),
          forcePathStyle: Boolean(endpoint),
        }
      : undefined;

  const baseUrl = readString('OUTPUT_BUCKET_URL')?.replace(/\/+$/, '');
  const uploadRoute = readString('OUTPUT_UPLOAD_ROUTE');
  const publicPath = readString('OUTPUT_PUBLIC_PATH');
  const http: HttpSinkConfig | undefined = baseUrl
    ? {
        baseUrl,
        token: readString('OUTPUT_BUCKET_KEY'),
        uploadRoute: uploadRoute ? `/${normalizeSegment(uploadRoute)}` : undefined,
        publicPath: publicPath ? normalizeSegment(publicPath) : undefined,
        timeoutMs: readInt('SPLAT_UPLOAD_TIMEOUT_MS', DEFAULT_UPLOAD_TIMEOUT_MS),
      }
    : undefined;

  const requested = readString('SPLAT_SINK_PROVIDER')?.toLowerCase();
  if (requested !== undefined) {
    if (requested !== 's3' && requested !== 'http') {
      throw new ConfigurationError(
        `Invalid SPLAT_SINK_PROVIDER "${requested}": expected "s3" or "http"`,
      );
    }
    if (requested === 's3' && !s3) {
      throw new ConfigurationError(
        'SPLAT_SINK_PROVIDER=s3 requires S3_BUCKET_NAME and either S3_ENDPOINT_URL or AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY',
      );
    }
    if (requested === 'http' && !http) {
      throw new ConfigurationError('SPLAT_SINK_PROVIDER=http requires OUTPUT_BUCKET_URL');
    }
    return { provider: requested, s3: requested === 's3' ? s3 : undefined, http };
  }

  if (s3) return { provider: 's3', s3, http };
  if (http) return { provider: 'http', http };
  return { provider: 'none' };
}

function normalizeSegment(value: string): string {
  return value.replace(/^[\/\\]+/, '').replace(/[\/\\]+$/, '');
}
