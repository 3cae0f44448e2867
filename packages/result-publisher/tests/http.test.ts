import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { PublishFailure } from '@splat-pipeline/contracts';
import type { HttpSinkConfig } from '@splat-pipeline/shared-infrastructure';

import { HttpSink, locatorFromBody } from '../src/http.js';

const config: HttpSinkConfig = {
  baseUrl: 'https://uploads.test',
  token: 'test-token',
  timeoutMs: 5_000,
};

function recordingFetch(response: () => Response) {
  return vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => response());
}

describe('HttpSink', () => {
  let dir: string;
  let archive: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sink-http-'));
    archive = join(dir, 'abc123.zip');
    await writeFile(archive, 'zip-bytes');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('PUTs the archive to <base>/<name> with a bearer token', async () => {
    const fetchImpl = recordingFetch(() => new Response('', { status: 200 }));
    const sink = new HttpSink(config, { fetchImplementation: fetchImpl });

    const delivery = await sink.deliver(archive);

    expect(delivery).toEqual({ url: 'https://uploads.test/abc123.zip' });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://uploads.test/abc123.zip');
    expect(init?.method).toBe('PUT');
    expect(init?.headers).toEqual({
      'content-type': 'application/zip',
      authorization: 'Bearer test-token',
    });
    expect(init?.body).toBeInstanceOf(Blob);
  });

  it('posts multipart form data to a configured upload route', async () => {
    const fetchImpl = recordingFetch(
      () => new Response(JSON.stringify({ public_url: 'https://cdn.test/abc123.zip' })),
    );
    const sink = new HttpSink({ ...config, uploadRoute: '/api/upload' }, { fetchImplementation: fetchImpl });

    const delivery = await sink.deliver(archive);

    expect(delivery.url).toBe('https://cdn.test/abc123.zip');
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://uploads.test/api/upload');
    expect(init?.method).toBe('POST');
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      const file = body.get('file');
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) expect(await file.text()).toBe('zip-bytes');
    }
  });

  it('builds the locator from the public path when the response names none', async () => {
    const fetchImpl = recordingFetch(() => new Response('ok'));
    const sink = new HttpSink(
      { ...config, uploadRoute: '/api/upload', publicPath: 'files' },
      { fetchImplementation: fetchImpl },
    );

    const delivery = await sink.deliver(archive);

    expect(delivery.url).toBe('https://uploads.test/files/abc123.zip');
  });

  it('rejects a non-success response with PublishFailure', async () => {
    const fetchImpl = recordingFetch(
      () => new Response('quota exceeded', { status: 507, statusText: 'Insufficient Storage' }),
    );
    const sink = new HttpSink(config, { fetchImplementation: fetchImpl });

    const error = await sink.deliver(archive).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PublishFailure);
    expect((error as PublishFailure).message).toBe(
      'HTTP upload to https://uploads.test/abc123.zip failed: 507 Insufficient Storage - quota exceeded',
    );
    expect((error as PublishFailure).status).toBe(507);
  });

  it('wraps transport errors', async () => {
    const sink = new HttpSink(config, {
      fetchImplementation: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(sink.deliver(archive)).rejects.toThrow(
      'HTTP upload to https://uploads.test/abc123.zip failed: fetch failed',
    );
  });
});

describe('locatorFromBody', () => {
  it('takes the first known key in priority order', () => {
    expect(locatorFromBody(JSON.stringify({ location: 'https://b', url: 'https://a' }))).toBe('https://a');
    expect(locatorFromBody(JSON.stringify({ plt_url: 'https://c' }))).toBe('https://c');
    expect(locatorFromBody(JSON.stringify({ Location: 'https://d' }))).toBe('https://d');
  });

  it('ignores non-JSON and non-string values', () => {
    expect(locatorFromBody('uploaded')).toBeUndefined();
    expect(locatorFromBody(JSON.stringify({ url: 42 }))).toBeUndefined();
    expect(locatorFromBody('null')).toBeUndefined();
  });
});
