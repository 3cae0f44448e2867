import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { PublishFailure } from '@splat-pipeline/contracts';

import { createArchive, createSink, HttpSink, ObjectStoreSink, publishResult } from '../src/index.js';
import type { ResultSink } from '../src/index.js';

describe('createArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'publish-'));
    await mkdir(join(dir, 'output', 'point_cloud'), { recursive: true });
    await writeFile(join(dir, 'output', 'cfg_args'), 'iterations=100');
    await writeFile(join(dir, 'output', 'point_cloud', 'point_cloud.ply'), 'ply-data');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a zip archive and reports its size', async () => {
    const archivePath = join(dir, 'scene.zip');

    const bytes = await createArchive(join(dir, 'output'), archivePath);

    const content = await readFile(archivePath);
    expect(bytes).toBe(content.length);
    expect(content.subarray(0, 2).toString('latin1')).toBe('PK');
  });

  it('replaces a previous archive of the same name', async () => {
    const archivePath = join(dir, 'scene.zip');
    await writeFile(archivePath, 'x'.repeat(100_000));

    const bytes = await createArchive(join(dir, 'output'), archivePath);

    expect((await readFile(archivePath)).length).toBe(bytes);
    expect(bytes).toBeLessThan(100_000);
  });
});

describe('publishResult', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'publish-'));
    await mkdir(join(dir, 'output'), { recursive: true });
    await writeFile(join(dir, 'output', 'model.ply'), 'ply-data');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('archives next to the result directory and delivers through the sink', async () => {
    const sink: ResultSink = {
      kind: 'http',
      deliver: vi.fn(async () => ({ url: 'https://uploads.test/abc123.zip' })),
    };

    const result = await publishResult(join(dir, 'output'), 'abc123', { sink });

    expect(result.url).toBe('https://uploads.test/abc123.zip');
    expect(result.archivePath).toBe(join(dir, 'abc123.zip'));
    expect(result.sink).toBe('http');
    expect(existsSync(result.archivePath)).toBe(true);
    expect(sink.deliver).toHaveBeenCalledWith(join(dir, 'abc123.zip'), {
      signal: undefined,
      runId: undefined,
    });
  });

  /** Intent: re-publishing a scene id leaves exactly one archive */
  it('keeps one archive per scene id', async () => {
    const sink: ResultSink = {
      kind: 'http',
      deliver: vi.fn(async () => ({ url: 'https://uploads.test/abc123.zip' })),
    };

    await publishResult(join(dir, 'output'), 'abc123', { sink });
    await publishResult(join(dir, 'output'), 'abc123', { sink });

    const archives = (await readdir(dir)).filter((name) => name.endsWith('.zip'));
    expect(archives).toEqual(['abc123.zip']);
  });

  it('fails without a sink', async () => {
    const error = await publishResult(join(dir, 'output'), 'abc123').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PublishFailure);
    expect(existsSync(join(dir, 'abc123.zip'))).toBe(false);
  });

  it('propagates sink rejections', async () => {
    const sink: ResultSink = {
      kind: 's3',
      deliver: async () => {
        throw new PublishFailure('Upload to s3://scenes/results/abc123.zip failed: denied', {
          sink: 's3',
        });
      },
    };

    await expect(publishResult(join(dir, 'output'), 'abc123', { sink })).rejects.toThrow(
      'Upload to s3://scenes/results/abc123.zip failed: denied',
    );
  });
});

describe('createSink', () => {
  const http = { baseUrl: 'https://uploads.test', timeoutMs: 1_000 };
  const s3 = {
    bucket: 'scenes',
    region: 'us-east-1',
    endpoint: 'http://minio.local:9000',
    keyPrefix: 'results',
    forcePathStyle: true,
  };

  it('returns undefined when nothing is configured', () => {
    expect(createSink({ provider: 'none' })).toBeUndefined();
  });

  it('builds an HTTP sink', () => {
    expect(createSink({ provider: 'http', http })).toBeInstanceOf(HttpSink);
  });

  it('builds an object store sink', () => {
    const sink = createSink({ provider: 's3', s3, http });
    expect(sink).toBeInstanceOf(ObjectStoreSink);
    expect(sink?.kind).toBe('s3');
  });
});
