import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { loadEnvFiles } from '@splat-pipeline/shared-infrastructure';

const pinoMock = vi.hoisted(() => {
  const instance = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  instance.child.mockReturnValue(instance);
  return { factory: vi.fn(() => instance), instance };
});

vi.mock('pino', () => ({ default: pinoMock.factory }));

describe('worker logger', () => {
  const originalEnv = { ...process.env };
  let dir: string;

  beforeEach(async () => {
    vi.resetModules();
    pinoMock.factory.mockClear();
    pinoMock.instance.info.mockClear();
    delete process.env.LOG_LEVEL;
    delete process.env.NODE_ENV;
    dir = await mkdtemp(join(tmpdir(), 'worker-logger-'));
  });

  afterEach(async () => {
    process.env = { ...originalEnv };
    await rm(dir, { recursive: true, force: true });
  });

  it('builds the root logger on first use, after env files are loaded', async () => {
    const { logger } = await import('../src/infrastructure/logger.js');
    expect(pinoMock.factory).not.toHaveBeenCalled();

    await writeFile(join(dir, '.env'), 'LOG_LEVEL=warn\nNODE_ENV=development\n');
    loadEnvFiles({ cwd: dir });
    logger.info('Worker started', { component: 'worker' });

    expect(pinoMock.factory).toHaveBeenCalledTimes(1);
    expect(pinoMock.factory).toHaveBeenCalledWith({
      level: 'warn',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' },
      },
    });
    expect(pinoMock.instance.info).toHaveBeenCalledWith({ component: 'worker' }, 'Worker started');
  });

  it('creates the root logger once', async () => {
    const { logger, createJobLogger } = await import('../src/infrastructure/logger.js');

    logger.info('first');
    createJobLogger('queue-7', 'queue-7').info('second');

    expect(pinoMock.factory).toHaveBeenCalledTimes(1);
    expect(pinoMock.factory).toHaveBeenCalledWith({ level: 'info', transport: undefined });
    expect(pinoMock.instance.child).toHaveBeenCalledWith({ jobId: 'queue-7', runId: 'queue-7' });
  });
});

describe('worker metrics', () => {
  beforeEach(() => {
    vi.resetModules();
    pinoMock.factory.mockClear();
    pinoMock.instance.debug.mockClear();
  });

  it('writes samples to the debug log without building the logger at import', async () => {
    const { metrics } = await import('../src/infrastructure/metrics.js');
    expect(pinoMock.factory).not.toHaveBeenCalled();

    metrics.increment('splat.pipeline.job.failed', 1, { stage: 'prepare' });

    expect(pinoMock.instance.debug).toHaveBeenCalledWith(
      { component: 'metrics', metric: 'splat.pipeline.job.failed', kind: 'counter', value: 1, stage: 'prepare' },
      'metric',
    );
  });
});
