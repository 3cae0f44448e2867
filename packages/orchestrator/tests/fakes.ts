import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { vi } from 'vitest';

import type { CommandRunner, RunCommandOptions } from '@splat-pipeline/command-runner';
import { CommandFailure } from '@splat-pipeline/contracts';
import { DEFAULT_SCENE_TOOLS } from '@splat-pipeline/dataset-preparer';
import type { ResultSink } from '@splat-pipeline/result-publisher';

import type { PipelineConfig } from '../src/config.js';

export interface RecordedCommand {
  command: string;
  args: string[];
  options?: RunCommandOptions;
}

/**
 * Stands in for ffmpeg, colmap and the trainer by writing the files each tool
 * would leave behind.
 */
export function fakeTools(frames: number): { runner: CommandRunner; calls: RecordedCommand[] } {
  const calls: RecordedCommand[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    if (options?.signal?.aborted) {
      throw new CommandFailure(`${options.label ?? command} terminated by SIGTERM (job aborted)`, {
        command,
        exitCode: null,
        signal: 'SIGTERM',
        stderrExcerpt: '',
      });
    }
    if (command === 'ffmpeg') {
      const dir = dirname(args[args.length - 1] ?? '');
      for (let i = 1; i <= frames; i += 1) {
        await writeFile(join(dir, `frame_${String(i).padStart(5, '0')}.jpg`), 'jpg');
      }
    } else if (command === 'colmap' && args[0] === 'mapper') {
      const model = join(args[args.indexOf('--output_path') + 1] ?? '', '0');
      await mkdir(model, { recursive: true });
      for (const file of ['cameras.bin', 'images.bin', 'points3D.bin']) {
        await writeFile(join(model, file), 'bin');
      }
    } else if (command === 'python3') {
      const outputDir = args[args.indexOf('-m') + 1] ?? '';
      await mkdir(join(outputDir, 'point_cloud'), { recursive: true });
      await writeFile(join(outputDir, 'point_cloud', 'point_cloud.ply'), 'ply');
    }
    return { stdout: '', stderr: '' };
  };
  return { runner, calls };
}

export function fakeSink() {
  const deliver = vi.fn(async (archivePath: string) => ({
    url: `https://uploads.test/${basename(archivePath)}`,
  }));
  const sink: ResultSink = { kind: 'http', deliver };
  return { sink, deliver };
}

export const videoFetch: typeof fetch = async () => new Response('video-bytes');

export function testConfig(workdir: string): PipelineConfig {
  return {
    workdir,
    downloadTimeoutMs: 5_000,
    tools: DEFAULT_SCENE_TOOLS,
    trainer: { command: 'python3', script: 'train.py', cwd: workdir },
    strictReconstruction: false,
  };
}
