import { cp, mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import type { CommandRunner } from '@splat-pipeline/command-runner';
import type { PipelineLogger } from '@splat-pipeline/contracts';

import type { SceneTools } from './tools.js';

export const FRAME_PATTERN = 'frame_%05d.jpg';

export interface ExtractFramesOptions {
  videoPath: string;
  inputDir: string;
  fps: number;
  tools: SceneTools;
  runner: CommandRunner;
  logger?: PipelineLogger;
  runId?: string;
  signal?: AbortSignal;
}

export function frameExtractionArgs(
  videoPath: string,
  inputDir: string,
  fps: number,
  quality: number,
): string[] {
  return [
    '-y',
    '-i',
    videoPath,
    '-vf',
    `fps=${fps}`,
    '-q:v',
    String(quality),
    join(inputDir, FRAME_PATTERN),
  ];
}

export async function countFrames(dir: string): Promise<number> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.jpg')).length;
}

/** Decode the video into a fresh `inputDir` and return how many frames were written. */
export async function extractFrames(options: ExtractFramesOptions): Promise<number> {
  const { videoPath, inputDir, fps, tools, runner } = options;
  await rm(inputDir, { recursive: true, force: true });
  await mkdir(inputDir, { recursive: true });
  await runner(tools.ffmpegPath, frameExtractionArgs(videoPath, inputDir, fps, tools.frameQuality), {
    label: 'ffmpeg',
    logger: options.logger,
    runId: options.runId,
    stage: 'preparing',
    signal: options.signal,
  });
  return countFrames(inputDir);
}

/** Replace `imagesDir` with a full copy of `inputDir`. */
export async function refreshWorkingCopy(inputDir: string, imagesDir: string): Promise<void> {
  await rm(imagesDir, { recursive: true, force: true });
  await cp(inputDir, imagesDir, { recursive: true });
}
