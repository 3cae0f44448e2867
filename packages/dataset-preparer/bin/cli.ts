#!/usr/bin/env -S node --import tsx
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { errorMessage, type PipelineLogger } from '@splat-pipeline/contracts';
import { parsePositiveInt } from '@splat-pipeline/shared-infrastructure';
import { Command } from 'commander';

import { prepareScene } from '../src/index.js';

interface PrepareSceneCliOptions {
  video: string;
  out: string;
  fps: number;
  strict?: boolean;
}

const consoleLogger: PipelineLogger = {
  log(event) {
    if (event.level === 'debug') return;
    const line = `[${event.level}] ${event.message}`;
    if (event.level === 'error' || event.level === 'warn') console.error(line);
    else console.log(line);
  },
};

const program = new Command()
  .name('prepare-scene')
  .description('Extract frames from a video and build a sparse reconstruction for training')
  .requiredOption('--video <path>', 'Input video file')
  .requiredOption('--out <dir>', 'Scene directory to create')
  .option('--fps <n>', 'Frames per second to extract', parsePositiveInt('FPS'), 2)
  .option('--strict', 'Fail when reconstruction files are missing')
  .action(async (opts: PrepareSceneCliOptions) => {
    const videoPath = resolve(opts.video);
    if (!existsSync(videoPath)) {
      console.error(`Video file not found: ${videoPath}`);
      process.exitCode = 1;
      return;
    }
    try {
      const result = await prepareScene({
        videoPath,
        sceneDir: resolve(opts.out),
        fps: opts.fps,
        strict: Boolean(opts.strict),
        logger: consoleLogger,
      });
      console.log(`Dataset ready at ${resolve(opts.out)}`);
      console.log(JSON.stringify(result, null, 2));
    } catch (error: unknown) {
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  });

await program.parseAsync();
