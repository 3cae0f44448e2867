#!/usr/bin/env -S node --import tsx
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';
import ora from 'ora';
import pc from 'picocolors';

import { errorMessage } from '@splat-pipeline/contracts';
import { parsePositiveInt } from '@splat-pipeline/shared-infrastructure';

import { createLogger, createPipeline, loadEnvFiles, type ProgressReport } from '../src/index.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));
const repoEnvPath = resolve(moduleDir, '../../../.env');
const envFiles = ['.env'];
if (existsSync(repoEnvPath)) {
  envFiles.push(repoEnvPath);
}

interface RunCliOptions {
  videoUrl: string;
  sceneId?: string;
  iterations?: number;
  fps?: number;
  json?: boolean;
  verbose?: boolean;
}

const program = new Command()
  .name('splat-pipeline')
  .description('Turn a video into a trained, published gaussian splat scene');

program
  .command('run')
  .description('Run one job: download, prepare, train and publish')
  .requiredOption('--video-url <url>', 'HTTP(S) address of the source video')
  .option('--scene-id <id>', 'Scene identifier (random when omitted)')
  .option('--iterations <n>', 'Training iterations', parsePositiveInt('Iterations'))
  .option('--fps <n>', 'Frames per second to extract', parsePositiveInt('FPS'))
  .option('--json', 'Print a single JSON document with events and result')
  .option('--verbose', 'Show debug events, including tool output')
  .action(async (opts: RunCliOptions) => {
    const json = Boolean(opts.json);
    const logger = createLogger({ json, verbose: Boolean(opts.verbose) });
    const summary = loadEnvFiles({ files: envFiles, cwd: process.cwd() });
    if (summary.loadedFiles.length > 0) {
      logger.info('Loaded environment files', { files: summary.loadedFiles });
    }

    const useFancy = !json && process.stdout.isTTY === true && !opts.verbose;
    const spinner = useFancy ? ora({ spinner: 'dots', color: 'cyan' }) : null;

    try {
      const pipeline = createPipeline({ logger: useFancy ? undefined : logger.pipeline });
      if (!pipeline.sink) {
        logger.warn('No result sink configured; the upload stage will fail');
      }

      const onProgress = (report: ProgressReport) => {
        const text = `${String(report.progress).padStart(3)}% ${report.stage}`;
        if (spinner) {
          if (spinner.isSpinning) spinner.text = text;
          else spinner.start(text);
          return;
        }
        logger.info(text);
      };

      const result = await pipeline.runJob(
        {
          input: {
            video_url: opts.videoUrl,
            scene_id: opts.sceneId,
            params: { iterations: opts.iterations, fps: opts.fps },
          },
        },
        { onProgress },
      );

      if (result.status === 'success') {
        spinner?.succeed(`Scene ${result.scene_id} published`);
        logger.success('Published', { url: result.plt_url });
      } else {
        spinner?.fail(pc.red(result.error));
        logger.error(`Job failed at ${result.progress}%`, { error: result.error });
      }
      logger.flush({ ...result });
      if (result.status !== 'success') process.exitCode = 1;
    } catch (error: unknown) {
      if (spinner?.isSpinning) spinner.stop();
      console.error(pc.red(errorMessage(error)));
      process.exitCode = 1;
    }
  });

await program.parseAsync();
