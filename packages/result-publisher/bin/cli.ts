#!/usr/bin/env -S node --import tsx
import { resolve } from 'node:path';

import { errorMessage } from '@splat-pipeline/contracts';
import { loadEnvFiles, resolveSinkConfig } from '@splat-pipeline/shared-infrastructure';
import { Command } from 'commander';

import { createSink, publishResult } from '../src/index.js';

interface PublishResultCliOptions {
  dir: string;
  sceneId: string;
}

const program = new Command()
  .name('publish-result')
  .description('Archive a trained scene directory and deliver it to the configured sink')
  .requiredOption('--dir <path>', 'Result directory to archive')
  .requiredOption('--scene-id <id>', 'Scene identifier; names the archive')
  .action(async (opts: PublishResultCliOptions) => {
    try {
      loadEnvFiles();
      const sink = createSink(resolveSinkConfig());
      const result = await publishResult(resolve(opts.dir), opts.sceneId, { sink });
      console.log(JSON.stringify(result, null, 2));
    } catch (error: unknown) {
      console.error(errorMessage(error));
      process.exit(1);
    }
  });

await program.parseAsync();
