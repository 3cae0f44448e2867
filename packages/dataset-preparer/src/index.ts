import { join } from 'node:path';

import { runCommand, type CommandRunner } from '@splat-pipeline/command-runner';
import {
  InsufficientInputError,
  noopLogger,
  ReconstructionFailure,
  type PipelineLogger,
} from '@splat-pipeline/contracts';

import { extractFrames, refreshWorkingCopy } from './frames.js';
import {
  locateReconstruction,
  missingReconstructionFiles,
  runReconstruction,
} from './reconstruction.js';
import { DEFAULT_SCENE_TOOLS, MIN_FRAMES, type SceneTools } from './tools.js';

export { countFrames, extractFrames, frameExtractionArgs, refreshWorkingCopy } from './frames.js';
export {
  locateReconstruction,
  missingReconstructionFiles,
  reconstructionSteps,
  runReconstruction,
  RECONSTRUCTION_FILES,
} from './reconstruction.js';
export { DEFAULT_SCENE_TOOLS, MIN_FRAMES, type SceneTools } from './tools.js';

export interface PrepareSceneOptions {
  videoPath: string;
  sceneDir: string;
  fps: number;
  tools?: Partial<SceneTools>;
  runner?: CommandRunner;
  logger?: PipelineLogger;
  runId?: string;
  signal?: AbortSignal;
  /** Treat missing reconstruction files as fatal instead of a warning. */
  strict?: boolean;
}

export interface PreparedScene {
  frameCount: number;
  imagesDir: string;
  sparseDir: string;
  reconstructionDir: string;
  missingFiles: string[];
}

/**
 * Turn a video into a reconstruction-ready scene directory:
 * `input/` frames, `images/` working copy, `database.db` and `sparse/<n>/`.
 */
export async function prepareScene(options: PrepareSceneOptions): Promise<PreparedScene> {
  const { videoPath, sceneDir, fps, runId, signal } = options;
  const tools: SceneTools = { ...DEFAULT_SCENE_TOOLS, ...options.tools };
  const runner = options.runner ?? runCommand;
  const logger = options.logger ?? noopLogger;

  const inputDir = join(sceneDir, 'input');
  const imagesDir = join(sceneDir, 'images');
  const sparseDir = join(sceneDir, 'sparse');
  const databasePath = join(sceneDir, 'database.db');

  const frameCount = await extractFrames({
    videoPath,
    inputDir,
    fps,
    tools,
    runner,
    logger,
    runId,
    signal,
  });
  logger.log({
    level: 'info',
    message: 'frames.extracted',
    runId,
    stage: 'preparing',
    detail: { frameCount, inputDir },
  });
  if (frameCount < MIN_FRAMES) {
    throw new InsufficientInputError(frameCount, MIN_FRAMES);
  }

  await refreshWorkingCopy(inputDir, imagesDir);
  await runReconstruction({ databasePath, imagesDir, sparseDir, tools, runner, logger, runId, signal });

  const reconstructionDir = await locateReconstruction(sparseDir);
  const missingFiles = missingReconstructionFiles(reconstructionDir);
  if (missingFiles.length > 0) {
    if (options.strict) {
      throw new ReconstructionFailure(
        `Reconstruction in ${reconstructionDir} is missing ${missingFiles.join(', ')}`,
      );
    }
    logger.log({
      level: 'warn',
      message: 'reconstruction.files.missing',
      runId,
      stage: 'preparing',
      detail: { reconstructionDir, missingFiles },
    });
  }

  return { frameCount, imagesDir, sparseDir, reconstructionDir, missingFiles };
}
