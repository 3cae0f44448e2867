import { existsSync } from 'node:fs';
import { mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import type { CommandRunner } from '@splat-pipeline/command-runner';
import { ReconstructionFailure, type PipelineLogger } from '@splat-pipeline/contracts';

import type { SceneTools } from './tools.js';

export const RECONSTRUCTION_FILES = ['cameras.bin', 'images.bin', 'points3D.bin'] as const;

export interface ReconstructionPaths {
  databasePath: string;
  imagesDir: string;
  sparseDir: string;
}

export interface RunReconstructionOptions extends ReconstructionPaths {
  tools: SceneTools;
  runner: CommandRunner;
  logger?: PipelineLogger;
  runId?: string;
  signal?: AbortSignal;
}

const gpuFlag = (useGpu: boolean) => (useGpu ? '1' : '0');

export function reconstructionSteps(
  paths: ReconstructionPaths,
  useGpu: boolean,
): Array<{ label: string; args: string[] }> {
  const { databasePath, imagesDir, sparseDir } = paths;
  return [
    {
      label: 'colmap feature_extractor',
      args: [
        'feature_extractor',
        '--database_path',
        databasePath,
        '--image_path',
        imagesDir,
        '--ImageReader.camera_model',
        'OPENCV',
        '--ImageReader.single_camera',
        '1',
        '--SiftExtraction.use_gpu',
        gpuFlag(useGpu),
      ],
    },
    {
      label: 'colmap exhaustive_matcher',
      args: [
        'exhaustive_matcher',
        '--database_path',
        databasePath,
        '--SiftMatching.use_gpu',
        gpuFlag(useGpu),
      ],
    },
    {
      label: 'colmap mapper',
      args: [
        'mapper',
        '--database_path',
        databasePath,
        '--image_path',
        imagesDir,
        '--output_path',
        sparseDir,
        '--Mapper.ba_refine_focal_length',
        '0',
        '--Mapper.ba_refine_extra_params',
        '0',
      ],
    },
  ];
}

/**
 * Feature extraction, exhaustive matching and sparse mapping, in that order.
 * A stale feature database is removed first.
 */
export async function runReconstruction(options: RunReconstructionOptions): Promise<void> {
  const { databasePath, sparseDir, tools, runner } = options;
  await rm(databasePath, { force: true });
  await mkdir(sparseDir, { recursive: true });

  for (const step of reconstructionSteps(options, tools.useGpu)) {
    await runner(tools.colmapPath, step.args, {
      label: step.label,
      logger: options.logger,
      runId: options.runId,
      stage: 'preparing',
      signal: options.signal,
    });
  }
}

/** `sparse/0` when present, else the first subdirectory by name. */
export async function locateReconstruction(sparseDir: string): Promise<string> {
  const preferred = join(sparseDir, '0');
  if (existsSync(preferred)) return preferred;

  const entries = existsSync(sparseDir) ? await readdir(sparseDir, { withFileTypes: true }) : [];
  const candidates = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  const first = candidates[0];
  if (first === undefined) {
    throw new ReconstructionFailure(`No reconstruction found in ${sparseDir}`);
  }
  return join(sparseDir, first);
}

export function missingReconstructionFiles(reconstructionDir: string): string[] {
  return RECONSTRUCTION_FILES.filter((file) => !existsSync(join(reconstructionDir, file)));
}
