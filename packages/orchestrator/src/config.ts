import { resolve } from 'node:path';

import { DEFAULT_SCENE_TOOLS, type SceneTools } from '@splat-pipeline/dataset-preparer';
import { readBool, readInt, readString } from '@splat-pipeline/shared-infrastructure';

export interface TrainerConfig {
  command: string;
  /** First argument to the trainer; omitted when empty. */
  script?: string;
  cwd: string;
}

export interface PipelineConfig {
  workdir: string;
  downloadTimeoutMs: number;
  tools: SceneTools;
  trainer: TrainerConfig;
  strictReconstruction: boolean;
}

export const DEFAULT_WORKDIR = '/workspace';

/** Read pipeline settings from the process environment. */
export function loadPipelineConfig(): PipelineConfig {
  const workdir = resolve(readString('SPLAT_WORKDIR', DEFAULT_WORKDIR));
  const script = process.env.SPLAT_TRAINER_SCRIPT;

  return {
    workdir,
    downloadTimeoutMs: readInt('SPLAT_DOWNLOAD_TIMEOUT_MS', 120_000),
    tools: {
      ffmpegPath: readString('FFMPEG_PATH', DEFAULT_SCENE_TOOLS.ffmpegPath),
      colmapPath: readString('COLMAP_PATH', DEFAULT_SCENE_TOOLS.colmapPath),
      useGpu: readBool('COLMAP_USE_GPU', DEFAULT_SCENE_TOOLS.useGpu),
      frameQuality: readInt('SPLAT_FRAME_QUALITY', DEFAULT_SCENE_TOOLS.frameQuality),
    },
    trainer: {
      command: readString('SPLAT_TRAINER_COMMAND', 'python3'),
      // Set but empty means "no script argument"; unset means train.py.
      script: script === undefined ? 'train.py' : script.trim() || undefined,
      cwd: resolve(readString('SPLAT_TRAINER_CWD', workdir)),
    },
    strictReconstruction: readBool('SPLAT_STRICT_RECONSTRUCTION', false),
  };
}

export function trainerArgs(
  trainer: TrainerConfig,
  sceneDir: string,
  outputDir: string,
  iterations: number,
): string[] {
  const args = trainer.script ? [trainer.script] : [];
  args.push('-s', sceneDir, '-m', outputDir, `--iterations=${iterations}`);
  return args;
}
