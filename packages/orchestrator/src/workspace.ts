import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { errorMessage, type PipelineLogger } from '@splat-pipeline/contracts';

/** Allocates and removes per-job scene directories. */
export interface WorkspaceManager {
  allocate(sceneId: string): Promise<string>;
  release(dir: string): Promise<void>;
}

export function createWorkspaceManager(workdir: string): WorkspaceManager {
  const scenesDir = join(workdir, 'scenes');
  return {
    async allocate(sceneId) {
      await mkdir(scenesDir, { recursive: true });
      // mkdtemp suffix keeps concurrent jobs with the same scene id apart
      return mkdtemp(join(scenesDir, `${sceneId}-`));
    },
    async release(dir) {
      await rm(dir, { recursive: true, force: true });
    },
  };
}

/** Remove a workspace, logging instead of throwing when removal fails. */
export async function releaseQuietly(
  workspaces: WorkspaceManager,
  dir: string,
  logger: PipelineLogger,
  runId?: string,
): Promise<void> {
  try {
    await workspaces.release(dir);
  } catch (error: unknown) {
    logger.log({
      level: 'warn',
      message: 'workspace.cleanup.failed',
      runId,
      stage: 'cleanup',
      detail: { dir, error: errorMessage(error) },
    });
  }
}
