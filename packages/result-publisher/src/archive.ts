import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { dirname } from 'node:path';

import archiver from 'archiver';

/**
 * Zip the whole of `sourceDir` into `archivePath`, replacing any previous
 * archive. Resolves with the archive size in bytes.
 */
export async function createArchive(sourceDir: string, archivePath: string): Promise<number> {
  await mkdir(dirname(archivePath), { recursive: true });
  await rm(archivePath, { force: true });

  const output = createWriteStream(archivePath);
  const archive = archiver('zip', { zlib: { level: 9 } });

  return new Promise<number>((resolve, reject) => {
    output.on('close', () => resolve(archive.pointer()));
    output.on('error', reject);
    archive.on('error', reject);
    archive.on('warning', reject);

    archive.pipe(output);
    archive.directory(sourceDir, false);
    archive.finalize().catch(reject);
  });
}
