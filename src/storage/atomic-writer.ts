import { rename, rm, writeFile } from 'node:fs/promises';

import { logger } from '../lib/logger.js';

/**
 * Temporary sibling used while a replacement for `targetPath` is written
 */
export function temporaryPathFor(targetPath: string, tempSuffix: string): string {
  return `${targetPath}${tempSuffix}`;
}

/**
 * Replace a file's contents without exposing a partial write.
 *
 * The data goes to `<targetPath><tempSuffix>` first and is then renamed over
 * the target, which is atomic on the same file system: a reader sees either
 * the old file or the new one. If anything fails before the rename, the
 * target is untouched, the temporary file is removed and the error rethrown.
 */
export async function writeFileAtomic(
  targetPath: string,
  data: Buffer | string,
  tempSuffix: string
): Promise<void> {
  const tempPath = temporaryPathFor(targetPath, tempSuffix);

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, targetPath);
  } catch (error) {
    await removeTemporary(tempPath);
    throw error;
  }
}

async function removeTemporary(tempPath: string): Promise<void> {
  try {
    await rm(tempPath, { force: true });
  } catch (cleanupError) {
    logger.warn({ tempPath, error: cleanupError }, 'Could not remove temporary file');
  }
}
