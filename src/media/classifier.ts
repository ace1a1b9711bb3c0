import { extname } from 'node:path';

import type { MediaConfig } from './config.js';

/**
 * Whether a file name carries one of the recognised image extensions.
 * Matching is case-insensitive (`photo.PNG` qualifies).
 */
export function isImageFile(fileName: string, config: MediaConfig): boolean {
  const extension = extname(fileName).toLowerCase();
  return extension.length > 0 && config.imageExtensions.has(extension);
}

export function isExcludedDirectory(dirName: string, config: MediaConfig): boolean {
  return dirName === config.backupDirName;
}
