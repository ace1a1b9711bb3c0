/**
 * Backups of original image bytes.
 *
 * Layout, per album directory:
 * album/
 * ├── photo.jpg
 * └── .originals/photo.jpg   (pristine copy, written once)
 *
 * The first backup of a file wins. Later runs (which see an already stripped
 * file) never touch it, so the copy stays byte-identical to what the camera
 * produced.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { isErrnoException } from '../lib/errors.js';
import { defaultMediaConfig, type MediaConfig } from '../media/config.js';

/**
 * Outcome of a backup request
 */
export type BackupStatus = 'created' | 'exists';

export interface BackupResult {
  status: BackupStatus;
  backupPath: string;
}

export class BackupManager {
  private config: MediaConfig;

  constructor(config: MediaConfig = defaultMediaConfig) {
    this.config = config;
  }

  /**
   * Where the backup of `originalPath` lives
   */
  public backupPathFor(originalPath: string): string {
    return join(dirname(originalPath), this.config.backupDirName, basename(originalPath));
  }

  /**
   * Store the original bytes unless a backup already exists.
   *
   * The file is created with the exclusive flag, so two writers racing on the
   * same path cannot both succeed and an existing backup is never replaced.
   */
  public async backup(originalPath: string, originalBytes: Buffer): Promise<BackupResult> {
    const backupPath = this.backupPathFor(originalPath);
    await mkdir(dirname(backupPath), { recursive: true });

    try {
      await writeFile(backupPath, originalBytes, { flag: 'wx' });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return { status: 'exists', backupPath };
      }
      throw error;
    }

    return { status: 'created', backupPath };
  }
}
