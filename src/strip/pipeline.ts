import { readFile } from 'node:fs/promises';

import sharp from 'sharp';

import { ImageProcessingError, type ProcessingStage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { defaultMediaConfig, type MediaConfig } from '../media/config.js';
import {
  DEFAULT_ENCODE_POLICIES,
  DEFAULT_JPEG_QUALITY,
  isRecognizedFormat,
  resolveEncodePolicy,
  type EncodePolicyTable
} from '../metadata/formats.js';
import { encodeWithPolicy } from '../metadata/encode.js';
import { inspectImage, isAlreadyClean } from '../metadata/inspect.js';
import { normalizeOrientation, orientedSize } from '../metadata/orientation.js';
import { writeFileAtomic } from '../storage/atomic-writer.js';
import { BackupManager, type BackupResult } from '../storage/backup.js';
import type { StripResult } from '../types/index.js';

export interface StripOptions {
  dryRun?: boolean;
  backup?: boolean;
  jpegQuality?: number;
  config?: MediaConfig;
  policies?: EncodePolicyTable;
}

async function runStage<T>(path: string, stage: ProcessingStage, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    throw new ImageProcessingError(path, stage, error);
  }
}

/**
 * Remove embedded metadata from one image file, in place.
 *
 * Steps: read → inspect (already-clean JPEGs stop here) → bake orientation
 * → encode per format policy → back up the original (optional) → atomic
 * replace. Failures never escape; they come back as an `error` result naming
 * the stage that failed, and the original file is left as it was.
 */
export async function stripMetadata(path: string, options: StripOptions = {}): Promise<StripResult> {
  const config = options.config ?? defaultMediaConfig;
  const policies = options.policies ?? DEFAULT_ENCODE_POLICIES;
  const backups = new BackupManager(config);

  try {
    const source = await runStage(path, 'read', () => readFile(path));
    const record = await runStage(path, 'inspect', () => inspectImage(path, source));
    logger.debug(
      { path, format: record.format, hasExif: record.hasExif, orientation: record.orientation },
      'Inspected image'
    );

    const { format } = record;
    if (!isRecognizedFormat(format)) {
      throw new ImageProcessingError(path, 'inspect', new Error('Unsupported image format'));
    }

    if (isAlreadyClean(record)) {
      return { status: 'already-clean', path };
    }

    if (options.dryRun) {
      return {
        status: 'would-strip',
        path,
        format,
        size: orientedSize(record),
        backupPath: options.backup ? backups.backupPathFor(path) : undefined
      };
    }

    const policy = resolveEncodePolicy(format, options.jpegQuality ?? DEFAULT_JPEG_QUALITY, policies);
    const encoded = await runStage(path, 'encode', () =>
      encodeWithPolicy(normalizeOrientation(sharp(record.source)), policy, {
        hasIcc: record.icc !== undefined,
        highBitDepth: record.highBitDepth,
        greyscale: record.greyscale
      })
    );

    let backup: BackupResult | undefined;
    if (options.backup) {
      backup = await runStage(path, 'backup', () => backups.backup(path, record.source));
      logger.debug({ path, backup }, 'Backup checked');
    }

    await runStage(path, 'write', () => writeFileAtomic(path, encoded.data, config.tempSuffix));

    return { status: 'stripped', path, format, size: { width: encoded.width, height: encoded.height }, backup };
  } catch (error) {
    const failure =
      error instanceof ImageProcessingError ? error : new ImageProcessingError(path, 'inspect', error);
    logger.error({ path, stage: failure.stage, error: failure.message }, 'Failed to strip metadata');
    return { status: 'error', path, error: failure };
  }
}
