// Core type definitions shared by the metadata stripper and the album indexer

import type { ImageProcessingError } from '../lib/errors.js';
import type { BackupResult } from '../storage/backup.js';
import type { ImageFormat } from '../metadata/formats.js';

export interface Dimensions {
  width: number;
  height: number;
}

export type StripStatus = 'stripped' | 'would-strip' | 'already-clean' | 'error';

export interface StrippedResult {
  status: 'stripped';
  path: string;
  format: ImageFormat;
  /** Dimensions of the written image, as measured by the encoder */
  size: Dimensions;
  backup?: BackupResult;
}

export interface WouldStripResult {
  status: 'would-strip';
  path: string;
  format: ImageFormat;
  /** Expected output dimensions, predicted from the orientation tag */
  size: Dimensions;
  /** Where a backup would be written, when backups are enabled */
  backupPath?: string;
}

export interface AlreadyCleanResult {
  status: 'already-clean';
  path: string;
}

export interface StripErrorResult {
  status: 'error';
  path: string;
  error: ImageProcessingError;
}

/**
 * Per-file outcome of the metadata stripper
 */
export type StripResult = StrippedResult | WouldStripResult | AlreadyCleanResult | StripErrorResult;

export interface StripSummary {
  processed: number;
  /** Files rewritten (or that would be, under dry run) */
  changed: number;
  clean: number;
  errors: number;
  results: StripResult[];
}

export type AlbumStatus = 'written' | 'would-write' | 'skipped-existing' | 'empty';

export interface AlbumIndexResult {
  status: AlbumStatus;
  albumPath: string;
  listingPath: string;
  files: string[];
}

export interface IndexSummary {
  albums: number;
  files: number;
  skipped: number;
  results: AlbumIndexResult[];
}
