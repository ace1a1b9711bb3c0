/**
 * File-system conventions shared by the indexer and the metadata stripper.
 *
 * Components take a MediaConfig argument rather than reading module
 * constants, so tests can run with their own extension sets and names.
 */
export interface MediaConfig {
  /** Lower-case extensions, including the dot */
  imageExtensions: ReadonlySet<string>;
  /** Per-album directory holding backups; skipped by every traversal */
  backupDirName: string;
  /** Suffix appended to a file path while its replacement is written */
  tempSuffix: string;
  listingFileName: string;
  listingScriptFileName: string;
  /** Global variable assigned by the script listing */
  listingGlobalName: string;
}

export const DEFAULT_IMAGE_EXTENSIONS: readonly string[] = [
  '.jpg',
  '.jpeg',
  '.png',
  '.webp',
  '.tif',
  '.tiff'
];

export function createMediaConfig(overrides: Partial<MediaConfig> = {}): MediaConfig {
  return Object.freeze({
    imageExtensions: overrides.imageExtensions ?? new Set(DEFAULT_IMAGE_EXTENSIONS),
    backupDirName: overrides.backupDirName ?? '.originals',
    tempSuffix: overrides.tempSuffix ?? '.tmp_nox',
    listingFileName: overrides.listingFileName ?? 'index.json',
    listingScriptFileName: overrides.listingScriptFileName ?? 'index.js',
    listingGlobalName: overrides.listingGlobalName ?? 'ALBUM_FILES'
  });
}

export const defaultMediaConfig: MediaConfig = createMediaConfig();
