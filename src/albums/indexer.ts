import { access } from 'node:fs/promises';

import { logger } from '../lib/logger.js';
import { consoleReporter, type Reporter } from '../lib/reporter.js';
import { defaultMediaConfig, type MediaConfig } from '../media/config.js';
import { resolveRootDirectory } from '../media/walk.js';
import type { AlbumIndexResult, IndexSummary } from '../types/index.js';
import { listingPathFor, listingScriptPathFor, writeListing } from './listing.js';
import { findAlbums, listAlbumFiles } from './scanner.js';

export interface IndexOptions {
  recursive?: boolean;
  /** Leave albums that already have a listing alone */
  noOverwrite?: boolean;
  dryRun?: boolean;
  /** Also write the script fallback listing (default true) */
  writeScript?: boolean;
  config?: MediaConfig;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function indexAlbum(
  albumPath: string,
  options: Required<Omit<IndexOptions, 'config'>>,
  config: MediaConfig,
  reporter: Reporter
): Promise<AlbumIndexResult> {
  const listingPath = listingPathFor(albumPath, config);

  if (options.noOverwrite && (await fileExists(listingPath))) {
    reporter.info(`Skip (exists): ${listingPath}`);
    return { status: 'skipped-existing', albumPath, listingPath, files: [] };
  }

  const files = await listAlbumFiles(albumPath, config);
  if (files.length === 0) {
    logger.debug({ albumPath }, 'No images in album, skipping');
    return { status: 'empty', albumPath, listingPath, files };
  }

  if (options.dryRun) {
    reporter.info(`[DRY] ${listingPath}: ${files.length} files`);
    if (options.writeScript) {
      reporter.info(`[DRY] ${listingScriptPathFor(albumPath, config)}: JS fallback`);
    }
    return { status: 'would-write', albumPath, listingPath, files };
  }

  const written = await writeListing(albumPath, files, options.writeScript, config);
  reporter.info(`Wrote ${written.listingPath} (${files.length} entries)`);
  if (written.scriptPath) {
    reporter.info(`Wrote ${written.scriptPath} (JS fallback)`);
  }
  return { status: 'written', albumPath, listingPath, files };
}

/**
 * Generate listings for every album under `root`.
 *
 * Albums without images produce no listing. With `noOverwrite`, an album
 * that already has a listing is skipped and reported as such.
 *
 * @throws ConfigurationError when `root` is not a directory
 */
export async function indexAlbums(
  root: string,
  options: IndexOptions = {},
  reporter: Reporter = consoleReporter
): Promise<IndexSummary> {
  const config = options.config ?? defaultMediaConfig;
  const resolved = {
    recursive: options.recursive ?? false,
    noOverwrite: options.noOverwrite ?? false,
    dryRun: options.dryRun ?? false,
    writeScript: options.writeScript ?? true
  };

  const rootPath = await resolveRootDirectory(root);
  const albums = await findAlbums(rootPath, resolved.recursive, config);

  const summary: IndexSummary = { albums: 0, files: 0, skipped: 0, results: [] };
  if (albums.length === 0) {
    reporter.info('No album folders found.');
    return summary;
  }

  for (const albumPath of albums) {
    const result = await indexAlbum(albumPath, resolved, config, reporter);
    summary.results.push(result);

    if (result.status === 'skipped-existing') {
      summary.skipped++;
    } else if (result.status === 'written' || result.status === 'would-write') {
      summary.albums++;
      summary.files += result.files.length;
    }
  }

  reporter.info('');
  reporter.info(`Indexed albums: ${summary.albums}, total images listed: ${summary.files}`);
  if (resolved.dryRun) {
    reporter.info('Dry run only. No files were written.');
  }

  return summary;
}
