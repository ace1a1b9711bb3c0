import type { Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { ConfigurationError } from '../lib/errors.js';
import { isExcludedDirectory, isImageFile } from './classifier.js';
import type { MediaConfig } from './config.js';

/**
 * Resolve a root directory and make sure it exists.
 *
 * @throws ConfigurationError when the path is missing or not a directory
 */
export async function resolveRootDirectory(root: string): Promise<string> {
  const absolute = resolve(root);
  const message = `Root not found or not a directory: ${absolute}`;

  let stats: Stats;
  try {
    stats = await stat(absolute);
  } catch {
    throw new ConfigurationError(message);
  }

  if (!stats.isDirectory()) {
    throw new ConfigurationError(message);
  }
  return absolute;
}

/**
 * Immediate subdirectories of `dir`, minus excluded ones, in name order
 */
export async function listSubdirectories(dir: string, config: MediaConfig): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isDirectory() && !isExcludedDirectory(entry.name, config))
    .map(entry => entry.name)
    .sort()
    .map(name => join(dir, name));
}

/**
 * Every directory below `root` (root excluded), depth first.
 * Excluded directories are pruned together with their whole subtree.
 */
export async function* walkDirectories(
  root: string,
  config: MediaConfig
): AsyncGenerator<string> {
  for (const dir of await listSubdirectories(root, config)) {
    yield dir;
    yield* walkDirectories(dir, config);
  }
}

/**
 * Every regular image file below `root`, recursively, skipping excluded
 * directories. Files in a directory are yielded before its subdirectories.
 */
export async function* walkImageFiles(
  root: string,
  config: MediaConfig
): AsyncGenerator<string> {
  const entries = await readdir(root, { withFileTypes: true });
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of sorted) {
    if (entry.isFile() && isImageFile(entry.name, config)) {
      yield join(root, entry.name);
    }
  }

  for (const entry of sorted) {
    if (entry.isDirectory() && !isExcludedDirectory(entry.name, config)) {
      yield* walkImageFiles(join(root, entry.name), config);
    }
  }
}
