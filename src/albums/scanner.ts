import { readdir } from 'node:fs/promises';

import { isImageFile } from '../media/classifier.js';
import type { MediaConfig } from '../media/config.js';
import { listSubdirectories, walkDirectories } from '../media/walk.js';
import { naturalSort } from '../lib/natural-sort.js';

/**
 * Album directories under `root`: its direct subdirectories, or every
 * nested directory when `recursive` is set. Backup directories and
 * everything below them are never albums.
 */
export async function findAlbums(root: string, recursive: boolean, config: MediaConfig): Promise<string[]> {
  if (!recursive) {
    return listSubdirectories(root, config);
  }

  const albums: string[] = [];
  for await (const dir of walkDirectories(root, config)) {
    albums.push(dir);
  }
  return albums;
}

/**
 * Image file names directly inside an album, in natural order.
 * The listing file itself never lists itself.
 */
export async function listAlbumFiles(albumPath: string, config: MediaConfig): Promise<string[]> {
  const entries = await readdir(albumPath, { withFileTypes: true });
  const names = entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .filter(name => name !== config.listingFileName && isImageFile(name, config));

  return naturalSort(names);
}
