import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { findAlbums, listAlbumFiles } from '../../src/albums/scanner.js';
import { renderListingJson, renderListingScript } from '../../src/albums/listing.js';
import { createMediaConfig, defaultMediaConfig } from '../../src/media/config.js';
import { createTempDir, putFile, removeTempDir } from '../helpers/test-images.js';

describe('album scanner', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir('album-scan-');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('lists only images, in natural order, without the listing file', async () => {
    const album = join(root, 'party');
    for (const name of ['photo.jpg', 'photo.PNG', 'notes.txt', 'index.json']) {
      await putFile(album, name, 'x');
    }

    expect(await listAlbumFiles(album, defaultMediaConfig)).toEqual(['photo.jpg', 'photo.PNG']);
  });

  it('orders numbered shots by value', async () => {
    const album = join(root, 'party');
    for (const name of ['DSC_10.jpg', 'DSC_2.jpg', 'dsc_1.JPG', 'cover.webp']) {
      await putFile(album, name, 'x');
    }

    expect(await listAlbumFiles(album, defaultMediaConfig)).toEqual([
      'cover.webp',
      'dsc_1.JPG',
      'DSC_2.jpg',
      'DSC_10.jpg'
    ]);
  });

  it('ignores subdirectories inside an album', async () => {
    const album = join(root, 'party');
    await putFile(album, 'a.jpg', 'x');
    await putFile(album, '.originals/a.jpg', 'x');
    await putFile(album, 'nested.jpg/inner.png', 'x');

    expect(await listAlbumFiles(album, defaultMediaConfig)).toEqual(['a.jpg']);
  });

  it('respects an injected extension set', async () => {
    const album = join(root, 'party');
    await putFile(album, 'a.jpg', 'x');
    await putFile(album, 'b.gif', 'x');

    const config = createMediaConfig({ imageExtensions: new Set(['.gif']) });
    expect(await listAlbumFiles(album, config)).toEqual(['b.gif']);
  });

  it('finds top-level albums by default and nested ones when recursive', async () => {
    await putFile(root, 'a/1.jpg', 'x');
    await putFile(root, 'a/inner/2.jpg', 'x');
    await putFile(root, 'a/.originals/1.jpg', 'x');
    await putFile(root, 'b/3.jpg', 'x');
    await putFile(root, 'loose.jpg', 'x');

    expect(await findAlbums(root, false, defaultMediaConfig)).toEqual([join(root, 'a'), join(root, 'b')]);
    expect(await findAlbums(root, true, defaultMediaConfig)).toEqual([
      join(root, 'a'),
      join(root, 'a', 'inner'),
      join(root, 'b')
    ]);
  });
});

describe('listing rendering', () => {
  it('renders indented JSON with a trailing newline', () => {
    expect(renderListingJson(['a.jpg', 'b.jpg'])).toBe('[\n  "a.jpg",\n  "b.jpg"\n]\n');
  });

  it('renders a global assignment for the script fallback', () => {
    expect(renderListingScript(['a.jpg', 'é.jpg'], 'ALBUM_FILES')).toBe('window.ALBUM_FILES = ["a.jpg","é.jpg"];\n');
  });
});
