import { describe, expect, it } from 'vitest';

import { inspectImage, isAlreadyClean } from '../../src/metadata/inspect.js';
import { createTestImage } from '../helpers/test-images.js';

describe('inspectImage', () => {
  it('detects EXIF and ICC data in a JPEG', async () => {
    const source = await createTestImage({ exif: true, iccProfile: 'p3' });
    const record = await inspectImage('/albums/a.jpg', source);

    expect(record.path).toBe('/albums/a.jpg');
    expect(record.format).toBe('jpeg');
    expect(record.hasExif).toBe(true);
    expect(record.icc).toBeInstanceOf(Buffer);
    expect(record.width).toBe(40);
    expect(record.height).toBe(20);
    expect(record.source).toBe(source);
  });

  it('reads the orientation tag', async () => {
    const record = await inspectImage('a.jpg', await createTestImage({ orientation: 6 }));
    expect(record.orientation).toBe(6);
    expect(record.hasExif).toBe(true);
  });

  it('reports a plain image as metadata free', async () => {
    const record = await inspectImage('a.png', await createTestImage({ format: 'png' }));
    expect(record.format).toBe('png');
    expect(record.hasExif).toBe(false);
    expect(record.icc).toBeUndefined();
  });

  it('reports the sample depth', async () => {
    const eightBit = await inspectImage('a.png', await createTestImage({ format: 'png' }));
    const sixteenBit = await inspectImage('b.png', await createTestImage({ format: 'png', sixteenBit: true }));

    expect(eightBit.highBitDepth).toBe(false);
    expect(sixteenBit.highBitDepth).toBe(true);
    expect(sixteenBit.greyscale).toBe(false);
  });

  it('flags formats outside the policy table', async () => {
    const record = await inspectImage('a.gif', await createTestImage({ format: 'gif' }));
    expect(record.format).toBe('unrecognized');
  });

  it('rejects bytes that are not an image', async () => {
    await expect(inspectImage('bad.jpg', Buffer.from('not an image'))).rejects.toThrow();
  });
});

describe('isAlreadyClean', () => {
  it('is true only for JPEGs without EXIF', async () => {
    const cleanJpeg = await inspectImage('a.jpg', await createTestImage());
    const exifJpeg = await inspectImage('b.jpg', await createTestImage({ exif: true }));
    const cleanPng = await inspectImage('c.png', await createTestImage({ format: 'png' }));

    expect(isAlreadyClean(cleanJpeg)).toBe(true);
    expect(isAlreadyClean(exifJpeg)).toBe(false);
    expect(isAlreadyClean(cleanPng)).toBe(false);
  });
});
