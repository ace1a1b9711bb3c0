import sharp from 'sharp';

import { detectFormat, type DetectedFormat } from './formats.js';

/**
 * What the stripper knows about one opened image. Lives only for the
 * duration of that file's pipeline.
 */
export interface ImageRecord {
  path: string;
  format: DetectedFormat;
  /** Embedded ICC profile, if any */
  icc?: Buffer;
  hasExif: boolean;
  /** EXIF orientation tag (1-8) */
  orientation?: number;
  /** Samples are 16 bits wide (the codec reports `ushort` depth) */
  highBitDepth: boolean;
  /** One grey band, with or without alpha */
  greyscale: boolean;
  /** Stored (pre-orientation) dimensions */
  width: number;
  height: number;
  /** Original file bytes; decoded again for re-encoding */
  source: Buffer;
}

/**
 * Read format and metadata presence from image bytes
 *
 * @param path - Where the bytes came from, kept for reporting
 * @param source - Raw file contents
 * @throws when the codec cannot parse the image header
 */
export async function inspectImage(path: string, source: Buffer): Promise<ImageRecord> {
  const metadata = await sharp(source).metadata();

  return {
    path,
    format: detectFormat(metadata.format),
    icc: metadata.icc,
    hasExif: metadata.exif !== undefined && metadata.exif.length > 0,
    orientation: metadata.orientation,
    highBitDepth: metadata.depth === 'ushort',
    greyscale: metadata.channels !== undefined && metadata.channels <= 2,
    width: metadata.width ?? 0,
    height: metadata.height ?? 0,
    source
  };
}

/**
 * Already-clean short-circuit.
 *
 * Only JPEGs qualify: a JPEG with no EXIF block has been stripped before, and
 * re-encoding it again would only add generation loss. Other formats are
 * always re-encoded, even when they carry no metadata.
 */
export function isAlreadyClean(record: ImageRecord): boolean {
  return record.format === 'jpeg' && !record.hasExif;
}
