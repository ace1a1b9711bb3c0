import type { Sharp } from 'sharp';

import type { ImageRecord } from './inspect.js';

/**
 * Bake the EXIF orientation into the pixels.
 *
 * Must run before metadata is dropped, otherwise a photo taken with the
 * camera turned renders sideways once its orientation tag is gone. Images
 * without an orientation tag pass through unchanged.
 */
export function normalizeOrientation(pipeline: Sharp): Sharp {
  return pipeline.rotate();
}

/**
 * Orientations 5-8 include a quarter turn and swap width and height
 */
export function swapsDimensions(orientation: number | undefined): boolean {
  return orientation !== undefined && orientation >= 5 && orientation <= 8;
}

/**
 * Dimensions of the image as displayed, i.e. after orientation is applied
 */
export function orientedSize(record: Pick<ImageRecord, 'width' | 'height' | 'orientation'>): {
  width: number;
  height: number;
} {
  if (swapsDimensions(record.orientation)) {
    return { width: record.height, height: record.width };
  }
  return { width: record.width, height: record.height };
}
