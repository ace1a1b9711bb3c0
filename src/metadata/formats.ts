/**
 * Image format variant and the per-format re-encode policy table.
 */

export type ImageFormat = 'jpeg' | 'png' | 'webp' | 'tiff';

export type DetectedFormat = ImageFormat | 'unrecognized';

export type TiffCompression = 'none' | 'lzw' | 'deflate';

/**
 * Map a codec format name (as reported by sharp) to the format variant
 */
export function detectFormat(codecFormat: string | undefined): DetectedFormat {
  switch (codecFormat?.toLowerCase()) {
    case 'jpeg':
    case 'jpg':
      return 'jpeg';
    case 'png':
      return 'png';
    case 'webp':
      return 'webp';
    case 'tiff':
    case 'tif':
      return 'tiff';
    default:
      return 'unrecognized';
  }
}

export function isRecognizedFormat(format: DetectedFormat): format is ImageFormat {
  return format !== 'unrecognized';
}

/**
 * How a format is written back once its metadata is removed
 */
export interface EncodePolicy {
  format: ImageFormat;
  /** Encoder quality, 1-100; omitted means encoder default */
  quality?: number;
  /** Optimise entropy coding (JPEG) */
  optimize?: boolean;
  /** TIFF compression; must be lossless or pixels change on every run */
  compression?: TiffCompression;
  /** Re-attach the input ICC profile when it has one */
  retainIcc: boolean;
  /** Write no EXIF, XMP or IPTC; when false the input metadata is carried over */
  dropMetadata: boolean;
}

export type EncodePolicyTable = Readonly<Record<ImageFormat, Readonly<EncodePolicy>>>;

export const DEFAULT_JPEG_QUALITY = 95;

export const DEFAULT_ENCODE_POLICIES: EncodePolicyTable = {
  jpeg: { format: 'jpeg', quality: DEFAULT_JPEG_QUALITY, optimize: true, retainIcc: true, dropMetadata: true },
  png: { format: 'png', retainIcc: true, dropMetadata: true },
  webp: { format: 'webp', quality: 95, retainIcc: true, dropMetadata: true },
  tiff: { format: 'tiff', compression: 'lzw', retainIcc: true, dropMetadata: true }
};

/**
 * Pick the policy for a format, applying the configured JPEG quality
 */
export function resolveEncodePolicy(
  format: ImageFormat,
  jpegQuality: number = DEFAULT_JPEG_QUALITY,
  table: EncodePolicyTable = DEFAULT_ENCODE_POLICIES
): EncodePolicy {
  const policy = table[format];
  if (format === 'jpeg') {
    return { ...policy, quality: jpegQuality };
  }
  return { ...policy };
}
