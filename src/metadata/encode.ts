import type { Sharp } from 'sharp';

import type { EncodePolicy } from './formats.js';

/**
 * What the encoder needs to know about the image it re-encodes
 */
export interface EncodeSource {
  hasIcc: boolean;
  /** 16-bit samples; kept for formats that can store them */
  highBitDepth: boolean;
  greyscale: boolean;
}

export interface EncodedImage {
  data: Buffer;
  /** Measured from the encoder output */
  width: number;
  height: number;
}

/**
 * Encode a pipeline according to a format policy.
 *
 * sharp writes no EXIF, XMP or IPTC unless asked to, so dropping metadata
 * means not calling `withMetadata()`. The ICC profile is re-attached
 * separately when the policy retains it and the input has one.
 */
export async function encodeWithPolicy(
  pipeline: Sharp,
  policy: EncodePolicy,
  source: EncodeSource
): Promise<EncodedImage> {
  let output = pipeline;

  if (!policy.dropMetadata) {
    output = output.withMetadata();
  } else if (policy.retainIcc && source.hasIcc) {
    output = output.keepIccProfile();
  }

  const { data, info } = await applyOutputFormat(output, policy, source).toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

function applyOutputFormat(pipeline: Sharp, policy: EncodePolicy, source: EncodeSource): Sharp {
  switch (policy.format) {
    case 'jpeg':
      return pipeline.jpeg({ quality: policy.quality, optimizeCoding: policy.optimize ?? false });
    case 'png':
      return keepSampleDepth(pipeline, source).png();
    case 'webp':
      return pipeline.webp({ quality: policy.quality });
    case 'tiff':
      return keepSampleDepth(pipeline, source).tiff({ compression: policy.compression });
    default: {
      const unreachable: never = policy.format;
      throw new Error(`No encoder for format: ${String(unreachable)}`);
    }
  }
}

// sharp converts to 8-bit sRGB on output unless a 16-bit colourspace is requested.
function keepSampleDepth(pipeline: Sharp, source: EncodeSource): Sharp {
  if (!source.highBitDepth) {
    return pipeline;
  }
  return pipeline.toColourspace(source.greyscale ? 'grey16' : 'rgb16');
}
