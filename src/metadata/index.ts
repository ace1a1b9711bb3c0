/**
 * Metadata module - inspection, orientation and policy-driven re-encoding
 */

export {
  detectFormat,
  isRecognizedFormat,
  resolveEncodePolicy,
  DEFAULT_ENCODE_POLICIES,
  DEFAULT_JPEG_QUALITY,
  type ImageFormat,
  type DetectedFormat,
  type EncodePolicy,
  type EncodePolicyTable,
  type TiffCompression
} from './formats.js';

export { inspectImage, isAlreadyClean, type ImageRecord } from './inspect.js';

export { normalizeOrientation, orientedSize, swapsDimensions } from './orientation.js';

export { encodeWithPolicy, type EncodedImage, type EncodeSource } from './encode.js';
