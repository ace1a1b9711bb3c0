import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ENCODE_POLICIES,
  detectFormat,
  isRecognizedFormat,
  resolveEncodePolicy
} from '../../src/metadata/formats.js';

describe('detectFormat', () => {
  it('maps codec names onto the format variant', () => {
    expect(detectFormat('jpeg')).toBe('jpeg');
    expect(detectFormat('JPG')).toBe('jpeg');
    expect(detectFormat('png')).toBe('png');
    expect(detectFormat('webp')).toBe('webp');
    expect(detectFormat('tiff')).toBe('tiff');
  });

  it('marks everything else as unrecognized', () => {
    expect(detectFormat('gif')).toBe('unrecognized');
    expect(detectFormat('heif')).toBe('unrecognized');
    expect(detectFormat(undefined)).toBe('unrecognized');
    expect(isRecognizedFormat('unrecognized')).toBe(false);
  });
});

describe('encode policy table', () => {
  it('has one entry per recognised format', () => {
    expect(Object.keys(DEFAULT_ENCODE_POLICIES).sort()).toEqual(['jpeg', 'png', 'tiff', 'webp']);
    for (const [format, policy] of Object.entries(DEFAULT_ENCODE_POLICIES)) {
      expect(policy.format).toBe(format);
      expect(policy.dropMetadata).toBe(true);
      expect(policy.retainIcc).toBe(true);
    }
  });

  it('applies the configured quality to JPEG only', () => {
    expect(resolveEncodePolicy('jpeg', 80)).toEqual({
      format: 'jpeg',
      quality: 80,
      optimize: true,
      retainIcc: true,
      dropMetadata: true
    });
    expect(resolveEncodePolicy('webp', 80).quality).toBe(95);
    expect(resolveEncodePolicy('png', 80).quality).toBeUndefined();
  });

  it('writes TIFF with lossless compression', () => {
    expect(resolveEncodePolicy('tiff').compression).toBe('lzw');
  });

  it('defaults JPEG quality to 95', () => {
    expect(resolveEncodePolicy('jpeg').quality).toBe(95);
  });

  it('returns a copy that does not alias the table', () => {
    const policy = resolveEncodePolicy('tiff');
    policy.retainIcc = false;
    expect(DEFAULT_ENCODE_POLICIES.tiff.retainIcc).toBe(true);
  });
});
