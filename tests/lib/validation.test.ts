import { describe, expect, it } from 'vitest';

import {
  IndexCliOptionsSchema,
  JpegQualitySchema,
  StripCliOptionsSchema,
  formatValidationError
} from '../../src/lib/validation.js';

describe('JpegQualitySchema', () => {
  it('coerces numeric strings', () => {
    expect(JpegQualitySchema.parse('90')).toBe(90);
    expect(JpegQualitySchema.parse(100)).toBe(100);
  });

  it('rejects out-of-range and fractional values', () => {
    expect(JpegQualitySchema.safeParse('0').success).toBe(false);
    expect(JpegQualitySchema.safeParse('101').success).toBe(false);
    expect(JpegQualitySchema.safeParse('95.5').success).toBe(false);
    expect(JpegQualitySchema.safeParse('high').success).toBe(false);
  });
});

describe('StripCliOptionsSchema', () => {
  it('fills boolean defaults', () => {
    expect(StripCliOptionsSchema.parse({ root: 'photos', quality: '80' })).toEqual({
      root: 'photos',
      dryRun: false,
      backup: false,
      quality: 80
    });
  });

  it('reports a readable message for a bad quality', () => {
    const result = StripCliOptionsSchema.safeParse({ root: 'photos', quality: '0' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationError(result.error)).toBe('--quality must be within 1-100');
    }
  });
});

describe('IndexCliOptionsSchema', () => {
  it('writes the script listing unless told otherwise', () => {
    expect(IndexCliOptionsSchema.parse({ root: 'photos' })).toEqual({
      root: 'photos',
      recursive: false,
      noOverwrite: false,
      dryRun: false,
      writeScript: true
    });
  });

  it('rejects an empty root', () => {
    const result = IndexCliOptionsSchema.safeParse({ root: '  ' });
    expect(result.success).toBe(false);
  });
});
