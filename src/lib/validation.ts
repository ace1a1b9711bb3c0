import { z } from 'zod';

/**
 * Validation schemas for command-line options
 */

export const RootPathSchema = z.string().trim().min(1, '--root must not be empty');

export const JpegQualitySchema = z.coerce
  .number({ invalid_type_error: '--quality must be a number' })
  .int('--quality must be an integer')
  .min(1, '--quality must be within 1-100')
  .max(100, '--quality must be within 1-100');

export const StripCliOptionsSchema = z.object({
  root: RootPathSchema,
  dryRun: z.boolean().default(false),
  backup: z.boolean().default(false),
  quality: JpegQualitySchema
});

export type StripCliOptions = z.infer<typeof StripCliOptionsSchema>;

export const IndexCliOptionsSchema = z.object({
  root: RootPathSchema,
  recursive: z.boolean().default(false),
  noOverwrite: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  writeScript: z.boolean().default(true)
});

export type IndexCliOptions = z.infer<typeof IndexCliOptionsSchema>;

/**
 * Collapse a ZodError into one line per offending field
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues.map(issue => issue.message).join('\n');
}
