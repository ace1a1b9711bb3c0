#!/usr/bin/env tsx
/**
 * Remove EXIF and other embedded metadata from every image under a photos
 * root, in place.
 *
 * Usage:
 *   tsx src/cli/strip-metadata.ts                 # process ./photos recursively
 *   tsx src/cli/strip-metadata.ts --dry-run       # report what would change
 *   tsx src/cli/strip-metadata.ts --backup        # keep originals under .originals/
 *   tsx src/cli/strip-metadata.ts --root PATH --quality 90
 *
 * Exit codes: 0 success, 1 bad arguments or root, 2 one or more files failed.
 */

import { parseArgs } from 'node:util';

import { env } from '../config/index.js';
import { logger } from '../lib/logger.js';
import { consoleReporter, type Reporter } from '../lib/reporter.js';
import { StripCliOptionsSchema, formatValidationError } from '../lib/validation.js';
import { stripDirectory } from '../strip/runner.js';
import {
  EXIT_CONFIGURATION_ERROR,
  EXIT_FILE_ERRORS,
  EXIT_OK,
  handleConfigurationError,
  isEntryPoint,
  reportUsageError
} from './shared.js';

export const STRIP_USAGE = `Usage: strip-metadata [options]

Strip EXIF/metadata from images under the photos directory.

Options:
  --root PATH      Path to photos root (default: ${env.PHOTOS_ROOT})
  --dry-run        Don't write changes; just print what would happen
  --backup         Save original files under a .originals/ folder in each album
  --quality INT    JPEG quality when re-saving, 1-100 (default: ${env.JPEG_QUALITY})
  -h, --help       Show this help`;

function parseStripArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      root: { type: 'string' },
      'dry-run': { type: 'boolean' },
      backup: { type: 'boolean' },
      quality: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    },
    strict: true,
    allowPositionals: false
  }).values;
}

export async function runStripMetadata(
  argv: string[],
  reporter: Reporter = consoleReporter
): Promise<number> {
  let values: ReturnType<typeof parseStripArgs>;
  try {
    values = parseStripArgs(argv);
  } catch (error) {
    return reportUsageError(error, STRIP_USAGE, reporter);
  }

  if (values.help) {
    reporter.info(STRIP_USAGE);
    return EXIT_OK;
  }

  const parsed = StripCliOptionsSchema.safeParse({
    root: values.root ?? env.PHOTOS_ROOT,
    dryRun: values['dry-run'],
    backup: values.backup,
    quality: values.quality ?? env.JPEG_QUALITY
  });
  if (!parsed.success) {
    reporter.error(formatValidationError(parsed.error));
    return EXIT_CONFIGURATION_ERROR;
  }

  const options = parsed.data;
  try {
    const summary = await stripDirectory(
      options.root,
      { dryRun: options.dryRun, backup: options.backup, jpegQuality: options.quality },
      reporter
    );
    return summary.errors > 0 ? EXIT_FILE_ERRORS : EXIT_OK;
  } catch (error) {
    return handleConfigurationError(error, reporter);
  }
}

if (isEntryPoint(import.meta.url)) {
  runStripMetadata(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.fatal(error, 'Metadata stripper failed');
      process.exitCode = EXIT_CONFIGURATION_ERROR;
    });
}
