#!/usr/bin/env tsx
/**
 * Generate index.json (and index.js) listings for photo albums.
 *
 * Every album folder under the root gets a JSON array of its image file
 * names in natural order, plus a script version assigning the same array to
 * `window.ALBUM_FILES` for local file:// previews.
 *
 * Usage:
 *   tsx src/cli/generate-indexes.ts
 *   tsx src/cli/generate-indexes.ts --root photos --dry-run
 */

import { parseArgs } from 'node:util';

import { indexAlbums } from '../albums/indexer.js';
import { env } from '../config/index.js';
import { logger } from '../lib/logger.js';
import { consoleReporter, type Reporter } from '../lib/reporter.js';
import { IndexCliOptionsSchema, formatValidationError } from '../lib/validation.js';
import {
  EXIT_CONFIGURATION_ERROR,
  EXIT_OK,
  handleConfigurationError,
  isEntryPoint,
  reportUsageError
} from './shared.js';

export const INDEX_USAGE = `Usage: generate-indexes [options]

Generate index.json for photo albums.

Options:
  --root PATH       Root directory that contains album folders (default: ${env.PHOTOS_ROOT})
  --recursive       Recurse into nested album folders
  --no-overwrite    Skip albums that already contain index.json
  --dry-run         Preview changes without writing files
  --no-js           Do not write the index.js fallback
  -h, --help        Show this help`;

function parseIndexArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      root: { type: 'string' },
      recursive: { type: 'boolean' },
      'no-overwrite': { type: 'boolean' },
      'dry-run': { type: 'boolean' },
      'no-js': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    },
    strict: true,
    allowPositionals: false
  }).values;
}

export async function runGenerateIndexes(
  argv: string[],
  reporter: Reporter = consoleReporter
): Promise<number> {
  let values: ReturnType<typeof parseIndexArgs>;
  try {
    values = parseIndexArgs(argv);
  } catch (error) {
    return reportUsageError(error, INDEX_USAGE, reporter);
  }

  if (values.help) {
    reporter.info(INDEX_USAGE);
    return EXIT_OK;
  }

  const parsed = IndexCliOptionsSchema.safeParse({
    root: values.root ?? env.PHOTOS_ROOT,
    recursive: values.recursive,
    noOverwrite: values['no-overwrite'],
    dryRun: values['dry-run'],
    writeScript: !values['no-js']
  });
  if (!parsed.success) {
    reporter.error(formatValidationError(parsed.error));
    return EXIT_CONFIGURATION_ERROR;
  }

  const { root, ...options } = parsed.data;
  try {
    await indexAlbums(root, options, reporter);
    return EXIT_OK;
  } catch (error) {
    return handleConfigurationError(error, reporter);
  }
}

if (isEntryPoint(import.meta.url)) {
  runGenerateIndexes(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.fatal(error, 'Album indexer failed');
      process.exitCode = EXIT_CONFIGURATION_ERROR;
    });
}
