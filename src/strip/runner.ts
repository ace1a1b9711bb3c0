import { consoleReporter, type Reporter } from '../lib/reporter.js';
import { defaultMediaConfig } from '../media/config.js';
import { resolveRootDirectory, walkImageFiles } from '../media/walk.js';
import type { StripResult, StripSummary } from '../types/index.js';
import { stripMetadata, type StripOptions } from './pipeline.js';

/**
 * One report line for a per-file result
 */
export function describeStripResult(result: StripResult): string {
  switch (result.status) {
    case 'already-clean':
      return `Already clean (no EXIF): ${result.path}`;
    case 'would-strip':
      return result.backupPath
        ? `[DRY] would strip EXIF: ${result.path} (backup: ${result.backupPath})`
        : `[DRY] would strip EXIF: ${result.path}`;
    case 'stripped':
      return `Stripped EXIF: ${result.path}`;
    case 'error':
      return `ERROR processing ${result.path}: ${result.error.message}`;
  }
}

export function summarizeStripResults(results: StripResult[]): StripSummary {
  const summary: StripSummary = { processed: 0, changed: 0, clean: 0, errors: 0, results };

  for (const result of results) {
    summary.processed++;
    switch (result.status) {
      case 'stripped':
      case 'would-strip':
        summary.changed++;
        break;
      case 'already-clean':
        summary.clean++;
        break;
      case 'error':
        summary.errors++;
        break;
    }
  }

  return summary;
}

/**
 * Strip metadata from every image below `root`, one file at a time.
 *
 * A failing file is reported and counted; the batch carries on.
 *
 * @throws ConfigurationError when `root` is not a directory
 */
export async function stripDirectory(
  root: string,
  options: StripOptions = {},
  reporter: Reporter = consoleReporter
): Promise<StripSummary> {
  const config = options.config ?? defaultMediaConfig;
  const rootPath = await resolveRootDirectory(root);

  const results: StripResult[] = [];
  for await (const file of walkImageFiles(rootPath, config)) {
    const result = await stripMetadata(file, { ...options, config });
    results.push(result);

    const line = describeStripResult(result);
    if (result.status === 'error') {
      reporter.error(line);
    } else {
      reporter.info(line);
    }
  }

  const summary = summarizeStripResults(results);
  reporter.info('');
  reporter.info(
    `Processed: ${summary.processed}, changed: ${summary.changed}, ` +
      `already clean: ${summary.clean}, errors: ${summary.errors}`
  );
  if (options.dryRun) {
    reporter.info('Dry run only. No files were modified.');
  }

  return summary;
}
