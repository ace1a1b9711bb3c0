import { pathToFileURL } from 'node:url';

import { ConfigurationError, describeCause } from '../lib/errors.js';
import type { Reporter } from '../lib/reporter.js';

/**
 * Exit codes shared by both tools
 */
export const EXIT_OK = 0;
export const EXIT_CONFIGURATION_ERROR = 1;
export const EXIT_FILE_ERRORS = 2;

/**
 * Whether the module at `moduleUrl` was started directly (`tsx src/cli/x.ts`)
 * rather than imported
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  return script !== undefined && moduleUrl === pathToFileURL(script).href;
}

/**
 * Report an argument parsing failure with the usage text
 */
export function reportUsageError(error: unknown, usage: string, reporter: Reporter): number {
  reporter.error(describeCause(error));
  reporter.error(usage);
  return EXIT_CONFIGURATION_ERROR;
}

/**
 * Turn a fatal configuration error into its exit code; anything else is
 * unexpected and propagates
 */
export function handleConfigurationError(error: unknown, reporter: Reporter): number {
  if (error instanceof ConfigurationError) {
    reporter.error(error.message);
    return error.exitCode;
  }
  throw error;
}
