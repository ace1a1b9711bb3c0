import { join } from 'node:path';

import type { MediaConfig } from '../media/config.js';
import { writeFileAtomic } from '../storage/atomic-writer.js';

export function listingPathFor(albumPath: string, config: MediaConfig): string {
  return join(albumPath, config.listingFileName);
}

export function listingScriptPathFor(albumPath: string, config: MediaConfig): string {
  return join(albumPath, config.listingScriptFileName);
}

/**
 * JSON listing: 2-space indent, trailing newline
 */
export function renderListingJson(files: readonly string[]): string {
  return `${JSON.stringify(files, null, 2)}\n`;
}

/**
 * Script listing for pages opened from file://, where fetch() of the JSON
 * listing is blocked
 */
export function renderListingScript(files: readonly string[], globalName: string): string {
  return `window.${globalName} = ${JSON.stringify(files)};\n`;
}

export interface WrittenListing {
  listingPath: string;
  scriptPath?: string;
}

/**
 * Write an album's listing files, replacing any previous ones atomically
 */
export async function writeListing(
  albumPath: string,
  files: readonly string[],
  writeScript: boolean,
  config: MediaConfig
): Promise<WrittenListing> {
  const listingPath = listingPathFor(albumPath, config);
  await writeFileAtomic(listingPath, renderListingJson(files), config.tempSuffix);

  if (!writeScript) {
    return { listingPath };
  }

  const scriptPath = listingScriptPathFor(albumPath, config);
  await writeFileAtomic(scriptPath, renderListingScript(files, config.listingGlobalName), config.tempSuffix);
  return { listingPath, scriptPath };
}
