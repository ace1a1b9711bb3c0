/**
 * Photo album tools: album listings and metadata stripping.
 */

export * from './types/index.js';
export * from './media/index.js';
export * from './metadata/index.js';
export * from './storage/index.js';
export * from './strip/index.js';
export * from './albums/index.js';
export { naturalCompare, naturalSort, splitRuns } from './lib/natural-sort.js';
export { ConfigurationError, ImageProcessingError, type ProcessingStage } from './lib/errors.js';
export { consoleReporter, BufferedReporter, type Reporter } from './lib/reporter.js';
export { runStripMetadata } from './cli/strip-metadata.js';
export { runGenerateIndexes } from './cli/generate-indexes.js';
