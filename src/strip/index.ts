export { stripMetadata, type StripOptions } from './pipeline.js';
export { stripDirectory, describeStripResult, summarizeStripResults } from './runner.js';
