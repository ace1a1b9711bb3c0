export {
  createMediaConfig,
  defaultMediaConfig,
  DEFAULT_IMAGE_EXTENSIONS,
  type MediaConfig
} from './config.js';
export { isImageFile, isExcludedDirectory } from './classifier.js';
export {
  resolveRootDirectory,
  listSubdirectories,
  walkDirectories,
  walkImageFiles
} from './walk.js';
