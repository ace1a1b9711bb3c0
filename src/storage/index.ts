/**
 * Storage module - atomic replacement and original-file backups
 */

export { writeFileAtomic, temporaryPathFor } from './atomic-writer.js';
export { BackupManager, type BackupResult, type BackupStatus } from './backup.js';
