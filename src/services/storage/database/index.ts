/**
 * Database Module - Public API
 *
 * Re-exports all public types, classes, and functions from the database module.
 */

// Re-export MigrationError from migrations for convenience
export { MigrationError } from '../migrations/index.js';

// Export types and error handling
export type {
  StoreOpenOptions,
  TableName,
  ThemeRow,
  InspirationRow,
} from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

// Export the main service class
export { DatabaseService } from './service.js';

// Live queries
export { ChangeNotifier, type ChangeEvent, type ChangeHandler } from './change-notifier.js';
export { LiveQuery, type SnapshotListener } from './live-query.js';

// Backup
export {
  createPreMigrationBackup,
  cleanupOldBackups,
  MAX_BACKUPS,
  type BackupResult,
  type BackupSkipReason,
} from './pre-migration-backup.js';

// Export converters
export { rowToTheme, rowToInspiration } from './converters.js';
