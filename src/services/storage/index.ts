/**
 * Storage Service Module
 *
 * Provides database initialization, migrations, and storage operations
 * for the inspiration store.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  MigrationError,
  type MigrationOptions,
  type SchemaVerification,
} from './migrations/index.js';

export { SCHEMA_VERSION } from './migrations/schema-definitions.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  LiveQuery,
  type StoreOpenOptions,
} from './database/index.js';
