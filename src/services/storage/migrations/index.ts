/**
 * Database Schema Migrations for the Inspiration Store
 *
 * Handles SQLite schema initialization and the one-time conversion of the
 * flat legacy schema into the theme catalog schema.
 *
 * @module migrations
 */

export { MigrationError, type MigrationOptions } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  migrateV1ToV2,
  checkSchemaVersion,
  getCurrentSchemaVersion,
  LEGACY_SCHEMA_VERSION,
} from './operations.js';

export { configurePragmas, seedDefaultTheme } from './schema-helpers.js';

export { verifySchema, type SchemaVerification } from './verification.js';
