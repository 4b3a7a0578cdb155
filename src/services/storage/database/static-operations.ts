/**
 * Static operations for DatabaseService - database lifecycle: create, open, exists.
 *
 * Opening runs the whole preparation sequence before a handle is returned:
 * pragmas, pre-migration backup, migration, schema verification and the
 * default theme seed. A failure anywhere closes the connection and throws.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, unlinkSync, writeFileSync, chmodSync } from 'fs';
import {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
  verifySchema,
  configurePragmas,
  seedDefaultTheme,
} from '../migrations/index.js';
import { createPreMigrationBackup } from './pre-migration-backup.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type StoreOpenOptions,
} from './types.js';
import {
  DEFAULT_STORAGE_PATH,
  validateName,
  getDatabasePath,
  describeError,
  registerSqlFunctions,
} from './helpers.js';
import { assertValidThemeName } from './theme-operations.js';
import { DEFAULT_THEME_NAME } from '../../../utils/config.js';
import { systemClock } from '../../../utils/clock.js';

export interface OpenedDatabase {
  db: Database.Database;
  name: string;
  path: string;
}

function removeFile(path: string, reason: string): void {
  try {
    unlinkSync(path);
  } catch (cleanupErr) {
    console.error(
      `[static-operations] Failed to clean up db file after ${reason}: ${describeError(cleanupErr)}`
    );
  }
}

/**
 * The configured default theme must itself be a valid theme name
 * @throws DatabaseError INVALID_NAME
 */
function resolveDefaultThemeName(options: StoreOpenOptions): string {
  const name = options.defaultThemeName ?? DEFAULT_THEME_NAME;
  assertValidThemeName(name);
  return name;
}

function seed(db: Database.Database, options: StoreOpenOptions): void {
  const defaultThemeName = resolveDefaultThemeName(options);
  const now = (options.clock ?? systemClock).now();
  db.transaction(() => {
    if (seedDefaultTheme(db, defaultThemeName, now)) {
      console.error(`[static-operations] Created default theme "${defaultThemeName}"`);
    }
  })();
}

/**
 * Create a new database
 * @throws DatabaseError if name is invalid or database already exists
 */
export function createDatabase(name: string, options: StoreOpenOptions = {}): OpenedDatabase {
  validateName(name);
  resolveDefaultThemeName(options);
  const basePath = options.storagePath ?? DEFAULT_STORAGE_PATH;
  const dbPath = getDatabasePath(name, basePath);

  if (!existsSync(basePath)) {
    mkdirSync(basePath, { recursive: true, mode: 0o700 });
  }

  if (existsSync(dbPath)) {
    throw new DatabaseError(
      `Database "${name}" already exists at ${dbPath}`,
      DatabaseErrorCode.DATABASE_ALREADY_EXISTS
    );
  }

  writeFileSync(dbPath, '', { mode: 0o600 });
  chmodSync(dbPath, 0o600);

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    removeFile(dbPath, 'creation error');
    throw new DatabaseError(
      `Failed to create database "${name}": ${describeError(error)}`,
      DatabaseErrorCode.PERMISSION_DENIED,
      error
    );
  }

  try {
    registerSqlFunctions(db);
    initializeDatabase(db);
    seed(db, options);
  } catch (error) {
    db.close();
    removeFile(dbPath, 'init error');
    throw error;
  }

  return { db, name, path: dbPath };
}

/**
 * Open an existing database, upgrading a legacy schema in place
 * @throws DatabaseError if database doesn't exist or schema is invalid
 * @throws MigrationError if the upgrade fails (the file is left as it was)
 */
export function openDatabase(name: string, options: StoreOpenOptions = {}): OpenedDatabase {
  validateName(name);
  const defaultThemeName = resolveDefaultThemeName(options);
  const dbPath = getDatabasePath(name, options.storagePath);

  if (!existsSync(dbPath)) {
    throw new DatabaseError(
      `Database "${name}" not found at ${dbPath}`,
      DatabaseErrorCode.DATABASE_NOT_FOUND
    );
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(
      `Failed to open database "${name}": ${describeError(error)}`,
      DatabaseErrorCode.DATABASE_LOCKED,
      error
    );
  }

  // Per-connection, not persisted by SQLite
  try {
    configurePragmas(db);
    registerSqlFunctions(db);
  } catch (error) {
    db.close();
    throw error;
  }

  if (options.backupBeforeMigration !== false) {
    try {
      createPreMigrationBackup(db, dbPath, checkSchemaVersion(db), getCurrentSchemaVersion());
    } catch (error) {
      console.error(`[static-operations] Pre-migration backup failed (non-fatal): ${describeError(error)}`);
    }
  }

  const clock = options.clock ?? systemClock;
  try {
    migrateToLatest(db, {
      defaultThemeName,
      now: () => clock.now(),
    });
  } catch (error) {
    db.close();
    throw error;
  }

  const verification = verifySchema(db);
  if (!verification.valid) {
    db.close();
    throw new DatabaseError(
      `Database schema verification failed. Missing tables: ${verification.missingTables.join(', ')}. ` +
        `Missing indexes: ${verification.missingIndexes.join(', ')}. ` +
        `Missing columns: ${verification.missingColumns.join(', ')}. ` +
        `Missing foreign keys: ${verification.missingForeignKeys.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }

  try {
    seed(db, options);
  } catch (error) {
    db.close();
    throw error;
  }

  return { db, name, path: dbPath };
}

/** Check if a database exists */
export function databaseExists(name: string, storagePath?: string): boolean {
  try {
    validateName(name);
  } catch (error) {
    console.error(`[static-operations] Invalid database name: ${describeError(error)}`);
    return false;
  }
  return existsSync(getDatabasePath(name, storagePath));
}
