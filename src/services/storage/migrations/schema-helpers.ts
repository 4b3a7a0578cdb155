/**
 * Schema Helper Functions for Database Migrations
 *
 * Contains helper functions for configuring pragmas, creating tables,
 * indexes, and seeding the default theme.
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
  SCHEMA_VERSION,
  REQUIRED_INDEXES,
} from './schema-definitions.js';
import {
  DEFAULT_THEME_COLOR,
  DEFAULT_THEME_DESCRIPTION,
  DEFAULT_THEME_ICON,
} from '../../../models/theme.js';

/** Run one DDL statement, reporting failure against the table or index it builds */
function execStep(
  db: Database.Database,
  sql: string,
  step: string,
  target: string | undefined,
  label: string
): void {
  try {
    db.exec(sql);
  } catch (error) {
    throw new MigrationError(label, step, target, error);
  }
}

/**
 * Per-connection settings, applied on every open
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    execStep(db, pragma, 'pragma', undefined, `Failed to set pragma: ${pragma}`);
  }
}

/**
 * Create schema version table and stamp it with SCHEMA_VERSION
 */
export function initializeSchemaVersion(db: Database.Database): void {
  try {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);

    const now = new Date().toISOString();
    db.prepare(
      `
      INSERT INTO schema_version (id, version, created_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at
    `
    ).run(1, SCHEMA_VERSION, now, now);
  } catch (error) {
    throw new MigrationError(
      'Failed to initialize schema version table',
      'create_table',
      'schema_version',
      error
    );
  }
}

/** Tables in dependency order: themes before the inspirations that reference it */
export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    execStep(db, table.sql, 'create_table', table.name, `Failed to create table: ${table.name}`);
  }
}

export function createIndexes(db: Database.Database): void {
  CREATE_INDEXES.forEach((sql, position) => {
    const indexName = REQUIRED_INDEXES[position];
    execStep(db, sql, 'create_index', indexName, `Failed to create index: ${indexName}`);
  });
}

/**
 * Insert the default theme unless it already exists.
 * The cached count is recomputed so a pre-existing row is left accurate.
 *
 * @returns true when the row was created
 */
export function seedDefaultTheme(db: Database.Database, name: string, now: number): boolean {
  try {
    const result = db
      .prepare(
        `
      INSERT OR IGNORE INTO themes (name, icon, color, description, createdAt, lastUsed, inspirationCount)
      VALUES (?, ?, ?, ?, ?, ?, (SELECT COUNT(*) FROM inspirations WHERE theme_name = ?))
    `
      )
      .run(name, DEFAULT_THEME_ICON, DEFAULT_THEME_COLOR, DEFAULT_THEME_DESCRIPTION, now, now, name);
    return result.changes > 0;
  } catch (error) {
    throw new MigrationError(`Failed to seed default theme "${name}"`, 'insert', 'themes', error);
  }
}
