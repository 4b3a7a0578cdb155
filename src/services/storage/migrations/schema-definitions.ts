/**
 * SQL Schema Definitions for the Inspiration Store
 *
 * Contains all table creation SQL, indexes, and database configuration.
 * These are constants used by the migration system.
 *
 * Version history:
 * - v1: flat `inspirations` table, theme stored as a free-text label,
 *       no themes table, no schema_version table
 * - v2: `themes` catalog, `inspirations.theme_name` references `themes.name`
 *
 * @module migrations/schema-definitions
 */

import { DEFAULT_THEME_COLOR, DEFAULT_THEME_DESCRIPTION, DEFAULT_THEME_ICON } from '../../../models/theme.js';

/** Current schema version */
export const SCHEMA_VERSION = 2;

/**
 * Database configuration pragmas for optimal performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Themes table - the catalog of valid theme names.
 * inspirationCount and lastUsed are cached aggregates maintained by the
 * integrity coordinator, not by the storage engine.
 */
export const CREATE_THEMES_TABLE = `
CREATE TABLE IF NOT EXISTS themes (
  name TEXT PRIMARY KEY NOT NULL,
  icon TEXT NOT NULL DEFAULT '${DEFAULT_THEME_ICON}',
  color INTEGER NOT NULL DEFAULT ${String(DEFAULT_THEME_COLOR)},
  description TEXT NOT NULL DEFAULT '${DEFAULT_THEME_DESCRIPTION}',
  createdAt INTEGER NOT NULL,
  lastUsed INTEGER NOT NULL,
  inspirationCount INTEGER NOT NULL DEFAULT 0 CHECK (inspirationCount >= 0)
)
`;

/**
 * Inspirations table (v2). The physical CASCADE on delete only guards
 * against logic bugs: theme deletion reassigns children first.
 *
 * `tableName` lets the v1→v2 migration build the table under a temporary
 * name before swapping it in.
 */
export function createInspirationsTableSql(tableName: string, ifNotExists = false): string {
  return `
CREATE TABLE ${ifNotExists ? 'IF NOT EXISTS ' : ''}${tableName} (
  id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
  content TEXT NOT NULL,
  theme_name TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  word_count INTEGER NOT NULL,
  FOREIGN KEY (theme_name) REFERENCES themes(name) ON DELETE CASCADE ON UPDATE CASCADE
)
`;
}

export const CREATE_INSPIRATIONS_TABLE = createInspirationsTableSql('inspirations', true);

/**
 * Legacy v1 inspirations table. Only used to recognise and build
 * pre-catalog databases.
 */
export const CREATE_LEGACY_INSPIRATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS inspirations (
  id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
  content TEXT NOT NULL,
  theme_name TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  word_count INTEGER NOT NULL
)
`;

/**
 * Table definitions in dependency order
 */
export const TABLE_DEFINITIONS: readonly { name: string; sql: string }[] = [
  { name: 'themes', sql: CREATE_THEMES_TABLE },
  { name: 'inspirations', sql: CREATE_INSPIRATIONS_TABLE },
] as const;

/**
 * Secondary indexes on inspirations
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS index_inspirations_content ON inspirations(content)',
  'CREATE INDEX IF NOT EXISTS index_inspirations_theme_name ON inspirations(theme_name)',
] as const;

/**
 * Required tables for schema verification
 */
export const REQUIRED_TABLES = ['schema_version', 'themes', 'inspirations'] as const;

/**
 * Required indexes for schema verification
 */
export const REQUIRED_INDEXES = [
  'index_inspirations_content',
  'index_inspirations_theme_name',
] as const;

/**
 * Columns that must exist after migration
 */
export const REQUIRED_COLUMNS: Record<string, readonly string[]> = {
  themes: ['name', 'icon', 'color', 'description', 'createdAt', 'lastUsed', 'inspirationCount'],
  inspirations: ['id', 'content', 'theme_name', 'created_at', 'word_count'],
};
