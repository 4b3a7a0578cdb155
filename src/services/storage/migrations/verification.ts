/**
 * Schema Verification Functions
 *
 * Contains functions to verify database schema integrity after migration.
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES, REQUIRED_COLUMNS } from './schema-definitions.js';

export interface SchemaVerification {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
  /** inspirations has no foreign key onto themes(name) */
  missingForeignKeys: string[];
}

/**
 * Verify all required tables, indexes, columns and the theme foreign key exist
 */
export function verifySchema(db: Database.Database): SchemaVerification {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];
  const missingColumns: string[] = [];
  const missingForeignKeys: string[] = [];

  const hasObject = db.prepare(`SELECT name FROM sqlite_master WHERE type = ? AND name = ?`);

  for (const tableName of REQUIRED_TABLES) {
    if (!hasObject.get('table', tableName)) {
      missingTables.push(tableName);
    }
  }

  for (const indexName of REQUIRED_INDEXES) {
    if (!hasObject.get('index', indexName)) {
      missingIndexes.push(indexName);
    }
  }

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (!hasObject.get('table', table)) {
      continue; // already reported as a missing table
    }
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`Table "${table}" is missing required column: ${col}`);
      }
    }
  }

  if (hasObject.get('table', 'inspirations')) {
    const fks = db.prepare('PRAGMA foreign_key_list(inspirations)').all() as Array<{
      table: string;
      from: string;
      to: string;
    }>;
    if (!fks.some((fk) => fk.table === 'themes' && fk.from === 'theme_name' && fk.to === 'name')) {
      missingForeignKeys.push('inspirations.theme_name -> themes.name');
    }
  }

  return {
    valid:
      missingTables.length === 0 &&
      missingIndexes.length === 0 &&
      missingColumns.length === 0 &&
      missingForeignKeys.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
    missingForeignKeys,
  };
}
