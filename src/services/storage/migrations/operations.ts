/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest,
 * checkSchemaVersion, getCurrentSchemaVersion and the v1→v2 catalog migration.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError, type MigrationOptions } from './types.js';
import {
  SCHEMA_VERSION,
  CREATE_THEMES_TABLE,
  createInspirationsTableSql,
} from './schema-definitions.js';
import {
  configurePragmas,
  createIndexes,
  createTables,
  initializeSchemaVersion,
} from './schema-helpers.js';
import {
  DEFAULT_THEME_COLOR,
  DEFAULT_THEME_DESCRIPTION,
  DEFAULT_THEME_ICON,
  THEME_MARKER,
} from '../../../models/theme.js';
import { DEFAULT_THEME_NAME } from '../../../utils/config.js';

/** Version assigned to a pre-catalog database (inspirations table, no schema_version) */
export const LEGACY_SCHEMA_VERSION = 1;

function tableExists(db: Database.Database, name: string): boolean {
  const row = db
    .prepare(
      `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = ?
    `
    )
    .get(name);
  return row !== undefined;
}

/**
 * Check the current schema version of the database
 * @returns 0 if empty, 1 for a legacy flat database, else the recorded version
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    if (!tableExists(db, 'schema_version')) {
      return tableExists(db, 'inspirations') ? LEGACY_SCHEMA_VERSION : 0;
    }

    const row = db.prepare('SELECT version FROM schema_version WHERE id = ?').get(1) as
      | { version: number }
      | undefined;

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Get the current schema version constant
 */
export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize an empty database with all tables, indexes, and configuration
 *
 * Idempotent. The schema version is stamped LAST inside the same transaction,
 * so a crash before completion leaves version 0 and a clean re-init on restart.
 *
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(db: Database.Database): void {
  // Pragmas must be outside the transaction
  configurePragmas(db);

  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

interface LegacyLabelRow {
  label: string;
  cnt: number;
}

/**
 * Migrate from schema version 1 to version 2
 *
 * Changes in v2:
 * - themes: New catalog table, one row per distinct legacy label
 * - inspirations: Recreated with FOREIGN KEY (theme_name) → themes(name)
 *   ON UPDATE CASCADE ON DELETE CASCADE
 * - Placeholder rows (content = THEME_MARKER) are dropped
 * - Labels that cannot be theme names (blank, containing the marker) are
 *   rewritten to the default theme
 * - schema_version: Created and stamped inside the same transaction
 *
 * The old table is never mutated row by row: the new table is built beside it
 * and swapped in with DROP + RENAME, all inside one transaction, so a crash
 * leaves either the complete v1 or the complete v2 schema.
 *
 * @throws MigrationError if migration fails (the transaction is rolled back)
 */
export function migrateV1ToV2(db: Database.Database, options: MigrationOptions = {}): void {
  const fallback = options.defaultThemeName ?? DEFAULT_THEME_NAME;
  const now = (options.now ?? Date.now)();
  const params = { marker: THEME_MARKER, fallback };
  const labelExpr = `CASE WHEN TRIM(theme_name) = '' OR instr(theme_name, @marker) > 0 THEN @fallback ELSE theme_name END`;

  try {
    // Foreign keys must be disabled while the referencing table is rebuilt
    db.exec('PRAGMA foreign_keys = OFF');
    db.exec('BEGIN TRANSACTION');

    // Step 1: Theme catalog
    db.exec(CREATE_THEMES_TABLE);

    // Step 2-3: Distinct labels of the surviving rows, with their counts
    const labels = db
      .prepare(
        `
      SELECT ${labelExpr} AS label, COUNT(*) AS cnt
      FROM inspirations
      WHERE content != @marker
      GROUP BY label
      ORDER BY label
    `
      )
      .all(params) as LegacyLabelRow[];

    // Step 4: One theme per label
    const insertTheme = db.prepare(`
      INSERT INTO themes (name, icon, color, description, createdAt, lastUsed, inspirationCount)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET inspirationCount = excluded.inspirationCount
    `);
    for (const { label, cnt } of labels) {
      insertTheme.run(
        label,
        DEFAULT_THEME_ICON,
        DEFAULT_THEME_COLOR,
        DEFAULT_THEME_DESCRIPTION,
        now,
        now,
        cnt
      );
    }

    // Keep the id sequence monotonic even when the highest id was a placeholder
    const legacySeq = tableExists(db, 'sqlite_sequence')
      ? ((
          db.prepare(`SELECT seq FROM sqlite_sequence WHERE name = 'inspirations'`).get() as
            | { seq: number }
            | undefined
        )?.seq ?? 0)
      : 0;

    // Step 5: New inspirations table with the foreign key
    db.exec(createInspirationsTableSql('inspirations_new'));

    // Step 6: Copy surviving rows
    const copied = db
      .prepare(
        `
      INSERT INTO inspirations_new (id, content, theme_name, created_at, word_count)
      SELECT id, content, ${labelExpr}, created_at, word_count
      FROM inspirations
      WHERE content != @marker
    `
      )
      .run(params).changes;

    const expected = labels.reduce((sum, row) => sum + row.cnt, 0);
    if (copied !== expected) {
      throw new Error(`Copied ${String(copied)} inspirations, expected ${String(expected)}`);
    }

    const dropped = (
      db.prepare('SELECT COUNT(*) AS cnt FROM inspirations WHERE content = ?').get(THEME_MARKER) as {
        cnt: number;
      }
    ).cnt;

    // Step 7: Swap tables
    db.exec('DROP TABLE inspirations');
    db.exec('ALTER TABLE inspirations_new RENAME TO inspirations');
    if (legacySeq > 0) {
      const bumped = db
        .prepare(`UPDATE sqlite_sequence SET seq = MAX(seq, ?) WHERE name = 'inspirations'`)
        .run(legacySeq).changes;
      if (bumped === 0) {
        // Every legacy row was a placeholder, so the new table has no sequence row yet
        db.prepare(`INSERT INTO sqlite_sequence (name, seq) VALUES ('inspirations', ?)`).run(
          legacySeq
        );
      }
    }

    // Step 8: Secondary indexes (dropped with the old table)
    createIndexes(db);

    // Step 9: Version stamp, same transaction as the schema change
    initializeSchemaVersion(db);

    // Verify FK integrity BEFORE commit so violations cause rollback
    const fkViolations = db.pragma('foreign_key_check') as unknown[];
    if (fkViolations.length > 0) {
      throw new Error(
        `Foreign key integrity check failed after v1->v2 migration: ${String(fkViolations.length)} violation(s). ` +
          `First: ${JSON.stringify(fkViolations[0])}`
      );
    }

    db.exec('COMMIT');
    db.exec('PRAGMA foreign_keys = ON');

    console.error(
      `[migrations] v1->v2: ${String(labels.length)} theme(s), ${String(copied)} inspiration(s) migrated, ${String(dropped)} placeholder row(s) dropped`
    );
  } catch (error) {
    try {
      db.exec('ROLLBACK');
      db.exec('PRAGMA foreign_keys = ON');
    } catch (rollbackErr) {
      console.error(
        '[migrations] Rollback failed:',
        rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)
      );
    }
    const cause = error instanceof Error ? error.message : String(error);
    throw new MigrationError(
      `Failed to migrate inspirations from v1 to v2: ${cause}`,
      'migrate',
      'inspirations',
      error
    );
  }
}

/**
 * Bring the database to SCHEMA_VERSION
 *
 * - empty database: full initialization
 * - legacy (v1): catalog migration
 * - current: no-op
 * - newer than supported: MigrationError
 *
 * @throws MigrationError on any failure; the caller must not use the database
 */
export function migrateToLatest(db: Database.Database, options: MigrationOptions = {}): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion === SCHEMA_VERSION) {
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }

  if (currentVersion < 2) {
    // Stamps version 2 inside its own transaction
    migrateV1ToV2(db, options);
  }

  const finalVersion = checkSchemaVersion(db);
  if (finalVersion !== SCHEMA_VERSION) {
    throw new MigrationError(
      `Migration completed but schema version is ${String(finalVersion)}, expected ${String(SCHEMA_VERSION)}. Database may be in inconsistent state.`,
      'version_check',
      'schema_version'
    );
  }
}
