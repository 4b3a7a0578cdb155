/**
 * Theme Operations for DatabaseService
 *
 * The theme catalog: create, read, rename, delete and the cached aggregate
 * columns. Every function takes an open connection and runs synchronously.
 * Callers that need several of these to be atomic wrap them in a transaction.
 *
 * @module database/theme-operations
 */

import type Database from 'better-sqlite3';
import {
  buildTheme,
  validateThemeName,
  type NewTheme,
  type Theme,
  type ThemeMetadataPatch,
  type ThemeOrder,
  type ValidationResult,
} from '../../../models/theme.js';
import {
  NewThemeSchema,
  ThemeMetadataPatchSchema,
  validateInput,
  ValidationError,
} from '../../../utils/validation.js';
import { DatabaseError, DatabaseErrorCode, type ThemeRow } from './types.js';
import { rowToTheme } from './converters.js';
import { runWithConstraintCheck } from './helpers.js';

const ORDER_CLAUSES: Record<ThemeOrder, string> = {
  name: 'name ASC',
  lastUsed: 'lastUsed DESC, name ASC',
  inspirationCount: 'inspirationCount DESC, name ASC',
};

function describeValidation(subject: string, result: ValidationResult): string {
  switch (result.kind) {
    case 'EMPTY':
      return `${subject} cannot be empty`;
    case 'TOO_LONG':
      return `${subject} exceeds ${String(result.maxLength)} characters`;
    case 'INVALID':
      return `${subject} is invalid: ${result.reason}`;
    case 'VALID':
      return `${subject} is valid`;
  }
}

/**
 * @throws DatabaseError INVALID_NAME carrying the failed ValidationResult
 */
export function assertValidThemeName(name: string): void {
  const result = validateThemeName(name);
  if (result.kind !== 'VALID') {
    throw new DatabaseError(
      describeValidation(`Theme name "${name}"`, result),
      DatabaseErrorCode.INVALID_NAME,
      undefined,
      result
    );
  }
}

/**
 * Zod shape check, rethrown in the store's error vocabulary
 */
function parseShape<T>(parse: () => T, code: DatabaseErrorCode): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new DatabaseError(error.message, code, error, {
        kind: 'INVALID',
        reason: error.message,
      });
    }
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CREATE / READ
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Insert a new theme. Omitted fields take their defaults.
 *
 * @throws DatabaseError INVALID_NAME or DUPLICATE_KEY
 */
export function createTheme(db: Database.Database, input: NewTheme, now: number): Theme {
  const parsed = parseShape(
    () => validateInput(NewThemeSchema, input),
    DatabaseErrorCode.INVALID_NAME
  );
  assertValidThemeName(parsed.name);
  const theme = buildTheme(parsed, now);

  const stmt = db.prepare(`
    INSERT INTO themes (name, icon, color, description, createdAt, lastUsed, inspirationCount)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  runWithConstraintCheck(
    stmt,
    [
      theme.name,
      theme.icon,
      theme.color,
      theme.description,
      theme.createdAt,
      theme.lastUsed,
      theme.inspirationCount,
    ],
    `creating theme: "${theme.name}" already exists`
  );

  return theme;
}

export function getTheme(db: Database.Database, name: string): Theme | null {
  const row = db.prepare('SELECT * FROM themes WHERE name = ?').get(name) as ThemeRow | undefined;
  return row ? rowToTheme(row) : null;
}

export function listThemes(db: Database.Database, orderBy: ThemeOrder = 'name'): Theme[] {
  const rows = db
    .prepare(`SELECT * FROM themes ORDER BY ${ORDER_CLAUSES[orderBy]}`)
    .all() as ThemeRow[];
  return rows.map(rowToTheme);
}

export function countThemes(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS cnt FROM themes').get() as { cnt: number };
  return row.cnt;
}

export function themeExists(db: Database.Database, name: string): boolean {
  return db.prepare('SELECT 1 FROM themes WHERE name = ?').get(name) !== undefined;
}

function requireTheme(db: Database.Database, name: string): void {
  if (!themeExists(db, name)) {
    throw new DatabaseError(`Theme "${name}" not found`, DatabaseErrorCode.NOT_FOUND);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RENAME / DELETE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Change a theme's primary key. The ON UPDATE CASCADE foreign key moves
 * every referencing inspiration in the same statement.
 *
 * Renaming a theme to its current name is a no-op.
 *
 * @throws DatabaseError INVALID_NAME, NOT_FOUND or DUPLICATE_KEY
 */
export function renameTheme(
  db: Database.Database,
  oldName: string,
  newName: string,
  protectedName: string
): void {
  assertValidThemeName(newName);
  requireTheme(db, oldName);
  if (oldName === newName) return;

  if (oldName === protectedName) {
    throw new DatabaseError(
      `Theme "${oldName}" is the default theme and cannot be renamed`,
      DatabaseErrorCode.PROTECTED_THEME
    );
  }

  if (themeExists(db, newName)) {
    throw new DatabaseError(
      `Cannot rename "${oldName}": theme "${newName}" already exists`,
      DatabaseErrorCode.DUPLICATE_KEY
    );
  }

  runWithConstraintCheck(
    db.prepare('UPDATE themes SET name = ? WHERE name = ?'),
    [newName, oldName],
    `renaming theme "${oldName}" to "${newName}"`
  );
}

/**
 * Remove one theme row. Inspirations still pointing at it are removed by
 * the physical cascade, so reassign them first.
 *
 * @throws DatabaseError PROTECTED_THEME for the default theme, NOT_FOUND if absent
 */
export function deleteTheme(db: Database.Database, name: string, protectedName: string): void {
  if (name === protectedName) {
    throw new DatabaseError(
      `Theme "${name}" is the default theme and cannot be deleted`,
      DatabaseErrorCode.PROTECTED_THEME
    );
  }
  const result = db.prepare('DELETE FROM themes WHERE name = ?').run(name);
  if (result.changes === 0) {
    throw new DatabaseError(`Theme "${name}" not found`, DatabaseErrorCode.NOT_FOUND);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// METADATA AND CACHED AGGREGATES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Update icon, color and/or description. Name, timestamps and count
 * are not patchable here.
 *
 * @throws DatabaseError NOT_FOUND, or INVALID_NAME for a malformed patch
 */
export function updateThemeMetadata(
  db: Database.Database,
  name: string,
  patch: ThemeMetadataPatch
): Theme {
  const parsed = parseShape(
    () => validateInput(ThemeMetadataPatchSchema, patch),
    DatabaseErrorCode.INVALID_NAME
  );

  const assignments: string[] = [];
  const values: Array<string | number> = [];
  if (parsed.icon !== undefined) {
    assignments.push('icon = ?');
    values.push(parsed.icon);
  }
  if (parsed.color !== undefined) {
    assignments.push('color = ?');
    values.push(parsed.color);
  }
  if (parsed.description !== undefined) {
    assignments.push('description = ?');
    values.push(parsed.description);
  }

  if (assignments.length > 0) {
    const result = db
      .prepare(`UPDATE themes SET ${assignments.join(', ')} WHERE name = ?`)
      .run(...values, name);
    if (result.changes === 0) {
      throw new DatabaseError(`Theme "${name}" not found`, DatabaseErrorCode.NOT_FOUND);
    }
  }

  const theme = getTheme(db, name);
  if (!theme) {
    throw new DatabaseError(`Theme "${name}" not found`, DatabaseErrorCode.NOT_FOUND);
  }
  return theme;
}

/**
 * @returns false when the theme does not exist
 */
export function setLastUsed(db: Database.Database, name: string, timestamp: number): boolean {
  return db.prepare('UPDATE themes SET lastUsed = ? WHERE name = ?').run(timestamp, name).changes > 0;
}

/**
 * @returns false when the theme does not exist
 */
export function setInspirationCount(db: Database.Database, name: string, count: number): boolean {
  if (!Number.isInteger(count) || count < 0) {
    throw new DatabaseError(
      `Inspiration count must be a non-negative integer, got ${String(count)}`,
      DatabaseErrorCode.INVALID_CONTENT
    );
  }
  return (
    db.prepare('UPDATE themes SET inspirationCount = ? WHERE name = ?').run(count, name).changes > 0
  );
}

/**
 * Stamp lastUsed and recount inspirationCount from the inspirations table
 * in one statement.
 *
 * @returns The new count, or null when the theme does not exist
 */
export function recordThemeUsage(
  db: Database.Database,
  name: string,
  timestamp: number
): number | null {
  const row = db
    .prepare(
      `
      UPDATE themes
      SET lastUsed = ?,
          inspirationCount = (SELECT COUNT(*) FROM inspirations WHERE theme_name = themes.name)
      WHERE name = ?
      RETURNING inspirationCount
    `
    )
    .get(timestamp, name) as { inspirationCount: number } | undefined;
  return row ? row.inspirationCount : null;
}

/**
 * Recompute inspirationCount for one theme without touching lastUsed
 *
 * @returns The new count, or null when the theme does not exist
 */
export function recountTheme(db: Database.Database, name: string): number | null {
  const row = db
    .prepare(
      `
      UPDATE themes
      SET inspirationCount = (SELECT COUNT(*) FROM inspirations WHERE theme_name = themes.name)
      WHERE name = ?
      RETURNING inspirationCount
    `
    )
    .get(name) as { inspirationCount: number } | undefined;
  return row ? row.inspirationCount : null;
}

/**
 * Recompute every stale inspirationCount
 *
 * @returns Number of themes whose cached count changed
 */
export function recountAllThemes(db: Database.Database): number {
  return db
    .prepare(
      `
      UPDATE themes
      SET inspirationCount = (SELECT COUNT(*) FROM inspirations WHERE theme_name = themes.name)
      WHERE inspirationCount != (SELECT COUNT(*) FROM inspirations WHERE theme_name = themes.name)
    `
    )
    .run().changes;
}
