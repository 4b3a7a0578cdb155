/**
 * Inspiration Operations for DatabaseService
 *
 * CRUD, search and bulk reassignment for the inspirations table. Cached
 * theme aggregates are NOT maintained here; that is the integrity
 * coordinator's job.
 *
 * @module database/inspiration-operations
 */

import type Database from 'better-sqlite3';
import {
  validateContent,
  type Inspiration,
  type NewInspiration,
} from '../../../models/inspiration.js';
import type { ValidationResult } from '../../../models/theme.js';
import {
  InspirationSchema,
  NewInspirationSchema,
  validateInput,
  ValidationError,
} from '../../../utils/validation.js';
import { DatabaseError, DatabaseErrorCode, type InspirationRow } from './types.js';
import { rowToInspiration } from './converters.js';
import { FOLD_CASE_FUNCTION, runWithConstraintCheck } from './helpers.js';

const NEWEST_FIRST = 'ORDER BY created_at DESC, id DESC';

/**
 * @throws DatabaseError INVALID_CONTENT carrying the failed ValidationResult
 */
export function assertValidContent(content: string): void {
  const result: ValidationResult = validateContent(content);
  if (result.kind === 'EMPTY') {
    throw new DatabaseError(
      'Inspiration content cannot be empty',
      DatabaseErrorCode.INVALID_CONTENT,
      undefined,
      result
    );
  }
  if (result.kind === 'TOO_LONG') {
    throw new DatabaseError(
      `Inspiration content exceeds ${String(result.maxLength)} characters`,
      DatabaseErrorCode.INVALID_CONTENT,
      undefined,
      result
    );
  }
}

function parseInspiration<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new DatabaseError(error.message, DatabaseErrorCode.INVALID_CONTENT, error, {
        kind: 'INVALID',
        reason: error.message,
      });
    }
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// WRITE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Insert one inspiration
 *
 * @returns The store-assigned id
 * @throws DatabaseError INVALID_CONTENT, or FOREIGN_KEY_VIOLATION when the theme does not exist
 */
export function insertInspiration(
  db: Database.Database,
  input: NewInspiration,
  now: number
): number {
  const parsed = parseInspiration(() => validateInput(NewInspirationSchema, input));
  assertValidContent(parsed.content);

  const result = runWithConstraintCheck(
    db.prepare(`
      INSERT INTO inspirations (content, theme_name, created_at, word_count)
      VALUES (?, ?, ?, ?)
    `),
    [parsed.content, parsed.themeName, parsed.createdAt ?? now, parsed.wordCount],
    `inserting inspiration: theme "${parsed.themeName}" does not exist`
  );
  return Number(result.lastInsertRowid);
}

/**
 * Replace every field of an existing inspiration
 *
 * @throws DatabaseError NOT_FOUND, INVALID_CONTENT or FOREIGN_KEY_VIOLATION
 */
export function updateInspiration(db: Database.Database, inspiration: Inspiration): void {
  const parsed = parseInspiration(() => validateInput(InspirationSchema, inspiration));
  assertValidContent(parsed.content);

  const result = runWithConstraintCheck(
    db.prepare(`
      UPDATE inspirations
      SET content = ?, theme_name = ?, created_at = ?, word_count = ?
      WHERE id = ?
    `),
    [parsed.content, parsed.themeName, parsed.createdAt, parsed.wordCount, parsed.id],
    `updating inspiration ${String(parsed.id)}: theme "${parsed.themeName}" does not exist`
  );
  if (result.changes === 0) {
    throw new DatabaseError(
      `Inspiration ${String(parsed.id)} not found`,
      DatabaseErrorCode.NOT_FOUND
    );
  }
}

/**
 * @returns true if a row was deleted
 */
export function deleteInspiration(db: Database.Database, id: number): boolean {
  return db.prepare('DELETE FROM inspirations WHERE id = ?').run(id).changes > 0;
}

/**
 * Delete several inspirations by id. Unknown ids are ignored.
 *
 * @returns Number of rows deleted
 */
export function deleteInspirations(db: Database.Database, ids: readonly number[]): number {
  if (ids.length === 0) return 0;
  const stmt = db.prepare('DELETE FROM inspirations WHERE id = ?');
  let deleted = 0;
  for (const id of ids) {
    deleted += stmt.run(id).changes;
  }
  return deleted;
}

/**
 * @returns Number of rows deleted
 */
export function deleteInspirationsByTheme(db: Database.Database, themeName: string): number {
  return db.prepare('DELETE FROM inspirations WHERE theme_name = ?').run(themeName).changes;
}

/**
 * Point every inspiration of `oldName` at `newName`. The target theme must exist.
 *
 * @returns Number of rows moved
 */
export function updateThemeNameForAll(
  db: Database.Database,
  oldName: string,
  newName: string
): number {
  return runWithConstraintCheck(
    db.prepare('UPDATE inspirations SET theme_name = ? WHERE theme_name = ?'),
    [newName, oldName],
    `moving inspirations from "${oldName}": theme "${newName}" does not exist`
  ).changes;
}

/**
 * Point every inspiration whose theme is missing from the catalog at `target`
 *
 * @returns Number of rows moved
 */
export function reassignOrphans(db: Database.Database, target: string): number {
  return runWithConstraintCheck(
    db.prepare(`
      UPDATE inspirations SET theme_name = ?
      WHERE theme_name NOT IN (SELECT name FROM themes)
    `),
    [target],
    `reassigning orphaned inspirations: theme "${target}" does not exist`
  ).changes;
}

// ═══════════════════════════════════════════════════════════════════════════════
// READ
// ═══════════════════════════════════════════════════════════════════════════════

export function getInspiration(db: Database.Database, id: number): Inspiration | null {
  const row = db.prepare('SELECT * FROM inspirations WHERE id = ?').get(id) as
    | InspirationRow
    | undefined;
  return row ? rowToInspiration(row) : null;
}

/**
 * All inspirations, newest first
 */
export function getAllInspirations(db: Database.Database): Inspiration[] {
  const rows = db.prepare(`SELECT * FROM inspirations ${NEWEST_FIRST}`).all() as InspirationRow[];
  return rows.map(rowToInspiration);
}

export function getInspirationsByTheme(db: Database.Database, themeName: string): Inspiration[] {
  const rows = db
    .prepare(`SELECT * FROM inspirations WHERE theme_name = ? ${NEWEST_FIRST}`)
    .all(themeName) as InspirationRow[];
  return rows.map(rowToInspiration);
}

/**
 * Literal, case-insensitive substring search over content and theme name.
 * An empty keyword matches everything.
 */
export function searchInspirations(db: Database.Database, keyword: string): Inspiration[] {
  const rows = db
    .prepare(
      `SELECT * FROM inspirations
       WHERE instr(${FOLD_CASE_FUNCTION}(content), @needle) > 0
          OR instr(${FOLD_CASE_FUNCTION}(theme_name), @needle) > 0
       ${NEWEST_FIRST}`
    )
    .all({ needle: keyword.toLowerCase() }) as InspirationRow[];
  return rows.map(rowToInspiration);
}

export function countInspirations(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS cnt FROM inspirations').get() as { cnt: number };
  return row.cnt;
}

export function countInspirationsByTheme(db: Database.Database, themeName: string): number {
  const row = db
    .prepare('SELECT COUNT(*) AS cnt FROM inspirations WHERE theme_name = ?')
    .get(themeName) as { cnt: number };
  return row.cnt;
}

/**
 * Distinct theme names referenced by at least one inspiration, sorted
 */
export function getDistinctThemeNames(db: Database.Database): string[] {
  const rows = db
    .prepare('SELECT DISTINCT theme_name FROM inspirations ORDER BY theme_name')
    .all() as Array<{ theme_name: string }>;
  return rows.map((row) => row.theme_name);
}
