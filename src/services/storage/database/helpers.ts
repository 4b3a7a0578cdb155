/**
 * Helper functions for DatabaseService
 *
 * Contains utility functions for validation, path resolution,
 * and constraint error handling.
 */

import type Database from 'better-sqlite3';
import { join } from 'path';
import { DEFAULT_STORAGE_PATH } from '../../../utils/config.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';

export { DEFAULT_STORAGE_PATH };

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name || typeof name !== 'string') {
    throw new DatabaseError(
      'Database name is required and must be a string',
      DatabaseErrorCode.INVALID_NAME
    );
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  return join(basePath, `${name}.db`);
}

/**
 * Run a statement, converting SQLite constraint failures into DatabaseError.
 *
 * - FOREIGN KEY constraint failed → FOREIGN_KEY_VIOLATION
 * - UNIQUE / PRIMARY KEY constraint failed → DUPLICATE_KEY
 *
 * @param stmt - Prepared statement to run
 * @param params - Parameters to bind
 * @param context - Error context (e.g. 'inserting inspiration: theme "x" does not exist')
 */
export function runWithConstraintCheck(
  stmt: Database.Statement,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    if (error instanceof Error && error.message.includes('UNIQUE constraint failed')) {
      throw new DatabaseError(`Duplicate key ${context}`, DatabaseErrorCode.DUPLICATE_KEY, error);
    }
    throw error;
  }
}

/** Unicode lower-casing for SQL; the built-in lower() only folds ASCII */
export const FOLD_CASE_FUNCTION = 'fold_case';

/**
 * Register the store's SQL functions. Per-connection, like pragmas.
 */
export function registerSqlFunctions(db: Database.Database): void {
  db.function(FOLD_CASE_FUNCTION, { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value
  );
}

/**
 * Format an unknown thrown value for a log line
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
