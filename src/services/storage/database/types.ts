/**
 * Type definitions for DatabaseService
 *
 * Contains all interfaces, enums, and row types used by the database service.
 */

import type { ValidationResult } from '../../../models/theme.js';
import type { Clock } from '../../../utils/clock.js';

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
  INVALID_CONTENT = 'INVALID_CONTENT',
  DUPLICATE_KEY = 'DUPLICATE_KEY',
  NOT_FOUND = 'NOT_FOUND',
  PROTECTED_THEME = 'PROTECTED_THEME',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
}

/**
 * Custom error class for database operations
 *
 * `validation` is set for INVALID_NAME and INVALID_CONTENT so callers can
 * tell an empty value from an over-long one.
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown,
    public readonly validation?: ValidationResult
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Database row type for themes (column names as stored)
 */
export interface ThemeRow {
  name: string;
  icon: string;
  color: number;
  description: string;
  createdAt: number;
  lastUsed: number;
  inspirationCount: number;
}

/**
 * Database row type for inspirations
 */
export interface InspirationRow {
  id: number;
  content: string;
  theme_name: string;
  created_at: number;
  word_count: number;
}

/** Tables whose commits are announced to live queries */
export type TableName = 'themes' | 'inspirations';

/**
 * Options for DatabaseService.create / DatabaseService.open
 */
export interface StoreOpenOptions {
  /** Directory holding .db files (default ~/.inspiration-store/databases) */
  storagePath?: string;
  /** Theme that always exists and receives reassigned notes (default Uncategorized) */
  defaultThemeName?: string;
  /** Copy the file aside before upgrading an older schema (default true) */
  backupBeforeMigration?: boolean;
  clock?: Clock;
}
