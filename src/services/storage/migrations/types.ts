/**
 * Type definitions and error classes for database migrations
 *
 * @module migrations/types
 */

/**
 * Error class for database migration failures. Always fatal: a store whose
 * migration failed is never handed to callers.
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly tableName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

/**
 * Options for migrateToLatest / migrateV1ToV2
 */
export interface MigrationOptions {
  /**
   * Theme receiving legacy rows whose label cannot be a theme name
   * (blank, or containing the placeholder marker)
   */
  defaultThemeName?: string;

  /** Timestamp source in milliseconds, used for createdAt/lastUsed of migrated themes */
  now?: () => number;
}
