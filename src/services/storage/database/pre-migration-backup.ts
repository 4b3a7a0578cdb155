/**
 * Pre-Migration Backup
 *
 * Copies a database file aside before a schema upgrade runs on it. The
 * migration itself is transactional; the copy is for users who want the
 * legacy file back after the upgrade has committed.
 *
 * Backup naming: {name}.db.pre-migrate-v{oldVersion}
 * - Only created when 0 < schema version < target version
 * - An existing backup for the same version is never overwritten
 * - Only the most recent MAX_BACKUPS are kept
 *
 * @module database/pre-migration-backup
 */

import { copyFileSync, existsSync, readdirSync, unlinkSync } from 'fs';
import { join, basename, dirname } from 'path';
import type Database from 'better-sqlite3';
import { describeError } from './helpers.js';

/** Maximum number of pre-migration backups to retain per database */
export const MAX_BACKUPS = 3;

export type BackupSkipReason =
  | 'fresh_database'
  | 'already_current'
  | 'backup_exists'
  | 'source_not_found'
  | 'backup_failed';

export interface BackupResult {
  created: boolean;
  /** Set when a backup was written or one already existed */
  backupPath: string | null;
  fromVersion: number;
  toVersion: number;
  reason?: BackupSkipReason;
  /** Failure detail when reason is backup_failed */
  error?: string;
}

/**
 * Create a pre-migration backup of a database file if a migration is needed.
 *
 * Call after the connection is open and before migrateToLatest(). The WAL is
 * checkpointed first so the copied .db file holds every committed row.
 * Never throws: a failed copy is reported in the result and logged.
 */
export function createPreMigrationBackup(
  db: Database.Database,
  dbPath: string,
  currentVersion: number,
  targetVersion: number
): BackupResult {
  const skipped = (reason: BackupSkipReason, backupPath: string | null = null): BackupResult => ({
    created: false,
    backupPath,
    fromVersion: currentVersion,
    toVersion: targetVersion,
    reason,
  });

  if (currentVersion === 0) {
    return skipped('fresh_database');
  }
  if (currentVersion >= targetVersion) {
    return skipped('already_current');
  }
  if (!existsSync(dbPath)) {
    return skipped('source_not_found');
  }

  const backupPath = join(dirname(dbPath), `${basename(dbPath)}.pre-migrate-v${String(currentVersion)}`);
  if (existsSync(backupPath)) {
    console.error(`[pre-migration-backup] Backup already exists for v${String(currentVersion)}: ${backupPath}`);
    return skipped('backup_exists', backupPath);
  }

  try {
    db.pragma('wal_checkpoint(TRUNCATE)');
    copyFileSync(dbPath, backupPath);
    for (const suffix of ['-wal', '-shm']) {
      if (existsSync(`${dbPath}${suffix}`)) {
        copyFileSync(`${dbPath}${suffix}`, `${backupPath}${suffix}`);
      }
    }

    console.error(
      `[pre-migration-backup] Created backup before v${String(currentVersion)}->v${String(targetVersion)} migration: ${backupPath}`
    );
    cleanupOldBackups(dirname(dbPath), basename(dbPath), MAX_BACKUPS);

    return { created: true, backupPath, fromVersion: currentVersion, toVersion: targetVersion };
  } catch (error) {
    console.error(`[pre-migration-backup] WARNING: Failed to create backup: ${describeError(error)}`);
    return { ...skipped('backup_failed'), error: describeError(error) };
  }
}

/**
 * Remove old pre-migration backups, keeping the `keep` highest versions
 */
export function cleanupOldBackups(dir: string, dbFileName: string, keep: number): void {
  const prefix = `${dbFileName}.pre-migrate-v`;
  let backups: Array<{ path: string; version: number }>;
  try {
    backups = readdirSync(dir)
      .filter((f) => f.startsWith(prefix) && !f.endsWith('-wal') && !f.endsWith('-shm'))
      .map((f) => ({ path: join(dir, f), version: parseInt(f.slice(prefix.length), 10) || 0 }))
      .sort((a, b) => a.version - b.version);
  } catch (error) {
    console.error(`[pre-migration-backup] Failed to list backups: ${describeError(error)}`);
    return;
  }

  for (const backup of backups.slice(0, Math.max(0, backups.length - keep))) {
    for (const path of [backup.path, `${backup.path}-wal`, `${backup.path}-shm`]) {
      try {
        if (existsSync(path)) unlinkSync(path);
      } catch (error) {
        console.error(`[pre-migration-backup] Failed to delete ${path}: ${describeError(error)}`);
      }
    }
  }
}
