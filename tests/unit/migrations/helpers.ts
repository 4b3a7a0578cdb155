/**
 * Shared Test Helpers for Database Migrations Tests
 *
 * Provides common utilities, fixtures, and setup/teardown helpers
 * for all migration test modules.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { CREATE_LEGACY_INSPIRATIONS_TABLE } from '../../../src/services/storage/migrations/schema-definitions.js';

export interface TestContext {
  testDir: string;
  db: Database.Database | undefined;
  dbPath: string;
}

/**
 * Helper to get table info from SQLite
 */
export function getTableColumns(db: Database.Database, tableName: string): string[] {
  const result = db.prepare(`PRAGMA table_info(${tableName})`).all() as Array<{ name: string }>;
  return result.map((row) => row.name);
}

/**
 * Helper to get all table names from database
 */
export function getTableNames(db: Database.Database): string[] {
  const result = db
    .prepare(
      `
    SELECT name FROM sqlite_master
    WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
    ORDER BY name
  `
    )
    .all() as Array<{ name: string }>;
  return result.map((row) => row.name);
}

/**
 * Helper to get all index names from database
 */
export function getIndexNames(db: Database.Database): string[] {
  const result = db
    .prepare(
      `
    SELECT name FROM sqlite_master
    WHERE type = 'index' AND name NOT LIKE 'sqlite_%'
    ORDER BY name
  `
    )
    .all() as Array<{ name: string }>;
  return result.map((row) => row.name);
}

export function createTestDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function cleanupTestDir(dir: string): void {
  if (dir && fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

let dbCounter = 0;

/**
 * Fresh, empty database file in the test directory
 */
export function createTestDb(testDir: string): { db: Database.Database; dbPath: string } {
  dbCounter += 1;
  const dbPath = path.join(testDir, `test-${String(process.pid)}-${String(dbCounter)}.db`);
  return { db: new Database(dbPath), dbPath };
}

export function closeDb(db: Database.Database | undefined): void {
  if (db?.open) db.close();
}

/** Require the context's open database */
export function requireDb(ctx: TestContext): Database.Database {
  if (!ctx.db) throw new Error('test database not open');
  return ctx.db;
}

export interface LegacyRow {
  content: string;
  theme: string;
  createdAt?: number;
  wordCount?: number;
}

/**
 * Build the flat pre-catalog schema and fill it with rows
 */
export function createLegacySchema(db: Database.Database, rows: readonly LegacyRow[]): void {
  db.exec(CREATE_LEGACY_INSPIRATIONS_TABLE);
  const insert = db.prepare(
    'INSERT INTO inspirations (content, theme_name, created_at, word_count) VALUES (?, ?, ?, ?)'
  );
  rows.forEach((row, index) => {
    insert.run(row.content, row.theme, row.createdAt ?? 1_000 + index, row.wordCount ?? 1);
  });
}
