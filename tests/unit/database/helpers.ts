/**
 * Shared test helpers for DatabaseService tests
 *
 * Provides helper functions, fixtures, and utilities used across all database test modules.
 */

import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DatabaseService } from '../../../src/services/storage/database/service.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/types.js';
import type { Clock } from '../../../src/utils/clock.js';
import type { NewInspiration } from '../../../src/models/inspiration.js';

export { DatabaseService, DatabaseError, DatabaseErrorCode };

// ═══════════════════════════════════════════════════════════════════════════════
// CLOCK
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Clock that starts at `start` and advances by `step` on every read
 */
export class SteppingClock implements Clock {
  constructor(
    private current = 1_000,
    private readonly step = 1
  ) {}

  now(): number {
    const value = this.current;
    this.current += this.step;
    return value;
  }

  peek(): number {
    return this.current;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DATA FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function createTestInspiration(
  themeName: string,
  overrides: Partial<NewInspiration> = {}
): NewInspiration {
  return {
    content: 'A short test note',
    themeName,
    wordCount: 4,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SETUP / TEARDOWN
// ═══════════════════════════════════════════════════════════════════════════════

export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTestDir(dir: string): void {
  if (dir && existsSync(dir)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

let dbCounter = 0;

/**
 * Create a uniquely named database in testDir
 */
export function createFreshDatabase(
  testDir: string,
  prefix: string,
  clock: Clock = new SteppingClock()
): DatabaseService {
  dbCounter += 1;
  return DatabaseService.create(`${prefix}-${String(process.pid)}-${String(dbCounter)}`, {
    storagePath: testDir,
    clock,
  });
}

export function safeCloseDatabase(dbService: DatabaseService | undefined): void {
  dbService?.close();
}

/** Narrow a possibly-unset service in a test body */
export function requireService(dbService: DatabaseService | undefined): DatabaseService {
  if (!dbService) throw new Error('database service not initialised');
  return dbService;
}

/**
 * Run fn and return the DatabaseError it throws
 */
export function captureDatabaseError(fn: () => unknown): DatabaseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DatabaseError) return error;
    throw error;
  }
  throw new Error('expected a DatabaseError');
}
