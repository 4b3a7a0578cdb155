/**
 * Shared helpers for coordinator and validator tests
 */

import type { Clock } from '../../../src/utils/clock.js';
import type { DatabaseService } from '../../../src/services/storage/database/service.js';
import type { OperationError, OperationResult } from '../../../src/services/integrity/result.js';

export {
  SteppingClock,
  createTestDir,
  cleanupTestDir,
  createFreshDatabase,
  createTestInspiration,
  safeCloseDatabase,
  requireService,
  DatabaseService,
  DatabaseErrorCode,
} from '../database/helpers.js';

/**
 * Stepping clock that can fire an AbortController on its next read.
 * Inserts read the clock, so arming it cancels an operation mid-flight.
 */
export class ArmableClock implements Clock {
  private armed: AbortController | null = null;

  constructor(private current = 1_000) {}

  arm(controller: AbortController): void {
    this.armed = controller;
  }

  now(): number {
    if (this.armed) {
      this.armed.abort();
      this.armed = null;
    }
    const value = this.current;
    this.current += 1;
    return value;
  }
}

export function expectOk<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

export function expectFailure<T>(result: OperationResult<T>): OperationError {
  if (result.ok) {
    throw new Error('expected a failure result');
  }
  return result.error;
}

/**
 * Write an inspiration whose theme is not in the catalog, bypassing the
 * foreign key for the duration of the insert.
 */
export function insertOrphan(db: DatabaseService, content: string, themeName: string): number {
  const connection = db.getConnection();
  connection.pragma('foreign_keys = OFF');
  try {
    const info = connection
      .prepare(
        'INSERT INTO inspirations (content, theme_name, created_at, word_count) VALUES (?, ?, ?, ?)'
      )
      .run(content, themeName, 1, 1);
    return Number(info.lastInsertRowid);
  } finally {
    connection.pragma('foreign_keys = ON');
  }
}
