/**
 * Operation results returned by the integrity coordinator
 *
 * Expected failures (validation, missing rows, protected theme, cancellation)
 * come back as values. Only programming errors escape as exceptions.
 *
 * @module integrity/result
 */

import type { ValidationResult } from '../../models/theme.js';
import { DatabaseError, DatabaseErrorCode } from '../storage/database/types.js';
import { ValidationError } from '../../utils/validation.js';

export type OperationErrorCode = DatabaseErrorCode | 'VALIDATION_ERROR' | 'INTERNAL_ERROR';

export interface OperationError {
  code: OperationErrorCode;
  message: string;
  /** Present for INVALID_NAME and INVALID_CONTENT */
  validation?: ValidationResult;
}

export type OperationResult<T> = { ok: true; value: T } | { ok: false; error: OperationError };

export function ok<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  code: OperationErrorCode,
  message: string,
  validation?: ValidationResult
): OperationResult<T> {
  return { ok: false, error: validation ? { code, message, validation } : { code, message } };
}

/**
 * Map a thrown value onto an OperationError
 */
export function toOperationError(error: unknown): OperationError {
  if (error instanceof DatabaseError) {
    return error.validation
      ? { code: error.code, message: error.message, validation: error.validation }
      : { code: error.code, message: error.message };
  }
  if (error instanceof ValidationError) {
    return { code: 'VALIDATION_ERROR', message: error.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

export function cancelled(operation: string): DatabaseError {
  return new DatabaseError(`${operation} was cancelled`, DatabaseErrorCode.OPERATION_CANCELLED);
}
