/**
 * Integrity layer: transactional cross-entity writes and the read-only audit
 *
 * @module integrity
 */

export {
  IntegrityCoordinator,
  type OperationOptions,
  type DeleteThemeResult,
} from './coordinator.js';
export {
  DataValidator,
  generateValidationReport,
  type AuditSource,
  type DataValidationResult,
} from './data-validator.js';
export {
  ok,
  fail,
  toOperationError,
  type OperationResult,
  type OperationError,
  type OperationErrorCode,
} from './result.js';
