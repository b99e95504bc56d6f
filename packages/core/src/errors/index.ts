/**
 * Tidemark error system: stable codes, categories, suggestions and cause
 * chaining.
 *
 * @example
 * ```typescript
 * import { RemoteError, TidemarkError } from '@tidemark/core';
 *
 * try {
 *   await Engine.open(config);
 * } catch (error) {
 *   if (TidemarkError.isCode(error, 'TIDEMARK_M701')) {
 *     // refuse to start against a newer store
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConflictResolutionError,
  MigrationError,
  QueueError,
  RemoteError,
  StorageError,
  StoreNotReadyError,
  TidemarkError,
  UnsupportedNewerSchemaError,
  ValidationError,
  ensureTidemarkError,
  toError,
  type RemoteErrorKind,
  type SerializedTidemarkError,
  type TidemarkErrorOptions,
  type ValidationIssue,
} from './tidemark-error.js';
