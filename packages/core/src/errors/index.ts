/**
 * quipkeep Error System
 *
 * Structured failures for the data interchange subsystem:
 * - Stable error codes (QK_D100, QK_S201, ...)
 * - A closed `kind` the presentation layer renders and localizes
 * - Suggestions for resolution
 * - The operation context a pipeline was in when it failed
 *
 * @example
 * ```typescript
 * import { InterchangeError } from '@quipkeep/core';
 *
 * if (InterchangeError.isKind(error, 'insufficientStorage')) {
 *   console.log(error.format());
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
  CorruptedDataError,
  InsufficientStorageError,
  InterchangeError,
  OperationCancelledError,
  PartialImportExceededError,
  PreviewExpiredError,
  SerializationError,
  StorageError,
  VersionMismatchError,
  ensureInterchangeError,
  type InterchangeErrorKind,
  type InterchangeErrorOptions,
  type OperationContext,
  type OperationKind,
  type SerializedInterchangeError,
} from './interchange-error.js';
