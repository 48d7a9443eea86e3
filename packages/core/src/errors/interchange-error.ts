/**
 * InterchangeError - structured errors for the export/import pipelines
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Closed set of failure kinds the presentation layer renders.
 */
export type InterchangeErrorKind =
  | 'corruptedData'
  | 'versionMismatch'
  | 'insufficientStorage'
  | 'serialization'
  | 'partialImportExceeded'
  | 'operationCancelled'
  | 'storage'
  | 'previewExpired'
  | 'unknown';

/** Which long-running operation an error belongs to */
export type OperationKind = 'export' | 'preview' | 'import';

/**
 * Where an operation was when it failed.
 */
export interface OperationContext {
  readonly operation: OperationKind;
  readonly phase: string;
  readonly itemsProcessed: number;
  readonly totalItems: number;
  /** ISO-8601 */
  readonly timestamp: string;
}

/**
 * Options for creating an InterchangeError
 */
export interface InterchangeErrorOptions {
  code: ErrorCode;
  kind: InterchangeErrorKind;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of an InterchangeError
 */
export interface SerializedInterchangeError {
  name: string;
  code: string;
  kind: InterchangeErrorKind;
  message: string;
  suggestion: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  operation: OperationContext | null;
  cause?: SerializedInterchangeError | { name: string; message: string };
}

/**
 * Base class of every failure raised by the data interchange subsystem.
 *
 * @example
 * ```typescript
 * try {
 *   parseSnapshot(bytes);
 * } catch (error) {
 *   if (InterchangeError.isKind(error, 'versionMismatch')) {
 *     showUpdatePrompt();
 *   }
 * }
 * ```
 */
export class InterchangeError extends Error {
  readonly code: ErrorCode;

  readonly kind: InterchangeErrorKind;

  readonly suggestion: string;

  readonly category: ErrorCategory;

  readonly context: Record<string, unknown>;

  override readonly cause?: Error;

  /** Set once, by the pipeline that surfaced the error */
  operation: OperationContext | null = null;

  constructor(options: InterchangeErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    super(options.message ?? errorInfo.message, { cause: options.cause });

    this.name = 'InterchangeError';
    this.code = options.code;
    this.kind = options.kind;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InterchangeError);
    }
  }

  /**
   * Attach the operation context. The first context wins so that an error
   * re-thrown through several layers keeps the innermost position.
   */
  withOperation(operation: OperationContext): this {
    if (!this.operation) {
      this.operation = operation;
    }
    return this;
  }

  static isInterchangeError(error: unknown): error is InterchangeError {
    return error instanceof InterchangeError;
  }

  static isKind(error: unknown, kind: InterchangeErrorKind): error is InterchangeError {
    return InterchangeError.isInterchangeError(error) && error.kind === kind;
  }

  static isCode(error: unknown, code: ErrorCode): error is InterchangeError {
    return InterchangeError.isInterchangeError(error) && error.code === code;
  }

  /**
   * Format the error for display (basic format)
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.operation) {
      const { operation, phase, itemsProcessed, totalItems } = this.operation;
      lines.push(`Operation: ${operation} (${phase}, ${itemsProcessed}/${totalItems})`);
    }

    lines.push(`Suggestion: ${this.suggestion}`);

    return lines.join('\n');
  }

  toJSON(): SerializedInterchangeError {
    const result: SerializedInterchangeError = {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      suggestion: this.suggestion,
      category: this.category,
      context: this.context,
      operation: this.operation,
    };

    if (this.cause) {
      result.cause = InterchangeError.isInterchangeError(this.cause)
        ? this.cause.toJSON()
        : { name: this.cause.name, message: this.cause.message };
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Structural violation in a snapshot or a single content record.
 */
export class CorruptedDataError extends InterchangeError {
  /** Path of the offending field, e.g. `contentRecords[3].intensity` */
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string, options: { code?: ErrorCode; cause?: Error } = {}) {
    super({
      code: options.code ?? 'QK_D100',
      kind: 'corruptedData',
      message: `Corrupted data at "${field}": ${reason}`,
      context: { field, reason },
      cause: options.cause,
    });

    this.name = 'CorruptedDataError';
    this.field = field;
    this.reason = reason;
  }
}

/**
 * Snapshot schema version newer than this build understands, or with no
 * migration path.
 */
export class VersionMismatchError extends InterchangeError {
  readonly foundVersion: number;
  readonly supportedVersion: number;

  constructor(foundVersion: number, supportedVersion: number) {
    super({
      code: 'QK_D110',
      kind: 'versionMismatch',
      message: `Snapshot schema version ${foundVersion} is not supported (current: ${supportedVersion})`,
      context: { foundVersion, supportedVersion },
    });

    this.name = 'VersionMismatchError';
    this.foundVersion = foundVersion;
    this.supportedVersion = supportedVersion;
  }
}

/**
 * The serialized payload cannot be written. Sizes in bytes.
 */
export class InsufficientStorageError extends InterchangeError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super({
      code: 'QK_S201',
      kind: 'insufficientStorage',
      message: `Insufficient storage: ${required} bytes required, ${available} bytes available`,
      context: { required, available },
    });

    this.name = 'InsufficientStorageError';
    this.required = required;
    this.available = available;
  }
}

export class SerializationError extends InterchangeError {
  constructor(cause?: Error) {
    super({
      code: 'QK_D120',
      kind: 'serialization',
      message: cause ? `Snapshot serialization failed: ${cause.message}` : undefined,
      cause,
    });

    this.name = 'SerializationError';
  }
}

/**
 * Merge aborted because per-record failures exceeded the error budget.
 * Records committed before the abort stay committed.
 */
export class PartialImportExceededError extends InterchangeError {
  readonly errorsEncountered: number;
  readonly recordsCommitted: number;
  readonly committedRecordIds: readonly string[];
  readonly pendingRecordIds: readonly string[];

  constructor(
    errorsEncountered: number,
    committedRecordIds: readonly string[],
    pendingRecordIds: readonly string[],
    maxErrorsAllowed: number
  ) {
    super({
      code: 'QK_I300',
      kind: 'partialImportExceeded',
      message: `Import aborted after ${errorsEncountered} failed records (budget: ${maxErrorsAllowed}); ${committedRecordIds.length} records were committed`,
      context: {
        errorsEncountered,
        recordsCommitted: committedRecordIds.length,
        pendingRecords: pendingRecordIds.length,
        maxErrorsAllowed,
      },
    });

    this.name = 'PartialImportExceededError';
    this.errorsEncountered = errorsEncountered;
    this.recordsCommitted = committedRecordIds.length;
    this.committedRecordIds = committedRecordIds;
    this.pendingRecordIds = pendingRecordIds;
  }
}

export class OperationCancelledError extends InterchangeError {
  constructor(operation: OperationKind) {
    super({
      code: 'QK_O400',
      kind: 'operationCancelled',
      message: `The ${operation} operation was cancelled`,
      context: { operation },
    });

    this.name = 'OperationCancelledError';
  }
}

/**
 * The local store rejected a read or write.
 */
export class StorageError extends InterchangeError {
  constructor(action: string, cause?: Error) {
    super({
      code: 'QK_S200',
      kind: 'storage',
      message: cause ? `Local store ${action} failed: ${cause.message}` : `Local store ${action} failed`,
      context: { action },
      cause,
    });

    this.name = 'StorageError';
  }
}

export class PreviewExpiredError extends InterchangeError {
  constructor(previewId: string) {
    super({
      code: 'QK_I301',
      kind: 'previewExpired',
      context: { previewId },
    });

    this.name = 'PreviewExpiredError';
  }
}

/**
 * Return `error` if it already is an InterchangeError, otherwise wrap it.
 * `wrap` picks the error type for foreign throwables; by default they
 * become an internal error.
 */
export function ensureInterchangeError(
  error: unknown,
  wrap?: (cause: Error) => InterchangeError
): InterchangeError {
  if (InterchangeError.isInterchangeError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  if (wrap) {
    return wrap(cause);
  }

  return new InterchangeError({
    code: 'QK_X900',
    kind: 'unknown',
    message: cause.message,
    cause,
  });
}
