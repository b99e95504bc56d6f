/**
 * TidemarkError - error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a TidemarkError
 */
export interface TidemarkErrorOptions {
  /** The error code */
  code: ErrorCode;
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
 * Serialized format of a TidemarkError
 */
export interface SerializedTidemarkError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedTidemarkError | { name: string; message: string; stack?: string };
}

/**
 * Base error for everything the engine throws.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.put('posts', 'p1', { caption: 'hi' });
 * } catch (error) {
 *   if (TidemarkError.isCategory(error, 'validation')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class TidemarkError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: TidemarkErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'TidemarkError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a TidemarkError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): TidemarkError {
    return new TidemarkError({ code, context });
  }

  /**
   * Wrap an existing error with a TidemarkError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): TidemarkError {
    return new TidemarkError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a TidemarkError
   */
  static isTidemarkError(error: unknown): error is TidemarkError {
    return error instanceof TidemarkError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return TidemarkError.isTidemarkError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return TidemarkError.isTidemarkError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedTidemarkError {
    const result: SerializedTidemarkError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (TidemarkError.isTidemarkError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Field-level validation issue
 */
export interface ValidationIssue {
  /** Dotted path of the offending field ('' for the value itself) */
  path: string;
  /** Human-readable message */
  message: string;
}

/**
 * Validation error with field-level details
 */
export class ValidationError extends TidemarkError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], context?: Record<string, unknown>) {
    const message = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');

    super({
      code: 'TIDEMARK_V100',
      message: `Validation failed: ${message}`,
      context: { ...context, issues },
    });

    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Storage error (disk, permission, decoding or lookup failure). Surfaced per
 * call; the caller may retry.
 */
export class StorageError extends TidemarkError {
  constructor(code: ErrorCode, message?: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * The store was used before its migrations completed
 */
export class StoreNotReadyError extends StorageError {
  constructor(currentVersion: number, requiredVersion: number) {
    super(
      'TIDEMARK_S302',
      `Store is at schema version ${currentVersion}, version ${requiredVersion} is required`,
      { currentVersion, requiredVersion }
    );
    this.name = 'StoreNotReadyError';
  }
}

/**
 * Sync queue bookkeeping error
 */
export class QueueError extends TidemarkError {
  constructor(code: ErrorCode, message?: string, context?: Record<string, unknown>) {
    super({ code, message, context });
    this.name = 'QueueError';
  }
}

/**
 * Migration error. Fatal to store initialization.
 */
export class MigrationError extends TidemarkError {
  /** Version of the failing migration, when one was running */
  readonly version: number | null;

  constructor(
    code: ErrorCode,
    message: string,
    version: number | null,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context: { ...context, version }, cause });
    this.name = 'MigrationError';
    this.version = version;
  }
}

/**
 * The persisted schema is newer than the running build
 */
export class UnsupportedNewerSchemaError extends MigrationError {
  readonly storedVersion: number;
  readonly targetVersion: number;

  constructor(storedVersion: number, targetVersion: number) {
    super(
      'TIDEMARK_M701',
      `Stored schema version ${storedVersion} is newer than supported version ${targetVersion}`,
      null,
      { storedVersion, targetVersion }
    );
    this.name = 'UnsupportedNewerSchemaError';
    this.storedVersion = storedVersion;
    this.targetVersion = targetVersion;
  }
}

/**
 * How the sync coordinator treats a remote failure
 */
export type RemoteErrorKind = 'transient' | 'permanent' | 'unreachable' | 'unauthorized';

const REMOTE_ERROR_CODES: Record<RemoteErrorKind, ErrorCode> = {
  transient: 'TIDEMARK_C500',
  permanent: 'TIDEMARK_C501',
  unreachable: 'TIDEMARK_C502',
  unauthorized: 'TIDEMARK_C503',
};

/**
 * Failure reported by the remote collaborator.
 *
 * - `transient`: retried with backoff
 * - `permanent`: dead-lettered at once (e.g. validation rejection)
 * - `unreachable` / `unauthorized`: abort the whole sync run
 */
export class RemoteError extends TidemarkError {
  readonly kind: RemoteErrorKind;

  constructor(
    kind: RemoteErrorKind,
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code: REMOTE_ERROR_CODES[kind], message, context: { ...context, kind }, cause });
    this.name = 'RemoteError';
    this.kind = kind;
  }

  /**
   * Whether the error should abort a sync run instead of failing one item
   */
  get isConnectivityError(): boolean {
    return this.kind === 'unreachable' || this.kind === 'unauthorized';
  }

  static transient(message: string, context?: Record<string, unknown>, cause?: Error): RemoteError {
    return new RemoteError('transient', message, context, cause);
  }

  static permanent(message: string, context?: Record<string, unknown>, cause?: Error): RemoteError {
    return new RemoteError('permanent', message, context, cause);
  }

  static unreachable(
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ): RemoteError {
    return new RemoteError('unreachable', message, context, cause);
  }

  static unauthorized(
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ): RemoteError {
    return new RemoteError('unauthorized', message, context, cause);
  }

  /**
   * Normalize anything a remote call threw. Unknown failures (timeouts
   * included) are transient.
   */
  static from(error: unknown, context?: Record<string, unknown>): RemoteError {
    if (error instanceof RemoteError) {
      return error;
    }
    if (error instanceof Error) {
      return new RemoteError('transient', error.message, context, error);
    }
    return new RemoteError('transient', String(error), context);
  }
}

/**
 * A field-merge strategy failed. Treated as permanent: the entity is marked
 * conflicted until the application resolves it.
 */
export class ConflictResolutionError extends TidemarkError {
  readonly collection: string;
  readonly entityId: string;

  constructor(collection: string, entityId: string, cause?: Error) {
    super({
      code: 'TIDEMARK_R400',
      message: `Conflict resolution failed for ${collection}/${entityId}${cause ? `: ${cause.message}` : ''}`,
      context: { collection, id: entityId },
      cause,
    });
    this.name = 'ConflictResolutionError';
    this.collection = collection;
    this.entityId = entityId;
  }
}

/**
 * Ensure an unknown thrown value is a TidemarkError
 */
export function ensureTidemarkError(
  error: unknown,
  defaultCode: ErrorCode = 'TIDEMARK_X900'
): TidemarkError {
  if (TidemarkError.isTidemarkError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return TidemarkError.wrap(error, defaultCode);
  }

  return new TidemarkError({
    code: defaultCode,
    message: String(error),
  });
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
