/**
 * Error codes shared by every tagshelf error.
 */
export enum TagShelfErrorCode {
  STORAGE_ERROR = 'STORAGE_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BULK_OPERATION_ERROR = 'BULK_OPERATION_ERROR',
  PATH_NOT_FOUND = 'PATH_NOT_FOUND',
}

export class TagShelfError extends Error {
  public readonly code: TagShelfErrorCode;

  constructor(message: string, code: TagShelfErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TagShelfError';
    this.code = code;
  }
}

/**
 * The backing store could not be read, parsed or written.
 * The previously persisted state is left as it was.
 */
export class StorageError extends TagShelfError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, TagShelfErrorCode.STORAGE_ERROR, { cause });
    this.name = 'StorageError';
    this.filePath = filePath;
  }
}

export interface ValidationContext {
  path?: string;
  tag?: string;
  key?: string;
  issues?: string[];
}

/**
 * A tag, path, threshold or configuration value was rejected.
 */
export class ValidationError extends TagShelfError {
  public readonly path?: string;
  public readonly tag?: string;
  public readonly key?: string;
  public readonly issues: string[];

  constructor(message: string, context: ValidationContext = {}) {
    super(message, TagShelfErrorCode.VALIDATION_ERROR);
    this.name = 'ValidationError';
    this.path = context.path;
    this.tag = context.tag;
    this.key = context.key;
    this.issues = context.issues ?? [message];
  }
}

export interface BulkFailure {
  path: string;
  error: ValidationError;
}

/**
 * One or more targets of a batch failed validation; nothing was persisted.
 */
export class BulkOperationError extends TagShelfError {
  public readonly failures: BulkFailure[];

  constructor(operation: string, failures: BulkFailure[]) {
    const noun = failures.length === 1 ? 'path' : 'paths';
    super(
      `Bulk ${operation} aborted: ${failures.length} ${noun} failed validation`,
      TagShelfErrorCode.BULK_OPERATION_ERROR
    );
    this.name = 'BulkOperationError';
    this.failures = failures;
  }
}

export class PathNotFoundError extends TagShelfError {
  public readonly path: string;

  constructor(path: string) {
    super(`Path does not exist: ${path}`, TagShelfErrorCode.PATH_NOT_FOUND);
    this.name = 'PathNotFoundError';
    this.path = path;
  }
}

/**
 * Outcome of an operation whose failure is expected and recoverable.
 * Mirrors the shape of zod's safeParse so both read the same at call sites.
 */
export type Result<T, E = ValidationError> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { success: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { success: false, error };
}
