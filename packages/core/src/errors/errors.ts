/**
 * Error classes raised by the dailydraw core.
 *
 * Every error carries a stable `code` so callers (the CLI, scripts reading
 * `--json` output) can branch on the kind of failure without matching
 * message text. The core never recovers from these locally: they bubble to
 * the caller unchanged.
 */

export type DailyDrawErrorCode =
  | 'TASK_NOT_FOUND'
  | 'TASK_ALREADY_EXISTS'
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'IO_ERROR'
  | 'SERIALIZATION_ERROR';

/**
 * Base class for all dailydraw errors
 */
export class DailyDrawError extends Error {
  public readonly code: DailyDrawErrorCode;

  constructor(message: string, code: DailyDrawErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DailyDrawError';
    this.code = code;
    Object.setPrototypeOf(this, DailyDrawError.prototype);
  }
}

/**
 * Raised when an operation names a slug that is not in the catalog
 */
export class TaskNotFoundError extends DailyDrawError {
  public readonly slug: string;

  constructor(slug: string) {
    super(`No task named '${slug}' was found.`, 'TASK_NOT_FOUND');
    this.name = 'TaskNotFoundError';
    this.slug = slug;
    Object.setPrototypeOf(this, TaskNotFoundError.prototype);
  }
}

/**
 * Raised when adding a task whose slug is already taken
 */
export class TaskAlreadyExistsError extends DailyDrawError {
  public readonly slug: string;

  constructor(slug: string) {
    super(`A task named '${slug}' already exists.`, 'TASK_ALREADY_EXISTS');
    this.name = 'TaskAlreadyExistsError';
    this.slug = slug;
    Object.setPrototypeOf(this, TaskAlreadyExistsError.prototype);
  }
}

export type FieldError = {
  field: string;
  message: string;
  value?: unknown;
};

/**
 * Raised before any mutation when input does not satisfy the task model
 */
export class ValidationError extends DailyDrawError {
  public readonly errors: FieldError[];

  constructor(message: string, errors: FieldError[] = [], code: DailyDrawErrorCode = 'VALIDATION_ERROR') {
    super(message, code);
    this.name = 'ValidationError';
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Raised by importers for a file extension they cannot read
 */
export class UnsupportedFileTypeError extends ValidationError {
  public readonly extension: string;

  constructor(extension: string) {
    super(`Unsupported file type: ${extension || 'no extension'}`, [], 'UNSUPPORTED_FILE_TYPE');
    this.name = 'UnsupportedFileTypeError';
    this.extension = extension;
    Object.setPrototypeOf(this, UnsupportedFileTypeError.prototype);
  }
}

/**
 * Raised when a document cannot be read from or written to its location
 */
export class DocumentIoError extends DailyDrawError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not access ${path}: ${reason}`, 'IO_ERROR', { cause });
    this.name = 'DocumentIoError';
    this.path = path;
    Object.setPrototypeOf(this, DocumentIoError.prototype);
  }
}

/**
 * Raised when a document is not valid YAML or does not match its schema
 */
export class SerializationError extends DailyDrawError {
  public readonly path: string;
  public readonly errors: FieldError[];

  constructor(path: string, message: string, errors: FieldError[] = []) {
    const details = errors.map(e => `${e.field} ${e.message}`).join('; ');
    super(`Invalid document ${path}: ${message}${details ? ` (${details})` : ''}`, 'SERIALIZATION_ERROR');
    this.name = 'SerializationError';
    this.path = path;
    this.errors = errors;
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * Narrows an unknown error to a dailydraw error
 */
export function isDailyDrawError(error: unknown): error is DailyDrawError {
  return error instanceof DailyDrawError;
}
