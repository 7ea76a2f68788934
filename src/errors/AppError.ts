export type AppErrorOptions = {
  cause?: unknown;
};

export class AppError extends Error {
  public code: string;

  constructor(code: string, message?: string, options: AppErrorOptions = {}) {
    super(message ?? code, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Reporting or database settings are missing or malformed. Raised before any work starts.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("configuration_error", message, options);
  }
}

/**
 * The pool could not be created or a connection could not be taken from it.
 * Never retried here; retry policy belongs to the caller.
 */
export class ConnectionError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("connection_error", message, options);
  }
}

/**
 * The transaction machinery itself failed (begin or commit).
 * Errors thrown by a unit-of-work body are re-raised as they are, not wrapped.
 */
export class TransactionError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("transaction_error", message, options);
  }
}

export class AuthRenewalError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("auth_renewal_error", message, options);
  }
}

/**
 * Writing an audit row failed. Logged and suppressed in favour of the error that triggered the write.
 */
export class RecordingError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("recording_error", message, options);
  }
}

export class ClaimConflictError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("claim_conflict", message, options);
  }
}

export class InvalidImagePathError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("invalid_image_path", message, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
