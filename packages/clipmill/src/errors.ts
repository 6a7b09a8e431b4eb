import { formatFileSize } from './formats.js';

export class ClipmillError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ClipmillError';
    Object.setPrototypeOf(this, ClipmillError.prototype);
  }
}

export class UnsupportedFormatError extends ClipmillError {
  constructor(filename: string, allowed: readonly string[] = []) {
    super(
      `Invalid file type: ${filename}`,
      'UNSUPPORTED_FORMAT',
      415,
      allowed.length > 0 ? { filename, allowed_extensions: [...allowed] } : { filename },
    );
    this.name = 'UnsupportedFormatError';
    Object.setPrototypeOf(this, UnsupportedFormatError.prototype);
  }
}

export class FileTooLargeError extends ClipmillError {
  constructor(maxBytes: number, filename?: string) {
    super(
      filename
        ? `File ${filename} is too large. Maximum size is ${formatFileSize(maxBytes)}`
        : `Uploaded file is too large. Maximum size is ${formatFileSize(maxBytes)}`,
      'FILE_TOO_LARGE',
      413,
      filename ? { filename, max_bytes: maxBytes } : { max_bytes: maxBytes },
    );
    this.name = 'FileTooLargeError';
    Object.setPrototypeOf(this, FileTooLargeError.prototype);
  }
}

export class PayloadTooLargeError extends ClipmillError {
  constructor(totalBytes: number, maxBytes: number) {
    super(
      `Total file size (${formatFileSize(totalBytes)}) exceeds limit (${formatFileSize(maxBytes)})`,
      'PAYLOAD_TOO_LARGE',
      413,
      { total_bytes: totalBytes, max_bytes: maxBytes },
    );
    this.name = 'PayloadTooLargeError';
    Object.setPrototypeOf(this, PayloadTooLargeError.prototype);
  }
}

export class LengthRequiredError extends ClipmillError {
  constructor() {
    super('Uploads must declare a Content-Length', 'LENGTH_REQUIRED', 411);
    this.name = 'LengthRequiredError';
    Object.setPrototypeOf(this, LengthRequiredError.prototype);
  }
}

export class InsufficientInputsError extends ClipmillError {
  constructor(received: number, required: number) {
    super(
      required === 1
        ? 'An input file is required'
        : `At least ${required} files are required (received ${received})`,
      'INSUFFICIENT_INPUTS',
      400,
      { received, required },
    );
    this.name = 'InsufficientInputsError';
    Object.setPrototypeOf(this, InsufficientInputsError.prototype);
  }
}

export class InvalidRequestError extends ClipmillError {
  constructor(message: string, code = 'INVALID_REQUEST', details?: Record<string, unknown>) {
    super(message, code, 400, details);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class ProcessingFailedError extends ClipmillError {
  constructor(message: string, public readonly detail?: string) {
    super(message, 'PROCESSING_FAILED', 500);
    this.name = 'ProcessingFailedError';
    Object.setPrototypeOf(this, ProcessingFailedError.prototype);
  }
}

export class JobTimeoutError extends ClipmillError {
  constructor(timeoutSeconds: number) {
    super(`Processing exceeded the ${timeoutSeconds}s time limit`, 'JOB_TIMEOUT', 504, {
      timeout_seconds: timeoutSeconds,
    });
    this.name = 'JobTimeoutError';
    Object.setPrototypeOf(this, JobTimeoutError.prototype);
  }
}

export class StorageError extends ClipmillError {
  constructor(message: string) {
    super(message, 'STORAGE_ERROR', 507);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

export class NotFoundError extends ClipmillError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND') {
    super(message, code, 404);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class AuthenticationError extends ClipmillError {
  constructor(message = 'Missing or invalid x-api-key') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class ForbiddenError extends ClipmillError {
  constructor(message: string, code = 'FORBIDDEN') {
    super(message, code, 403);
    this.name = 'ForbiddenError';
    Object.setPrototypeOf(this, ForbiddenError.prototype);
  }
}

export class InvalidJobTransitionError extends ClipmillError {
  constructor(from: string, to: string) {
    super(`Job cannot move from ${from} to ${to}`, 'INVALID_JOB_TRANSITION', 409, { from, to });
    this.name = 'InvalidJobTransitionError';
    Object.setPrototypeOf(this, InvalidJobTransitionError.prototype);
  }
}

/**
 * Rebuilds a typed error from a failure response. Classes whose constructor
 * composes its own message (the upload checks) come back as the base class so the
 * server's wording is kept; `code` still identifies them.
 */
export function errorFromResponse(
  status: number,
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ClipmillError {
  switch (code) {
    case 'UNAUTHORIZED':
      return new AuthenticationError(message);
    case 'NOT_FOUND':
    case 'JOB_NOT_FOUND':
      return new NotFoundError(message, code);
    case 'PROCESSING_FAILED':
      return new ProcessingFailedError(message);
    case 'STORAGE_ERROR':
      return new StorageError(message);
    case 'LENGTH_REQUIRED':
      return new LengthRequiredError();
    default:
      if (status === 400) return new InvalidRequestError(message, code, details);
      if (status === 403) return new ForbiddenError(message, code);
      return new ClipmillError(message, code, status, details);
  }
}
