import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import {
  ClipmillError,
  FileTooLargeError,
  InvalidRequestError,
  NotFoundError,
  type ErrorResponse,
} from 'clipmill';

export interface ErrorHandlerOptions {
  maxFileSize: number;
  maxFiles: number;
  logPrefix?: string;
}

export function toClipmillError(error: unknown, options: ErrorHandlerOptions): ClipmillError {
  if (error instanceof ClipmillError) return error;

  if (error instanceof multer.MulterError) {
    switch (error.code) {
      case 'LIMIT_FILE_SIZE':
        return new FileTooLargeError(options.maxFileSize);
      case 'LIMIT_FILE_COUNT':
        return new InvalidRequestError(`At most ${options.maxFiles} files can be uploaded per request`, 'TOO_MANY_INPUTS', {
          max: options.maxFiles,
        });
      case 'LIMIT_UNEXPECTED_FILE':
        return new InvalidRequestError(`Unexpected file field: ${error.field ?? 'unknown'}`, 'UNEXPECTED_FIELD');
      default:
        return new InvalidRequestError(error.message, 'INVALID_UPLOAD');
    }
  }

  return new ClipmillError('Internal server error', 'INTERNAL_ERROR', 500);
}

export function errorBody(error: ClipmillError): ErrorResponse {
  const body: ErrorResponse = { success: false, error: error.message, code: error.code };
  if (error.details) body.details = error.details;
  return body;
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

export function createErrorHandler(options: ErrorHandlerOptions) {
  const prefix = options.logPrefix ?? '[clipmill]';

  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const mapped = toClipmillError(error, options);
    if (mapped.statusCode >= 500) {
      // eslint-disable-next-line no-console
      console.error(`${prefix} ${req.method} ${req.path} failed code=${mapped.code}`, error);
    }

    res.status(mapped.statusCode).json(errorBody(mapped));
  };
}
