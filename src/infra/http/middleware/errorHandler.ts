import type { Request, Response, NextFunction } from 'express';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { ErrorKind, isAppError } from '../../../domain/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface HttpMapping {
  status: number;
  code: string;
}

export function mapErrorKind(kind: ErrorKind): HttpMapping {
  switch (kind) {
    case ErrorKind.Validation:
      return { status: 422, code: 'VALIDATION_ERROR' };
    case ErrorKind.Conflict:
      return { status: 409, code: 'CONFLICT' };
    case ErrorKind.NotFound:
      return { status: 404, code: 'NOT_FOUND' };
    case ErrorKind.Unavailable:
      return { status: 503, code: 'UNAVAILABLE' };
    case ErrorKind.PermissionDenied:
      return { status: 503, code: 'PERMISSION_DENIED' };
    default: {
      const unhandled: never = kind;
      throw new Error(`Unhandled error kind: ${String(unhandled)}`);
    }
  }
}

export function createErrorHandler(logger: Logger) {
  const log = logger.child({ component: 'http' });

  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    // Request schema failures
    if (err instanceof ZodError) {
      log.warn({ method: req.method, path: req.path, issues: err.errors.length }, 'Request validation failed');
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      };
      res.status(422).json(response);
      return;
    }

    if (isAppError(err)) {
      const { status, code } = mapErrorKind(err.kind);
      log.warn({ method: req.method, path: req.path, kind: err.kind, details: err.details }, err.message);
      const response: ErrorResponse = {
        code,
        message: err.message,
        ...(err.details === undefined ? {} : { details: err.details }),
      };
      res.status(status).json(response);
      return;
    }

    log.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
