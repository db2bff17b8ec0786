/**
 * Error taxonomy shared by every port.
 * Adapters translate backend-native failures into one of these kinds.
 */
export const ErrorKind = {
  Validation: 'VALIDATION',
  Conflict: 'CONFLICT',
  NotFound: 'NOT_FOUND',
  Unavailable: 'UNAVAILABLE',
  PermissionDenied: 'PERMISSION_DENIED',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export abstract class DomainError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends DomainError {
  readonly kind = ErrorKind.Validation;

  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super(message, details);
  }
}

export class ConflictError extends DomainError {
  readonly kind = ErrorKind.Conflict;

  constructor(message = 'Conflict', details?: Record<string, unknown>) {
    super(message, details);
  }
}

export class NotFoundError extends DomainError {
  readonly kind = ErrorKind.NotFound;

  constructor(message = 'Resource not found', details?: Record<string, unknown>) {
    super(message, details);
  }
}

/**
 * Transient backend or network failure. Callers may retry.
 */
export class UnavailableError extends DomainError {
  readonly kind = ErrorKind.Unavailable;

  constructor(message = 'Backend unavailable', details?: Record<string, unknown>) {
    super(message, details);
  }
}

export class PermissionDeniedError extends DomainError {
  readonly kind = ErrorKind.PermissionDenied;

  constructor(message = 'Permission denied', details?: Record<string, unknown>) {
    super(message, details);
  }
}

export type AppError =
  | ValidationError
  | ConflictError
  | NotFoundError
  | UnavailableError
  | PermissionDeniedError;

export function isAppError(value: unknown): value is AppError {
  return value instanceof DomainError;
}
