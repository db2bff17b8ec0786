import type { User } from '../../domain/users/user.js';
import type {
  ConflictError,
  NotFoundError,
  PermissionDeniedError,
  UnavailableError,
  ValidationError,
} from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';

/**
 * Per-call options. `signal` aborts the in-flight backend call.
 */
export interface CallOptions {
  signal?: AbortSignal;
}

export interface UserFilter {
  active?: boolean;
}

/**
 * Persistence port for users. Email uniqueness is enforced by the
 * backing store, so `create` can fail with a conflict.
 */
export interface UserRepository {
  create(
    user: User,
    options?: CallOptions
  ): Promise<Result<User, ConflictError | ValidationError | UnavailableError>>;

  getById(id: string, options?: CallOptions): Promise<Result<User, NotFoundError | UnavailableError>>;

  /** Matches the normalized (trimmed, lowercased) email. */
  findByEmail(
    email: string,
    options?: CallOptions
  ): Promise<Result<User, NotFoundError | UnavailableError>>;

  /** Order is backend-defined and not stable across calls. */
  list(filter?: UserFilter, options?: CallOptions): Promise<Result<User[], UnavailableError>>;

  /** Persists name, active flag and updatedAt. Email is immutable. */
  update(user: User, options?: CallOptions): Promise<Result<User, NotFoundError | UnavailableError>>;

  delete(id: string, options?: CallOptions): Promise<Result<void, NotFoundError | UnavailableError>>;

  ping(options?: CallOptions): Promise<Result<void, UnavailableError | PermissionDeniedError>>;

  /** Release the backend client, if any. */
  close?(): void;
}
