import type {
  PermissionDeniedError,
  UnavailableError,
  ValidationError,
} from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';
import type { CallOptions } from './userRepository.js';

export type StorageError = UnavailableError | PermissionDeniedError;

/**
 * Object storage port. Retry policy, if any, belongs to the adapter.
 */
export interface FileStorage {
  /** Store `body` under `key` and return its location. */
  put(
    key: string,
    body: Uint8Array,
    contentType: string,
    options?: CallOptions
  ): Promise<Result<string, StorageError | ValidationError>>;

  /** A missing object is `false`, not an error. */
  exists(key: string, options?: CallOptions): Promise<Result<boolean, StorageError>>;

  /** Removing a missing object succeeds. */
  delete(key: string, options?: CallOptions): Promise<Result<void, StorageError>>;

  ping(options?: CallOptions): Promise<Result<void, StorageError>>;

  close?(): void;
}
