import { ValidationError, type PermissionDeniedError, type UnavailableError } from '../../domain/errors.js';
import { type Result, ok, err } from '../../domain/result.js';
import type { FileStorage, StorageError } from '../../application/ports/fileStorage.js';

export interface StoredObject {
  body: Uint8Array;
  contentType: string;
}

export class MemoryFileStorage implements FileStorage {
  private readonly objects = new Map<string, StoredObject>();

  async put(
    key: string,
    body: Uint8Array,
    contentType: string
  ): Promise<Result<string, StorageError | ValidationError>> {
    if (key.length === 0) {
      return err(new ValidationError('Object key is required', { field: 'key' }));
    }
    this.objects.set(key, { body: Uint8Array.from(body), contentType });
    return ok(`memory://${key}`);
  }

  async exists(key: string): Promise<Result<boolean, UnavailableError | PermissionDeniedError>> {
    return ok(this.objects.has(key));
  }

  async delete(key: string): Promise<Result<void, StorageError>> {
    this.objects.delete(key);
    return ok(undefined);
  }

  async ping(): Promise<Result<void, never>> {
    return ok(undefined);
  }

  /** Read back a stored object. */
  get(key: string): StoredObject | undefined {
    return this.objects.get(key);
  }
}
