import { randomBytes } from 'crypto';
import type { ValidationError } from '../../domain/errors.js';
import { type Result, ok } from '../../domain/result.js';
import type { FileStorage, StorageError } from '../ports/fileStorage.js';
import type { CallOptions } from '../ports/userRepository.js';

export interface ProbeFileResult {
  key: string;
  location: string;
  sizeBytes: number;
  verified: boolean;
}

/**
 * Writes a small text object, checks that the store can see it, then
 * removes it again.
 */
export class UploadProbeFileUseCase {
  constructor(
    private fileStorage: FileStorage,
    private clock: () => Date = () => new Date(),
    private generateSuffix: () => string = () => randomBytes(4).toString('hex')
  ) {}

  async execute(
    options?: CallOptions
  ): Promise<Result<ProbeFileResult, StorageError | ValidationError>> {
    const key = `probes/probe-${this.generateSuffix()}.txt`;
    const body = Buffer.from(`Probe file created at ${this.clock().toISOString()}`, 'utf-8');

    const location = await this.fileStorage.put(key, body, 'text/plain', options);
    if (!location.ok) {
      return location;
    }

    const exists = await this.fileStorage.exists(key, options);
    if (!exists.ok) {
      return exists;
    }

    const removed = await this.fileStorage.delete(key, options);
    if (!removed.ok) {
      return removed;
    }

    return ok({
      key,
      location: location.value,
      sizeBytes: body.byteLength,
      verified: exists.value,
    });
  }
}
