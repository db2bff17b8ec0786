import { describe, it, expect } from 'vitest';
import { UploadProbeFileUseCase } from '../uploadProbeFile.js';
import { MemoryFileStorage } from '../../../infra/memory/memoryFileStorage.js';
import { PermissionDeniedError, UnavailableError } from '../../../domain/errors.js';
import { err, ok } from '../../../domain/result.js';
import type { FileStorage } from '../../ports/fileStorage.js';

describe('UploadProbeFileUseCase', () => {
  const clock = () => new Date('2024-07-04T15:30:00.000Z');

  it('should upload a text probe and confirm it exists', async () => {
    // Keeps the object so its content can be checked
    class KeepingStorage extends MemoryFileStorage {
      async delete() {
        return ok(undefined);
      }
    }
    const storage = new KeepingStorage();
    const useCase = new UploadProbeFileUseCase(storage, clock, () => '0a1b2c3d');

    const result = await useCase.execute();

    const content = 'Probe file created at 2024-07-04T15:30:00.000Z';
    expect(result).toEqual({
      ok: true,
      value: {
        key: 'probes/probe-0a1b2c3d.txt',
        location: 'memory://probes/probe-0a1b2c3d.txt',
        sizeBytes: content.length,
        verified: true,
      },
    });
    const stored = storage.get('probes/probe-0a1b2c3d.txt');
    expect(stored?.contentType).toBe('text/plain');
    expect(new TextDecoder().decode(stored?.body)).toBe(content);
  });

  it('should remove the uploaded object once it is verified', async () => {
    const storage = new MemoryFileStorage();
    const useCase = new UploadProbeFileUseCase(storage, clock, () => 'feedbeef');

    const result = await useCase.execute();

    expect(result.ok && result.value.verified).toBe(true);
    expect(storage.get('probes/probe-feedbeef.txt')).toBeUndefined();
  });

  it('should report a failed cleanup', async () => {
    const outage = new UnavailableError('S3 delete failed: socket hang up');
    class StickyStorage extends MemoryFileStorage {
      async delete() {
        return err(outage);
      }
    }

    const result = await new UploadProbeFileUseCase(new StickyStorage(), clock).execute();

    expect(result).toEqual({ ok: false, error: outage });
  });

  it('should generate an 8 character hex suffix by default', async () => {
    const useCase = new UploadProbeFileUseCase(new MemoryFileStorage(), clock);

    const result = await useCase.execute();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.key).toMatch(/^probes\/probe-[0-9a-f]{8}\.txt$/);
  });

  it('should stop at a failed upload', async () => {
    const denied = new PermissionDeniedError('S3 put denied: Access Denied');
    let existsCalls = 0;
    const storage: FileStorage = {
      put: async () => err(denied),
      exists: async () => {
        existsCalls += 1;
        return ok(true);
      },
      delete: async () => ok(undefined),
      ping: async () => ok(undefined),
    };

    const result = await new UploadProbeFileUseCase(storage, clock).execute();

    expect(result).toEqual({ ok: false, error: denied });
    expect(existsCalls).toBe(0);
  });
});
