import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { buildTestApp } from './testApp.js';
import { defaultBuilders } from '../../factory/builders.js';
import { MemoryFileStorage } from '../../memory/memoryFileStorage.js';
import { PermissionDeniedError } from '../../../domain/errors.js';
import { err } from '../../../domain/result.js';

describe('POST /api/v1/storage/probe', () => {
  it('should upload a probe file and confirm it', async () => {
    const { app } = buildTestApp();

    const response = await request(app).post('/api/v1/storage/probe');

    expect(response.status).toBe(201);
    expect(response.body.key).toMatch(/^probes\/probe-[0-9a-f]{8}\.txt$/);
    expect(response.body.location).toBe(`memory://${response.body.key}`);
    expect(response.body.verified).toBe(true);
  });

  it('should map denied access to 503 PERMISSION_DENIED', async () => {
    class DeniedStorage extends MemoryFileStorage {
      async put() {
        return err(new PermissionDeniedError('S3 put denied: Access Denied'));
      }
    }
    const { app } = buildTestApp({
      builders: {
        ...defaultBuilders,
        service: { ...defaultBuilders.service, memory: () => new DeniedStorage() },
      },
    });

    const response = await request(app).post('/api/v1/storage/probe');

    expect(response.status).toBe(503);
    expect(response.body).toEqual({
      code: 'PERMISSION_DENIED',
      message: 'S3 put denied: Access Denied',
    });
  });
});
