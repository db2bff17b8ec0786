import { describe, it, expect } from 'vitest';
import { createAdapterProbes } from '../adapterProbes.js';
import { AdapterRegistry } from '../../factory/adapterRegistry.js';
import { HealthAggregator } from '../../../application/health/healthAggregator.js';
import { loadConfig } from '../../config.js';
import { silentLogger } from '../../logger.js';

describe('createAdapterProbes', () => {
  it('should report both memory adapters as reachable', async () => {
    const config = loadConfig({
      USER_REPOSITORY_BACKEND: 'memory',
      FILE_STORAGE_BACKEND: 'memory',
    });
    const registry = new AdapterRegistry(config, { logger: silentLogger() });
    const health = new HealthAggregator(createAdapterProbes(registry), { timeoutMs: 500 });

    const report = await health.check();

    expect(report.status).toBe('healthy');
    expect(report.probes.map((probe) => [probe.name, probe.status])).toEqual([
      ['userRepository', 'reachable'],
      ['fileStorage', 'reachable'],
    ]);
  });

  it('should report a misconfigured adapter as unreachable', async () => {
    const config = loadConfig({
      USER_REPOSITORY_BACKEND: 'memory',
      FILE_STORAGE_BACKEND: 's3',
    });
    const registry = new AdapterRegistry(config, { logger: silentLogger() });
    const health = new HealthAggregator(createAdapterProbes(registry), { timeoutMs: 500 });

    const report = await health.check();

    expect(report.status).toBe('degraded');
    expect(report.probes[1]).toMatchObject({
      name: 'fileStorage',
      status: 'unreachable',
      detail: 'UNAVAILABLE: AWS_S3_BUCKET is required for the "s3" backend',
    });
  });
});
