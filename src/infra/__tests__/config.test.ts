import { describe, it, expect } from 'vitest';
import { loadConfig, requireSetting } from '../config.js';
import { ConfigurationError } from '../../application/errors.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      logLevel: 'info',
      backends: {
        repositories: { user: 'dynamodb' },
        services: { fileStorage: 's3' },
      },
      aws: {
        region: 'us-east-1',
        endpoint: undefined,
        dynamoTable: undefined,
        s3Bucket: undefined,
        maxAttempts: 3,
      },
      health: { probeTimeoutMs: 2000 },
    });
  });

  it('should coerce numbers and keep backend strings raw', () => {
    const config = loadConfig({
      PORT: '8080',
      USER_REPOSITORY_BACKEND: 'Memory',
      AWS_ENDPOINT_URL: 'http://localhost:8000',
      AWS_MAX_ATTEMPTS: '5',
      HEALTH_PROBE_TIMEOUT_MS: '750',
    });

    expect(config.port).toBe(8080);
    expect(config.backends.repositories.user).toBe('Memory');
    expect(config.aws.endpoint).toBe('http://localhost:8000');
    expect(config.aws.maxAttempts).toBe(5);
    expect(config.health.probeTimeoutMs).toBe(750);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ AWS_S3_BUCKET: '', AWS_ENDPOINT_URL: '' });

    expect(config.aws.s3Bucket).toBeUndefined();
    expect(config.aws.endpoint).toBeUndefined();
  });

  it('should reject a malformed number', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});

describe('requireSetting', () => {
  it('should return a present value', () => {
    expect(requireSetting('users', 'AWS_DYNAMODB_TABLE', 'dynamodb')).toBe('users');
  });

  it('should name the missing key and backend', () => {
    expect(() => requireSetting(undefined, 'AWS_DYNAMODB_TABLE', 'dynamodb')).toThrow(
      'AWS_DYNAMODB_TABLE is required for the "dynamodb" backend'
    );
  });
});
