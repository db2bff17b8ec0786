import { z } from 'zod';
import { ConfigurationError } from '../application/errors.js';
import type { EntityType, ServiceType } from './factory/backends.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Blank values in .env count as unset
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);
const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional());
const optionalUrl = z.preprocess(blankToUndefined, z.string().url().optional());

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  USER_REPOSITORY_BACKEND: z.string().default('dynamodb'),
  FILE_STORAGE_BACKEND: z.string().default('s3'),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  AWS_ENDPOINT_URL: optionalUrl,
  AWS_DYNAMODB_TABLE: optionalString,
  AWS_S3_BUCKET: optionalString,
  AWS_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  HEALTH_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
});

export interface AwsConfig {
  region: string;
  endpoint?: string;
  dynamoTable?: string;
  s3Bucket?: string;
  maxAttempts: number;
}

/**
 * Flat runtime configuration. Backend selectors stay raw strings; the
 * adapter registry decides whether they name a known backend.
 */
export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  backends: {
    repositories: Record<EntityType, string>;
    services: Record<ServiceType, string>;
  };
  aws: AwsConfig;
  health: {
    probeTimeoutMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    backends: {
      repositories: { user: vars.USER_REPOSITORY_BACKEND },
      services: { fileStorage: vars.FILE_STORAGE_BACKEND },
    },
    aws: {
      region: vars.AWS_REGION,
      endpoint: vars.AWS_ENDPOINT_URL,
      dynamoTable: vars.AWS_DYNAMODB_TABLE,
      s3Bucket: vars.AWS_S3_BUCKET,
      maxAttempts: vars.AWS_MAX_ATTEMPTS,
    },
    health: {
      probeTimeoutMs: vars.HEALTH_PROBE_TIMEOUT_MS,
    },
  };
}

/**
 * Read a setting a backend cannot run without.
 */
export function requireSetting(value: string | undefined, key: string, backend: string): string {
  if (!value) {
    throw new ConfigurationError(`${key} is required for the "${backend}" backend`, key);
  }
  return value;
}
