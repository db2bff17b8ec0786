import { ConfigurationError } from '../../application/errors.js';

/** Entities that have a repository port. */
export const ENTITY_TYPES = ['user'] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

/** External capabilities that have a service port. */
export const SERVICE_TYPES = ['fileStorage'] as const;
export type ServiceType = (typeof SERVICE_TYPES)[number];

export type PortKind = 'repository' | 'service';

export const RepositoryBackend = {
  DynamoDB: 'dynamodb',
  Memory: 'memory',
} as const;

export type RepositoryBackend = (typeof RepositoryBackend)[keyof typeof RepositoryBackend];

export const StorageBackend = {
  S3: 's3',
  Memory: 'memory',
} as const;

export type StorageBackend = (typeof StorageBackend)[keyof typeof StorageBackend];

export function normalizeBackend(value: string): string {
  return value.trim().toLowerCase();
}

export function parseRepositoryBackend(value: string): RepositoryBackend {
  const normalized = normalizeBackend(value);
  const backend = Object.values(RepositoryBackend).find((candidate) => candidate === normalized);
  if (!backend) {
    throw new ConfigurationError(`Unknown repository backend "${value}"`, 'USER_REPOSITORY_BACKEND');
  }
  return backend;
}

export function parseStorageBackend(value: string): StorageBackend {
  const normalized = normalizeBackend(value);
  const backend = Object.values(StorageBackend).find((candidate) => candidate === normalized);
  if (!backend) {
    throw new ConfigurationError(`Unknown storage backend "${value}"`, 'FILE_STORAGE_BACKEND');
  }
  return backend;
}
