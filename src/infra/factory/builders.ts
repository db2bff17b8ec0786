import type { Logger } from 'pino';
import type { UserRepository } from '../../application/ports/userRepository.js';
import type { FileStorage } from '../../application/ports/fileStorage.js';
import { type AppConfig, requireSetting } from '../config.js';
import { createDynamoClient } from '../dynamodb/client.js';
import { DynamoUserRepository } from '../dynamodb/dynamoUserRepo.js';
import { createS3Client } from '../s3/client.js';
import { S3FileStorage } from '../s3/s3FileStorage.js';
import { MemoryUserRepository } from '../memory/memoryUserRepo.js';
import { MemoryFileStorage } from '../memory/memoryFileStorage.js';
import { RepositoryBackend, StorageBackend } from './backends.js';

export type AdapterBuilder<T> = (config: AppConfig, logger: Logger) => T | Promise<T>;

/**
 * One builder per backend. Adding a backend to the enumeration without a
 * builder here is a compile error.
 */
export interface AdapterBuilders {
  repository: { [B in RepositoryBackend]: AdapterBuilder<UserRepository> };
  service: { [B in StorageBackend]: AdapterBuilder<FileStorage> };
}

export const defaultBuilders: AdapterBuilders = {
  repository: {
    [RepositoryBackend.DynamoDB]: (config, logger) =>
      new DynamoUserRepository({
        tableName: requireSetting(config.aws.dynamoTable, 'AWS_DYNAMODB_TABLE', RepositoryBackend.DynamoDB),
        client: createDynamoClient(config.aws),
        logger,
      }),
    [RepositoryBackend.Memory]: () => new MemoryUserRepository(),
  },
  service: {
    [StorageBackend.S3]: (config, logger) =>
      new S3FileStorage({
        bucketName: requireSetting(config.aws.s3Bucket, 'AWS_S3_BUCKET', StorageBackend.S3),
        region: config.aws.region,
        endpoint: config.aws.endpoint,
        client: createS3Client(config.aws),
        logger,
      }),
    [StorageBackend.Memory]: () => new MemoryFileStorage(),
  },
};
