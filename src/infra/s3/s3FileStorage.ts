import {
  DeleteObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import { ValidationError } from '../../domain/errors.js';
import { type Result, ok, err } from '../../domain/result.js';
import type { FileStorage, StorageError } from '../../application/ports/fileStorage.js';
import type { CallOptions } from '../../application/ports/userRepository.js';
import { isMissingObject, translateS3Error } from './errors.js';

export interface S3FileStorageConfig {
  client: S3Client;
  bucketName: string;
  region: string;
  endpoint?: string;
  logger: Logger;
}

/**
 * Public location of an object: virtual-hosted style on AWS, path style
 * under an endpoint override.
 */
export function objectLocation(
  target: { bucketName: string; region: string; endpoint?: string },
  key: string
): string {
  const path = key.split('/').map(encodeURIComponent).join('/');
  if (target.endpoint) {
    return `${target.endpoint.replace(/\/+$/, '')}/${target.bucketName}/${path}`;
  }
  return `https://${target.bucketName}.s3.${target.region}.amazonaws.com/${path}`;
}

export class S3FileStorage implements FileStorage {
  private readonly client: S3Client;
  private readonly logger: Logger;

  constructor(private readonly config: S3FileStorageConfig) {
    this.client = config.client;
    this.logger = config.logger;
  }

  async put(
    key: string,
    body: Uint8Array,
    contentType: string,
    options?: CallOptions
  ): Promise<Result<string, StorageError | ValidationError>> {
    if (key.length === 0) {
      return err(new ValidationError('Object key is required', { field: 'key' }));
    }

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.config.bucketName,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
        { abortSignal: options?.signal }
      );
    } catch (error: unknown) {
      return err(translateS3Error(error, 'put'));
    }

    const location = objectLocation(this.config, key);
    this.logger.info({ key, location }, 'Object uploaded');
    return ok(location);
  }

  async exists(key: string, options?: CallOptions): Promise<Result<boolean, StorageError>> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.config.bucketName, Key: key }),
        { abortSignal: options?.signal }
      );
      return ok(true);
    } catch (error: unknown) {
      if (!isMissingObject(error)) {
        return err(translateS3Error(error, 'exists'));
      }
    }

    // HeadObject answers a bare 404 for a missing bucket too
    const bucket = await this.ping(options);
    if (!bucket.ok) {
      return bucket;
    }
    return ok(false);
  }

  async delete(key: string, options?: CallOptions): Promise<Result<void, StorageError>> {
    try {
      await this.client.send(
        new DeleteObjectCommand({ Bucket: this.config.bucketName, Key: key }),
        { abortSignal: options?.signal }
      );
    } catch (error: unknown) {
      return err(translateS3Error(error, 'delete'));
    }

    this.logger.info({ key }, 'Object deleted');
    return ok(undefined);
  }

  async ping(options?: CallOptions): Promise<Result<void, StorageError>> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.config.bucketName }), {
        abortSignal: options?.signal,
      });
      return ok(undefined);
    } catch (error: unknown) {
      return err(translateS3Error(error, 'ping'));
    }
  }

  close(): void {
    this.client.destroy();
  }
}
