import { S3Client } from '@aws-sdk/client-s3';
import type { AwsConfig } from '../config.js';

export function createS3Client(aws: AwsConfig): S3Client {
  return new S3Client({
    region: aws.region,
    maxAttempts: aws.maxAttempts,
    // Local S3 stand-ins (MinIO, LocalStack) only serve path-style URLs
    ...(aws.endpoint ? { endpoint: aws.endpoint, forcePathStyle: true } : {}),
  });
}
