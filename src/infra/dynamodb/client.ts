import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { AwsConfig } from '../config.js';

export function createDynamoClient(aws: AwsConfig): DynamoDBClient {
  return new DynamoDBClient({
    region: aws.region,
    maxAttempts: aws.maxAttempts,
    ...(aws.endpoint ? { endpoint: aws.endpoint } : {}),
  });
}
