import { S3ServiceException } from '@aws-sdk/client-s3';
import { PermissionDeniedError, UnavailableError } from '../../domain/errors.js';
import type { StorageError } from '../../application/ports/fileStorage.js';

const DENIED_ERRORS = new Set([
  'AccessDenied',
  'Forbidden',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AllAccessDisabled',
]);

export function httpStatusOf(error: unknown): number | undefined {
  return error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
}

/**
 * HeadObject reports a missing key as a bare 404 with no error body. The
 * same bare 404 comes back for a missing bucket, so callers still have to
 * check the bucket.
 */
export function isMissingObject(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'NoSuchBucket') {
    return false;
  }
  return error.name === 'NotFound' || error.name === 'NoSuchKey' || httpStatusOf(error) === 404;
}

export function translateS3Error(error: unknown, operation: string): StorageError {
  if (!(error instanceof Error)) {
    return new UnavailableError(`S3 ${operation} failed`, { cause: String(error) });
  }

  const details = { operation, code: error.name, status: httpStatusOf(error) };

  if (DENIED_ERRORS.has(error.name) || details.status === 403) {
    return new PermissionDeniedError(`S3 ${operation} denied: ${error.message}`, details);
  }
  if (error.name === 'AbortError') {
    return new UnavailableError(`S3 ${operation} aborted`, details);
  }
  // HeadBucket has no error body either: its bare 404 is the missing bucket
  if (error.name === 'NoSuchBucket' || (operation === 'ping' && details.status === 404)) {
    return new UnavailableError(`S3 ${operation} failed: bucket not found`, details);
  }
  return new UnavailableError(`S3 ${operation} failed: ${error.message}`, details);
}
