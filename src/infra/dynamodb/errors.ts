import {
  ConditionalCheckFailedException,
  DynamoDBServiceException,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  ConflictError,
  PermissionDeniedError,
  UnavailableError,
  ValidationError,
} from '../../domain/errors.js';

export type DynamoFailure = ConflictError | ValidationError | UnavailableError | PermissionDeniedError;

const THROTTLING_ERRORS = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
]);

const DENIED_ERRORS = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'InvalidSignatureException',
]);

/**
 * True when a conditional write (plain or inside a transaction) was
 * rejected because its condition did not hold.
 */
export function isConditionFailure(error: unknown): boolean {
  if (error instanceof ConditionalCheckFailedException) {
    return true;
  }
  if (error instanceof TransactionCanceledException) {
    return (error.CancellationReasons ?? []).some(
      (reason) => reason.Code === 'ConditionalCheckFailed'
    );
  }
  return false;
}

/**
 * Map a DynamoDB client failure onto the port error taxonomy.
 */
export function translateDynamoError(error: unknown, operation: string): DynamoFailure {
  if (isConditionFailure(error)) {
    return new ConflictError(`DynamoDB ${operation} rejected: item already exists`);
  }

  if (!(error instanceof Error)) {
    return new UnavailableError(`DynamoDB ${operation} failed`, { cause: String(error) });
  }

  const details = { operation, code: error.name };

  if (error.name === 'AbortError') {
    return new UnavailableError(`DynamoDB ${operation} aborted`, details);
  }
  if (error.name === 'ValidationException') {
    return new ValidationError(error.message, details);
  }
  if (DENIED_ERRORS.has(error.name)) {
    return new PermissionDeniedError(`DynamoDB ${operation} denied: ${error.message}`, details);
  }
  if (THROTTLING_ERRORS.has(error.name)) {
    return new UnavailableError(`DynamoDB ${operation} throttled`, details);
  }
  if (error.name === 'ResourceNotFoundException') {
    return new UnavailableError(`DynamoDB ${operation} failed: table not found`, details);
  }
  if (error instanceof DynamoDBServiceException) {
    return new UnavailableError(`DynamoDB ${operation} failed: ${error.message}`, {
      ...details,
      status: error.$metadata.httpStatusCode,
    });
  }
  return new UnavailableError(`DynamoDB ${operation} failed: ${error.message}`, details);
}

/**
 * Narrow a translated failure to the transient kind, for operations whose
 * contract only admits `UnavailableError`.
 */
export function asUnavailable(failure: DynamoFailure): UnavailableError {
  if (failure instanceof UnavailableError) {
    return failure;
  }
  return new UnavailableError(failure.message, { ...failure.details, kind: failure.kind });
}
