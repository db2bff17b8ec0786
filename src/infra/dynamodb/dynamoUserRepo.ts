import {
  DeleteItemCommand,
  DescribeTableCommand,
  GetItemCommand,
  ScanCommand,
  TransactWriteItemsCommand,
  UpdateItemCommand,
  type AttributeValue,
  type DynamoDBClient,
} from '@aws-sdk/client-dynamodb';
import { marshall, unmarshall } from '@aws-sdk/util-dynamodb';
import type { Logger } from 'pino';
import { normalizeEmail, type User } from '../../domain/users/user.js';
import {
  ConflictError,
  ErrorKind,
  NotFoundError,
  UnavailableError,
  type PermissionDeniedError,
  type ValidationError,
} from '../../domain/errors.js';
import { type Result, ok, err } from '../../domain/result.js';
import type {
  CallOptions,
  UserFilter,
  UserRepository,
} from '../../application/ports/userRepository.js';
import { asUnavailable, isConditionFailure, translateDynamoError } from './errors.js';
import {
  USER_ENTITY,
  emailGuardKey,
  fromUserItem,
  guardOwner,
  toEmailGuardItem,
  toUserItem,
} from './userItem.js';

export interface DynamoUserRepositoryConfig {
  client: DynamoDBClient;
  tableName: string;
  logger: Logger;
}

/**
 * User repository on a single DynamoDB table keyed by `id`.
 *
 * Email uniqueness: every user is written together with an email guard
 * item (`id = email#<email>`) in one transaction, both puts conditioned
 * on `attribute_not_exists(id)`.
 */
export class DynamoUserRepository implements UserRepository {
  private readonly client: DynamoDBClient;
  private readonly tableName: string;
  private readonly logger: Logger;

  constructor(config: DynamoUserRepositoryConfig) {
    this.client = config.client;
    this.tableName = config.tableName;
    this.logger = config.logger;
  }

  async create(
    user: User,
    options?: CallOptions
  ): Promise<Result<User, ConflictError | ValidationError | UnavailableError>> {
    try {
      await this.client.send(
        new TransactWriteItemsCommand({
          TransactItems: [
            {
              Put: {
                TableName: this.tableName,
                Item: marshall(toUserItem(user)),
                ConditionExpression: 'attribute_not_exists(id)',
              },
            },
            {
              Put: {
                TableName: this.tableName,
                Item: marshall(toEmailGuardItem(user)),
                ConditionExpression: 'attribute_not_exists(id)',
              },
            },
          ],
        }),
        { abortSignal: options?.signal }
      );
    } catch (error: unknown) {
      const failure = translateDynamoError(error, 'create');
      if (failure.kind === ErrorKind.Conflict) {
        return err(new ConflictError('User with this email already exists', { field: 'email' }));
      }
      if (failure.kind === ErrorKind.Validation) {
        return err(failure);
      }
      return err(asUnavailable(failure));
    }

    this.logger.debug({ userId: user.id }, 'User item written');
    return ok(user);
  }

  async getById(id: string, options?: CallOptions): Promise<Result<User, NotFoundError | UnavailableError>> {
    let item: Record<string, AttributeValue> | undefined;
    try {
      const response = await this.client.send(
        new GetItemCommand({
          TableName: this.tableName,
          Key: marshall({ id }),
          ConsistentRead: true,
        }),
        { abortSignal: options?.signal }
      );
      item = response.Item;
    } catch (error: unknown) {
      return err(asUnavailable(translateDynamoError(error, 'getById')));
    }

    if (!item) {
      return err(notFound(id));
    }
    const user = fromUserItem(unmarshall(item));
    return user ? ok(user) : err(notFound(id));
  }

  /**
   * Two reads: the email guard names the owner, then the user item.
   */
  async findByEmail(
    email: string,
    options?: CallOptions
  ): Promise<Result<User, NotFoundError | UnavailableError>> {
    const normalized = normalizeEmail(email);
    let item: Record<string, AttributeValue> | undefined;
    try {
      const response = await this.client.send(
        new GetItemCommand({
          TableName: this.tableName,
          Key: marshall({ id: emailGuardKey(normalized) }),
          ConsistentRead: true,
        }),
        { abortSignal: options?.signal }
      );
      item = response.Item;
    } catch (error: unknown) {
      return err(asUnavailable(translateDynamoError(error, 'findByEmail')));
    }

    const userId = item ? guardOwner(unmarshall(item)) : null;
    if (userId === null) {
      return err(emailNotFound(normalized));
    }

    const user = await this.getById(userId, options);
    if (!user.ok && user.error.kind === ErrorKind.NotFound) {
      return err(emailNotFound(normalized));
    }
    return user;
  }

  async list(filter: UserFilter = {}, options?: CallOptions): Promise<Result<User[], UnavailableError>> {
    const values: Record<string, string | boolean> = { ':entity': USER_ENTITY };
    let filterExpression = 'entityType = :entity';
    if (filter.active !== undefined) {
      filterExpression += ' AND active = :active';
      values[':active'] = filter.active;
    }

    const users: User[] = [];
    let exclusiveStartKey: Record<string, AttributeValue> | undefined;

    try {
      do {
        const response = await this.client.send(
          new ScanCommand({
            TableName: this.tableName,
            FilterExpression: filterExpression,
            ExpressionAttributeValues: marshall(values),
            ExclusiveStartKey: exclusiveStartKey,
          }),
          { abortSignal: options?.signal }
        );

        for (const item of response.Items ?? []) {
          const user = fromUserItem(unmarshall(item));
          if (user) {
            users.push(user);
          } else {
            this.logger.warn({ table: this.tableName }, 'Skipping malformed user item');
          }
        }

        exclusiveStartKey = response.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error: unknown) {
      return err(asUnavailable(translateDynamoError(error, 'list')));
    }

    return ok(users);
  }

  async update(user: User, options?: CallOptions): Promise<Result<User, NotFoundError | UnavailableError>> {
    try {
      const response = await this.client.send(
        new UpdateItemCommand({
          TableName: this.tableName,
          Key: marshall({ id: user.id }),
          UpdateExpression: 'SET #name = :name, active = :active, updatedAt = :updatedAt',
          ConditionExpression: 'attribute_exists(id) AND entityType = :entity',
          ExpressionAttributeNames: { '#name': 'name' },
          ExpressionAttributeValues: marshall({
            ':name': user.name,
            ':active': user.active,
            ':updatedAt': user.updatedAt.toISOString(),
            ':entity': USER_ENTITY,
          }),
          ReturnValues: 'ALL_NEW',
        }),
        { abortSignal: options?.signal }
      );

      const updated = response.Attributes ? fromUserItem(unmarshall(response.Attributes)) : null;
      if (!updated) {
        return err(new UnavailableError('DynamoDB update returned a malformed item', { id: user.id }));
      }
      return ok(updated);
    } catch (error: unknown) {
      if (isConditionFailure(error)) {
        return err(notFound(user.id));
      }
      return err(asUnavailable(translateDynamoError(error, 'update')));
    }
  }

  async delete(id: string, options?: CallOptions): Promise<Result<void, NotFoundError | UnavailableError>> {
    const existing = await this.getById(id, options);
    if (!existing.ok) {
      return existing;
    }

    try {
      await this.client.send(
        new TransactWriteItemsCommand({
          TransactItems: [
            {
              Delete: {
                TableName: this.tableName,
                Key: marshall({ id }),
                ConditionExpression: 'attribute_exists(id)',
              },
            },
            {
              Delete: {
                TableName: this.tableName,
                Key: marshall({ id: emailGuardKey(existing.value.email) }),
              },
            },
          ],
        }),
        { abortSignal: options?.signal }
      );
    } catch (error: unknown) {
      // Lost a race with another delete
      if (isConditionFailure(error)) {
        return err(notFound(id));
      }
      return err(asUnavailable(translateDynamoError(error, 'delete')));
    }

    return ok(undefined);
  }

  async ping(options?: CallOptions): Promise<Result<void, UnavailableError | PermissionDeniedError>> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }), {
        abortSignal: options?.signal,
      });
      return ok(undefined);
    } catch (error: unknown) {
      const failure = translateDynamoError(error, 'ping');
      if (failure.kind === ErrorKind.PermissionDenied) {
        return err(failure);
      }
      return err(asUnavailable(failure));
    }
  }

  close(): void {
    this.client.destroy();
  }
}

function notFound(id: string): NotFoundError {
  return new NotFoundError(`User with ID ${id} not found`, { id });
}

function emailNotFound(email: string): NotFoundError {
  return new NotFoundError(`User with email ${email} not found`, { email });
}
