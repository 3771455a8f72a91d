import { TransactWriteCommand, type TransactWriteCommandInput } from '@aws-sdk/lib-dynamodb';
import { dynamoClient, handleDynamoDBError, withRetry, errorName, DynamoDBError } from './dynamodb-client';
import { logger } from './logger';

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

export const MAX_TRANSACTION_ITEMS = 100;

/**
 * Thrown when any condition inside a transaction fails. `reasons[i]` is the
 * cancellation code for the i-th staged write ('None' when that write was fine).
 */
export class TransactionConflictError extends Error {
  constructor(public readonly reasons: string[]) {
    super(`Transaction cancelled: ${reasons.join(', ')}`);
    this.name = 'TransactionConflictError';
  }

  failedAt(index: number): boolean {
    return this.reasons[index] === 'ConditionalCheckFailed';
  }

  /** Item lost to a failed condition or to another write in flight on it */
  contendedAt(index: number): boolean {
    return this.failedAt(index) || this.reasons[index] === 'TransactionConflict';
  }
}

function cancellationCodes(error: unknown): string[] {
  if (
    typeof error === 'object' &&
    error !== null &&
    'CancellationReasons' in error &&
    Array.isArray(error.CancellationReasons)
  ) {
    return error.CancellationReasons.map((reason: unknown) =>
      typeof reason === 'object' && reason !== null && 'Code' in reason && typeof reason.Code === 'string'
        ? reason.Code
        : 'None'
    );
  }
  return [];
}

/**
 * Unit of Work
 * Collects writes across tables and commits them as one TransactWriteItems call.
 * Repositories stage into it; the repository method that opened it commits it.
 */
export class UnitOfWork {
  private readonly items: TransactItem[] = [];

  get size(): number {
    return this.items.length;
  }

  put(tableName: string, item: Record<string, unknown>, conditionExpression?: string): number {
    return this.stage({
      Put: {
        TableName: tableName,
        Item: item,
        ...(conditionExpression ? { ConditionExpression: conditionExpression } : {}),
      },
    });
  }

  update(params: {
    tableName: string;
    key: Record<string, string | number>;
    updateExpression: string;
    conditionExpression?: string;
    names?: Record<string, string>;
    values?: Record<string, unknown>;
  }): number {
    return this.stage({
      Update: {
        TableName: params.tableName,
        Key: params.key,
        UpdateExpression: params.updateExpression,
        ...(params.conditionExpression ? { ConditionExpression: params.conditionExpression } : {}),
        ...(params.names && { ExpressionAttributeNames: params.names }),
        ...(params.values && { ExpressionAttributeValues: params.values }),
      },
    });
  }

  delete(params: {
    tableName: string;
    key: Record<string, string | number>;
    conditionExpression?: string;
    names?: Record<string, string>;
    values?: Record<string, unknown>;
  }): number {
    return this.stage({
      Delete: {
        TableName: params.tableName,
        Key: params.key,
        ...(params.conditionExpression ? { ConditionExpression: params.conditionExpression } : {}),
        ...(params.names && { ExpressionAttributeNames: params.names }),
        ...(params.values && { ExpressionAttributeValues: params.values }),
      },
    });
  }

  /**
   * Commit every staged write, all or nothing
   */
  async commit(): Promise<void> {
    if (this.items.length === 0) {
      return;
    }

    if (this.items.length > MAX_TRANSACTION_ITEMS) {
      throw new DynamoDBError(
        `Transaction has ${this.items.length} writes; the limit is ${MAX_TRANSACTION_ITEMS}`,
        'TRANSACTION_TOO_LARGE',
        400
      );
    }

    try {
      await withRetry(() =>
        dynamoClient.send(
          new TransactWriteCommand({
            TransactItems: this.items,
          })
        )
      );
    } catch (error) {
      if (errorName(error) === 'TransactionCanceledException') {
        const reasons = cancellationCodes(error);
        logger.warn('Transaction cancelled', { reasons });
        throw new TransactionConflictError(reasons);
      }
      return handleDynamoDBError(error);
    }
  }

  private stage(item: TransactItem): number {
    this.items.push(item);
    return this.items.length - 1;
  }
}
