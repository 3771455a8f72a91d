import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { logger } from './logger';
import type { DynamoDBKey, PaginatedResult } from '../types';

/**
 * DynamoDB Client Configuration
 * Singleton so every repository shares one connection pool
 */
class DynamoDBClientManager {
  private static instance: DynamoDBDocumentClient;

  static getClient(): DynamoDBDocumentClient {
    if (!this.instance) {
      const client = new DynamoDBClient({
        region: process.env.AWS_REGION || 'us-east-2',
        ...(process.env.DYNAMODB_ENDPOINT ? { endpoint: process.env.DYNAMODB_ENDPOINT } : {}),
      });

      this.instance = DynamoDBDocumentClient.from(client, {
        marshallOptions: {
          removeUndefinedValues: true,
          convertEmptyValues: false,
        },
        unmarshallOptions: {
          wrapNumbers: false,
        },
      });
    }

    return this.instance;
  }
}

export const dynamoClient = DynamoDBClientManager.getClient();

/**
 * DynamoDB Error
 * `STORE_UNAVAILABLE` and `UNKNOWN_ERROR` are fatal for the current operation
 */
export class DynamoDBError extends Error {
  constructor(
    message: string,
    public code?: string,
    public statusCode?: number
  ) {
    super(message);
    this.name = 'DynamoDBError';
  }

  get fatal(): boolean {
    return this.code === 'STORE_UNAVAILABLE' || this.code === 'UNKNOWN_ERROR';
  }
}

const UNAVAILABLE_ERROR_NAMES = new Set([
  'TimeoutError',
  'NetworkingError',
  'CredentialsProviderError',
  'UnrecognizedClientException',
  'InternalServerError',
  'ServiceUnavailable',
]);

const UNAVAILABLE_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN']);

export function errorName(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.name;
  }
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handle DynamoDB exceptions with better error messages
 */
export function handleDynamoDBError(error: unknown): never {
  if (error instanceof DynamoDBError) {
    throw error;
  }

  const name = errorName(error);
  logger.error('DynamoDB operation failed', error);

  if (name === 'ConditionalCheckFailedException') {
    throw new DynamoDBError(
      'Conditional check failed - item may have been modified',
      'CONDITIONAL_CHECK_FAILED',
      400
    );
  }

  if (name === 'TransactionCanceledException') {
    throw new DynamoDBError('Transaction cancelled', 'TRANSACTION_CANCELED', 409);
  }

  if (name === 'ResourceNotFoundException') {
    throw new DynamoDBError('Resource not found', 'RESOURCE_NOT_FOUND', 404);
  }

  if (name === 'ValidationException') {
    throw new DynamoDBError('Invalid request parameters', 'VALIDATION_ERROR', 400);
  }

  if (name === 'ProvisionedThroughputExceededException') {
    throw new DynamoDBError('Request rate too high - throttled', 'THROTTLED', 429);
  }

  const code = errorCode(error);
  if ((name && UNAVAILABLE_ERROR_NAMES.has(name)) || (code && UNAVAILABLE_ERROR_CODES.has(code))) {
    throw new DynamoDBError(`Store unavailable: ${errorMessage(error)}`, 'STORE_UNAVAILABLE', 503);
  }

  throw new DynamoDBError(errorMessage(error) || 'Unknown DynamoDB error', 'UNKNOWN_ERROR', 500);
}

/**
 * Retry logic for throttled requests
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 100
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (errorName(error) === 'ProvisionedThroughputExceededException' && attempt < maxRetries) {
        const delay = baseDelay * Math.pow(2, attempt);
        await new Promise((resolve) => setTimeout(resolve, delay));
        continue;
      }

      throw error;
    }
  }
}

export function getCurrentTimestamp(): string {
  return new Date().toISOString();
}

export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Next value of an atomic counter. Values start at 1 and are never reused;
 * a failed write after allocation leaves a gap.
 */
export async function nextSequenceValue(tableName: string, sequenceName: string): Promise<number> {
  try {
    const response = await withRetry(() =>
      dynamoClient.send(
        new UpdateCommand({
          TableName: tableName,
          Key: { PK: sequenceName },
          UpdateExpression: 'ADD #value :one',
          ExpressionAttributeNames: { '#value': 'value' },
          ExpressionAttributeValues: { ':one': 1 },
          ReturnValues: 'UPDATED_NEW',
        })
      )
    );

    const value: unknown = response.Attributes?.value;
    if (typeof value !== 'number') {
      throw new DynamoDBError(`Sequence ${sequenceName} returned no value`, 'SEQUENCE_FAILED', 500);
    }
    return value;
  } catch (error) {
    return handleDynamoDBError(error);
  }
}

/**
 * Build update expression from object; undefined values are skipped
 */
export function buildUpdateExpression(updates: Record<string, unknown>): {
  UpdateExpression: string;
  ExpressionAttributeNames: Record<string, string>;
  ExpressionAttributeValues: Record<string, unknown>;
} {
  const attributeNames: Record<string, string> = {};
  const attributeValues: Record<string, unknown> = {};
  const setParts: string[] = [];

  Object.entries(updates)
    .filter(([, value]) => value !== undefined)
    .forEach(([key, value], index) => {
      const nameKey = `#attr${index}`;
      const valueKey = `:val${index}`;

      attributeNames[nameKey] = key;
      attributeValues[valueKey] = value;
      setParts.push(`${nameKey} = ${valueKey}`);
    });

  return {
    UpdateExpression: `SET ${setParts.join(', ')}`,
    ExpressionAttributeNames: attributeNames,
    ExpressionAttributeValues: attributeValues,
  };
}

export function buildPaginatedResponse<T>(
  items: T[],
  lastEvaluatedKey?: DynamoDBKey
): PaginatedResult<T> {
  return {
    items,
    lastEvaluatedKey,
    hasMore: !!lastEvaluatedKey,
  };
}

/**
 * Validate required environment variables
 */
export function validateEnvironment(
  requiredVars: string[],
  env: NodeJS.ProcessEnv = process.env
): void {
  const missing = requiredVars.filter((varName) => !env[varName]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

/**
 * Get table name from environment
 */
export function getTableName(tableEnvVar: string): string {
  const tableName = process.env[tableEnvVar];
  if (!tableName) {
    throw new Error(`Environment variable ${tableEnvVar} is not set`);
  }
  return tableName;
}

export function isDynamoDBError(error: unknown): error is DynamoDBError {
  return error instanceof DynamoDBError;
}
