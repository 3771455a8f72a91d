import { DeleteCommand, QueryCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
} from '../utils/dynamodb-client';
import { UnitOfWork } from '../utils/unit-of-work';
import { CartLine, CartStore, DynamoDBCartLineItem, DynamoDBKey } from '../types';

function toCartLine(item: DynamoDBCartLineItem): CartLine {
  const { PK, SK, ...line } = item;
  return line;
}

/**
 * Cart lines keyed by (userId, productId). Each call is its own atomic write.
 */
export class CartRepository implements CartStore {
  constructor(private readonly tableName: string = getTableName('CARTS_TABLE_NAME')) {}

  /**
   * Increment the line, creating it on first add
   */
  async addQuantity(userId: number, productId: number, quantity: number): Promise<CartLine> {
    const now = getCurrentTimestamp();

    try {
      const response = await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: userId, SK: productId },
            UpdateExpression:
              'SET userId = :userId, productId = :productId, addedAt = if_not_exists(addedAt, :now), updatedAt = :now ' +
              'ADD quantity :qty',
            ExpressionAttributeValues: {
              ':userId': userId,
              ':productId': productId,
              ':now': now,
              ':qty': quantity,
            },
            ReturnValues: 'ALL_NEW',
          })
        )
      );

      return toCartLine(response.Attributes as DynamoDBCartLineItem);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Remove a line; missing lines are ignored
   */
  async remove(userId: number, productId: number): Promise<void> {
    try {
      await withRetry(() =>
        dynamoClient.send(
          new DeleteCommand({
            TableName: this.tableName,
            Key: { PK: userId, SK: productId },
          })
        )
      );
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async listLines(userId: number): Promise<CartLine[]> {
    const lines: CartLine[] = [];
    let lastEvaluatedKey: DynamoDBKey | undefined;

    try {
      do {
        const response = await dynamoClient.send(
          new QueryCommand({
            TableName: this.tableName,
            KeyConditionExpression: 'PK = :userId',
            ExpressionAttributeValues: {
              ':userId': userId,
            },
            ScanIndexForward: false, // Newest product id first
            ExclusiveStartKey: lastEvaluatedKey,
          })
        );

        lines.push(...(response.Items || []).map((item) => toCartLine(item as DynamoDBCartLineItem)));
        lastEvaluatedKey = response.LastEvaluatedKey;
      } while (lastEvaluatedKey);

      return lines;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Remove every line for the user in one transaction
   */
  async clear(userId: number): Promise<void> {
    const lines = await this.listLines(userId);
    const uow = new UnitOfWork();
    lines.forEach((line) =>
      uow.delete({
        tableName: this.tableName,
        key: { PK: userId, SK: line.productId },
      })
    );
    await uow.commit();
  }

  /**
   * Stage deletion of a line that must still hold the quantity that was read
   */
  stageConsume(uow: UnitOfWork, line: CartLine): number {
    return uow.delete({
      tableName: this.tableName,
      key: { PK: line.userId, SK: line.productId },
      conditionExpression: 'quantity = :qty',
      values: { ':qty': line.quantity },
    });
  }
}
