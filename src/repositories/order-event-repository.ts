import { QueryCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  getCurrentTimestamp,
  getTableName,
  buildPaginatedResponse,
  generateId,
} from '../utils/dynamodb-client';
import { UnitOfWork } from '../utils/unit-of-work';
import {
  OrderEvent,
  OrderEventType,
  OrderEventPayload,
  OrderEventStore,
  DynamoDBOrderEventItem,
  PaginatedResult,
  QueryOptions,
} from '../types';

function toOrderEvent(item: DynamoDBOrderEventItem): OrderEvent {
  const { PK, SK, ...event } = item;
  return event;
}

/**
 * Append-only order history. Events are only ever staged into the
 * transaction that makes the change they describe.
 */
export class OrderEventRepository implements OrderEventStore {
  constructor(private readonly tableName: string = getTableName('ORDER_EVENTS_TABLE_NAME')) {}

  stageAppend(
    uow: UnitOfWork,
    orderId: number,
    eventType: OrderEventType,
    payload: OrderEventPayload,
    userId?: number
  ): OrderEvent {
    const timestamp = getCurrentTimestamp();
    const eventId = generateId();

    const event: OrderEvent = {
      eventId,
      orderId,
      eventType,
      timestamp,
      payload,
      ...(userId !== undefined ? { userId } : {}),
    };

    const item: DynamoDBOrderEventItem = {
      PK: orderId,
      SK: `${timestamp}#${eventId}`, // Composite sort key for time-ordered retrieval
      ...event,
    };

    uow.put(this.tableName, { ...item });
    return event;
  }

  /**
   * Get all events for an order (chronological order)
   */
  async getByOrderId(
    orderId: number,
    options: QueryOptions = {}
  ): Promise<PaginatedResult<OrderEvent>> {
    try {
      const response = await dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: 'PK = :orderId',
          ExpressionAttributeValues: {
            ':orderId': orderId,
          },
          ScanIndexForward: options.scanIndexForward ?? true,
          Limit: options.limit,
          ExclusiveStartKey: options.lastEvaluatedKey,
        })
      );

      const items = (response.Items || []).map((item) => toOrderEvent(item as DynamoDBOrderEventItem));

      return buildPaginatedResponse(items, response.LastEvaluatedKey);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
