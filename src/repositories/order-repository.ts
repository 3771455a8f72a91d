import { GetCommand, UpdateCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  buildPaginatedResponse,
  nextSequenceValue,
  errorName,
} from '../utils/dynamodb-client';
import { UnitOfWork, TransactionConflictError } from '../utils/unit-of-work';
import { ConcurrentModificationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { CartRepository } from './cart-repository';
import { OrderEventRepository } from './order-event-repository';
import {
  Order,
  NewOrder,
  CartLine,
  OrderStatus,
  OrderEventType,
  OrderStore,
  PaymentEvidenceUpdate,
  DynamoDBOrderItem,
  PaginatedResult,
  QueryOptions,
} from '../types';

export const ORDER_SEQUENCE = 'orders';
export const USER_ORDERS_INDEX = 'userId-orderId-index';
export const RECENT_ORDERS_INDEX = 'recordType-orderId-index';

function toOrder(item: DynamoDBOrderItem): Order {
  const { PK, recordType, ...order } = item;
  return order;
}

export class OrderRepository implements OrderStore {
  constructor(
    private readonly carts: CartRepository = new CartRepository(),
    private readonly events: OrderEventRepository = new OrderEventRepository(),
    private readonly tableName: string = getTableName('ORDERS_TABLE_NAME'),
    private readonly sequenceTableName: string = getTableName('SEQUENCES_TABLE_NAME')
  ) {}

  /**
   * Write the order, its ORDER_PLACED event and the cart deletions as one transaction
   */
  async placeOrder(draft: NewOrder, consumedLines: CartLine[]): Promise<Order> {
    const orderId = await nextSequenceValue(this.sequenceTableName, ORDER_SEQUENCE);
    const now = getCurrentTimestamp();
    const order: Order = {
      ...draft,
      orderId,
      createdAt: now,
      updatedAt: now,
    };

    const item: DynamoDBOrderItem = {
      PK: orderId,
      recordType: 'ORDER',
      ...order,
    };

    const uow = new UnitOfWork();
    uow.put(this.tableName, { ...item }, 'attribute_not_exists(PK)');
    this.events.stageAppend(
      uow,
      orderId,
      OrderEventType.ORDER_PLACED,
      {
        status: order.status,
        totalAmount: order.totalAmount,
        itemCount: order.items.length,
      },
      order.userId
    );
    const firstLineIndex = uow.size;
    consumedLines.forEach((line) => this.carts.stageConsume(uow, line));

    try {
      await uow.commit();
    } catch (error) {
      if (error instanceof TransactionConflictError) {
        const cartChanged = consumedLines.some((_, index) => error.failedAt(firstLineIndex + index));
        throw new ConcurrentModificationError(
          cartChanged ? 'Cart changed during checkout' : `Order ${orderId} could not be written`,
          { orderId, userId: draft.userId, reasons: error.reasons }
        );
      }
      throw error;
    }

    logger.debug('Order written', { orderId, lines: consumedLines.length });
    return order;
  }

  async getById(orderId: number): Promise<Order | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: orderId },
          ConsistentRead: true,
        })
      );

      if (!response.Item) {
        return null;
      }

      return toOrder(response.Item as DynamoDBOrderItem);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get orders by user, newest first
   */
  async getByUserId(
    userId: number,
    options: QueryOptions = {}
  ): Promise<PaginatedResult<Order>> {
    try {
      const response = await dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: USER_ORDERS_INDEX,
          KeyConditionExpression: 'userId = :userId',
          ExpressionAttributeValues: {
            ':userId': userId,
          },
          ScanIndexForward: options.scanIndexForward ?? false,
          Limit: options.limit,
          ExclusiveStartKey: options.lastEvaluatedKey,
        })
      );

      const items = (response.Items || []).map((item) => toOrder(item as DynamoDBOrderItem));

      return buildPaginatedResponse(items, response.LastEvaluatedKey);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Latest orders across all users, newest first
   */
  async getRecent(limit: number): Promise<Order[]> {
    try {
      const response = await dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: RECENT_ORDERS_INDEX,
          KeyConditionExpression: 'recordType = :recordType',
          ExpressionAttributeValues: {
            ':recordType': 'ORDER',
          },
          ScanIndexForward: false,
          Limit: limit,
        })
      );

      return (response.Items || []).map((item) => toOrder(item as DynamoDBOrderItem));
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Single conditional update of the evidence fields. Fallbacks use
   * if_not_exists so they never overwrite evidence that is already there.
   */
  async recordPaymentEvidence(
    orderId: number,
    ownerId: number,
    evidence: PaymentEvidenceUpdate
  ): Promise<Order | null> {
    const setParts = ['updatedAt = :now'];
    const values: Record<string, string | number> = {
      ':now': getCurrentTimestamp(),
      ':owner': ownerId,
    };

    if (evidence.paymentMethod !== undefined) {
      setParts.push('paymentMethod = :method');
      values[':method'] = evidence.paymentMethod;
    } else if (evidence.fallbackPaymentMethod !== undefined) {
      setParts.push('paymentMethod = if_not_exists(paymentMethod, :method)');
      values[':method'] = evidence.fallbackPaymentMethod;
    }

    if (evidence.paymentReference !== undefined) {
      setParts.push('paymentReference = :reference');
      values[':reference'] = evidence.paymentReference;
    } else if (evidence.fallbackPaymentReference !== undefined) {
      setParts.push('paymentReference = if_not_exists(paymentReference, :reference)');
      values[':reference'] = evidence.fallbackPaymentReference;
    }

    if (evidence.paymentProofReference !== undefined) {
      setParts.push('paymentProofReference = :proof');
      values[':proof'] = evidence.paymentProofReference;
    }

    try {
      const response = await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: orderId },
            UpdateExpression: `SET ${setParts.join(', ')}`,
            ExpressionAttributeValues: values,
            ConditionExpression: 'attribute_exists(PK) AND userId = :owner',
            ReturnValues: 'ALL_NEW',
          })
        )
      );

      return toOrder(response.Attributes as DynamoDBOrderItem);
    } catch (error) {
      if (errorName(error) === 'ConditionalCheckFailedException') {
        return null;
      }
      return handleDynamoDBError(error);
    }
  }

  /**
   * Compare-and-set the status and append the STATUS_CHANGED event in one transaction
   */
  async transitionStatus(current: Order, next: OrderStatus, actorId: number): Promise<Order | null> {
    const { orderId, status: expected } = current;
    const now = getCurrentTimestamp();
    const uow = new UnitOfWork();
    const updateIndex = uow.update({
      tableName: this.tableName,
      key: { PK: orderId },
      updateExpression: 'SET #status = :next, updatedAt = :now',
      conditionExpression: 'attribute_exists(PK) AND #status = :expected',
      names: { '#status': 'status' },
      values: {
        ':next': next,
        ':expected': expected,
        ':now': now,
      },
    });
    this.events.stageAppend(uow, orderId, OrderEventType.STATUS_CHANGED, { from: expected, to: next }, actorId);

    try {
      await uow.commit();
    } catch (error) {
      if (error instanceof TransactionConflictError && error.contendedAt(updateIndex)) {
        return null;
      }
      throw error;
    }

    return { ...current, status: next, updatedAt: now };
  }
}
