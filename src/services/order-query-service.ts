import { NotOrderOwnerError, OrderNotFoundError, UnauthorizedError } from '../utils/errors';
import type { OperatorIdentity } from './operator-identity';
import type { Order, OrderEvent, OrderEventStore, OrderStore } from '../types';

export const DEFAULT_USER_ORDER_LIMIT = 20;
export const DEFAULT_RECENT_ORDER_LIMIT = 50;

/**
 * Read side for customers ("my orders") and operators (recent orders, history)
 */
export class OrderQueryService {
  constructor(
    private readonly orders: OrderStore,
    private readonly events: OrderEventStore,
    private readonly operators: OperatorIdentity
  ) {}

  /**
   * Owners and operators may see an order
   */
  async getOrder(orderId: number, requesterId: number): Promise<Order> {
    const order = await this.orders.getById(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    if (order.userId !== requesterId && !this.operators.isOperator(requesterId)) {
      throw new NotOrderOwnerError(orderId, requesterId);
    }
    return order;
  }

  async listOrdersForUser(userId: number, limit: number = DEFAULT_USER_ORDER_LIMIT): Promise<Order[]> {
    const result = await this.orders.getByUserId(userId, { limit });
    return result.items;
  }

  async listRecentOrders(actorId: number, limit: number = DEFAULT_RECENT_ORDER_LIMIT): Promise<Order[]> {
    this.requireOperator(actorId, 'list all orders');
    return this.orders.getRecent(limit);
  }

  async getOrderHistory(orderId: number, actorId: number): Promise<OrderEvent[]> {
    this.requireOperator(actorId, 'read order history');

    const events: OrderEvent[] = [];
    let page = await this.events.getByOrderId(orderId);
    events.push(...page.items);
    while (page.hasMore && page.lastEvaluatedKey) {
      page = await this.events.getByOrderId(orderId, { lastEvaluatedKey: page.lastEvaluatedKey });
      events.push(...page.items);
    }
    return events;
  }

  private requireOperator(actorId: number, action: string): void {
    if (!this.operators.isOperator(actorId)) {
      throw new UnauthorizedError(actorId, action);
    }
  }
}
