import { logger } from '../utils/logger';
import {
  ConcurrentModificationError,
  InvalidTransitionError,
  OrderAlreadyTerminalError,
  OrderNotFoundError,
  UnauthorizedError,
} from '../utils/errors';
import { validateEnum } from '../utils/validators';
import { notifyListeners, type OrderLifecycleListener } from './lifecycle-listeners';
import type { OperatorIdentity } from './operator-identity';
import {
  OrderStatus,
  TransitionMode,
  type OrderStatusChange,
  type OrderStore,
  type StatusTransitionResult,
} from '../types';

/**
 * Fulfillment order used by FORWARD_ONLY mode. CANCELED sits outside it.
 */
export const STATUS_SEQUENCE: readonly OrderStatus[] = [
  OrderStatus.NEW,
  OrderStatus.WAIT_PAYMENT,
  OrderStatus.PAID,
  OrderStatus.PACKING,
  OrderStatus.SHIPPED,
  OrderStatus.DONE,
];

const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set([OrderStatus.DONE, OrderStatus.CANCELED]);

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Whether `from -> to` is legal. PERMISSIVE lets any non-terminal status move
 * anywhere, including backwards (SHIPPED -> WAIT_PAYMENT) so operators can
 * correct out-of-band confirmations. FORWARD_ONLY allows later statuses or CANCELED.
 */
export function canTransition(
  from: OrderStatus,
  to: OrderStatus,
  mode: TransitionMode = TransitionMode.PERMISSIVE
): boolean {
  if (isTerminalStatus(from) || from === to) {
    return false;
  }

  if (mode === TransitionMode.PERMISSIVE || to === OrderStatus.CANCELED) {
    return true;
  }

  return STATUS_SEQUENCE.indexOf(to) > STATUS_SEQUENCE.indexOf(from);
}

/**
 * Statuses an operator may pick next, in display order
 */
export function nextStatuses(from: OrderStatus, mode: TransitionMode = TransitionMode.PERMISSIVE): OrderStatus[] {
  return [...STATUS_SEQUENCE, OrderStatus.CANCELED].filter((to) => canTransition(from, to, mode));
}

/**
 * Parse status text coming from the transport; unknown strings never reach the machine
 */
export function parseOrderStatus(value: string): OrderStatus {
  const normalized = value.trim().toUpperCase();
  validateEnum(normalized, OrderStatus, 'status');
  return normalized;
}

export interface OrderStateMachineOptions {
  mode?: TransitionMode;
  maxAttempts?: number;
}

/**
 * Order State Machine
 * Operator-driven status changes, linearizable per order via compare-and-set
 */
export class OrderStateMachine {
  private readonly mode: TransitionMode;
  private readonly maxAttempts: number;

  constructor(
    private readonly orders: OrderStore,
    private readonly operators: OperatorIdentity,
    private readonly listeners: readonly OrderLifecycleListener[] = [],
    options: OrderStateMachineOptions = {}
  ) {
    this.mode = options.mode ?? TransitionMode.PERMISSIVE;
    this.maxAttempts = options.maxAttempts ?? 3;
  }

  get transitionMode(): TransitionMode {
    return this.mode;
  }

  async setStatus(orderId: number, newStatus: OrderStatus, actorId: number): Promise<StatusTransitionResult> {
    if (!this.operators.isOperator(actorId)) {
      logger.warn('Rejected status change from non-operator', { orderId, actorId, newStatus });
      throw new UnauthorizedError(actorId, 'change order status');
    }

    const orderLogger = logger.child({ orderId, actorId });

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const current = await this.orders.getById(orderId);
      if (!current) {
        throw new OrderNotFoundError(orderId);
      }

      if (isTerminalStatus(current.status)) {
        orderLogger.warn('Rejected status change on terminal order', { status: current.status, newStatus });
        throw new OrderAlreadyTerminalError(orderId, current.status);
      }

      if (current.status === newStatus) {
        return { order: current, previousStatus: current.status, changed: false };
      }

      if (!canTransition(current.status, newStatus, this.mode)) {
        throw new InvalidTransitionError(orderId, current.status, newStatus);
      }

      const updated = await this.orders.transitionStatus(current, newStatus, actorId);
      if (!updated) {
        orderLogger.warn('Status changed concurrently, retrying', { expected: current.status, attempt });
        continue;
      }

      orderLogger.info('Order status changed', { from: current.status, to: newStatus });

      const change: OrderStatusChange = {
        orderId,
        userId: updated.userId,
        oldStatus: current.status,
        newStatus,
        changedBy: actorId,
        changedAt: updated.updatedAt,
      };
      await notifyListeners(this.listeners, 'statusChanged', orderId, (listener) =>
        listener.onStatusChanged?.(change)
      );

      return { order: updated, previousStatus: current.status, changed: true };
    }

    throw new ConcurrentModificationError(
      `Order ${orderId} kept changing; gave up after ${this.maxAttempts} attempts`,
      { orderId, newStatus }
    );
  }
}
