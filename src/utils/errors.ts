import { OrderStatus } from '../types';

/**
 * Domain errors returned to the transport layer for user-facing messaging.
 * None of them is fatal; store outages surface as DynamoDBError instead.
 */
export enum CommerceErrorCode {
  PRODUCT_UNAVAILABLE = 'PRODUCT_UNAVAILABLE',
  PRODUCT_NOT_FOUND = 'PRODUCT_NOT_FOUND',
  EMPTY_CART = 'EMPTY_CART',
  INVALID_CHECKOUT_DETAILS = 'INVALID_CHECKOUT_DETAILS',
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  NOT_ORDER_OWNER = 'NOT_ORDER_OWNER',
  UNAUTHORIZED = 'UNAUTHORIZED',
  ORDER_ALREADY_TERMINAL = 'ORDER_ALREADY_TERMINAL',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  CONCURRENT_MODIFICATION = 'CONCURRENT_MODIFICATION',
}

export class CommerceError extends Error {
  constructor(
    message: string,
    public readonly code: CommerceErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CommerceError';
  }
}

export class ProductUnavailableError extends CommerceError {
  constructor(productId: number) {
    super(`Product ${productId} is not available`, CommerceErrorCode.PRODUCT_UNAVAILABLE, { productId });
    this.name = 'ProductUnavailableError';
  }
}

export class ProductNotFoundError extends CommerceError {
  constructor(productId: number) {
    super(`Product ${productId} not found`, CommerceErrorCode.PRODUCT_NOT_FOUND, { productId });
    this.name = 'ProductNotFoundError';
  }
}

export class InvalidCheckoutDetailsError extends CommerceError {
  constructor(public readonly field: 'customerName' | 'phone', message: string) {
    super(message, CommerceErrorCode.INVALID_CHECKOUT_DETAILS, { field });
    this.name = 'InvalidCheckoutDetailsError';
  }
}

export class OrderNotFoundError extends CommerceError {
  constructor(orderId: number) {
    super(`Order ${orderId} not found`, CommerceErrorCode.ORDER_NOT_FOUND, { orderId });
    this.name = 'OrderNotFoundError';
  }
}

export class NotOrderOwnerError extends CommerceError {
  constructor(orderId: number, requesterId: number) {
    super(`User ${requesterId} does not own order ${orderId}`, CommerceErrorCode.NOT_ORDER_OWNER, {
      orderId,
      requesterId,
    });
    this.name = 'NotOrderOwnerError';
  }
}

export class UnauthorizedError extends CommerceError {
  constructor(actorId: number, action: string) {
    super(`User ${actorId} is not allowed to ${action}`, CommerceErrorCode.UNAUTHORIZED, { actorId, action });
    this.name = 'UnauthorizedError';
  }
}

export class OrderAlreadyTerminalError extends CommerceError {
  constructor(orderId: number, status: OrderStatus) {
    super(`Order ${orderId} is already ${status}`, CommerceErrorCode.ORDER_ALREADY_TERMINAL, { orderId, status });
    this.name = 'OrderAlreadyTerminalError';
  }
}

export class InvalidTransitionError extends CommerceError {
  constructor(orderId: number, from: OrderStatus, to: OrderStatus) {
    super(`Order ${orderId} cannot move from ${from} to ${to}`, CommerceErrorCode.INVALID_TRANSITION, {
      orderId,
      from,
      to,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class ConcurrentModificationError extends CommerceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, CommerceErrorCode.CONCURRENT_MODIFICATION, details);
    this.name = 'ConcurrentModificationError';
  }
}

export function isCommerceError(error: unknown): error is CommerceError {
  return error instanceof CommerceError;
}
