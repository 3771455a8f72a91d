/**
 * Main export file for the storefront order core
 * Import repositories, services, utilities, and types from here
 */

// Types
export * from './types';

// Configuration
export { loadConfig, TABLE_ENV_VARS, StorefrontConfig, TableKey } from './config';
export { createStorefront, Storefront, StorefrontOptions } from './storefront';

// Utilities
export {
  dynamoClient,
  DynamoDBError,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  generateId,
  nextSequenceValue,
  buildUpdateExpression,
  buildPaginatedResponse,
  validateEnvironment,
  getTableName,
  isDynamoDBError,
} from './utils/dynamodb-client';

export { UnitOfWork, TransactionConflictError, MAX_TRANSACTION_ITEMS } from './utils/unit-of-work';

export {
  logger,
  Logger,
  LogLevel,
  parseLogLevel,
} from './utils/logger';

export {
  CommerceError,
  CommerceErrorCode,
  ProductUnavailableError,
  ProductNotFoundError,
  InvalidCheckoutDetailsError,
  OrderNotFoundError,
  NotOrderOwnerError,
  UnauthorizedError,
  OrderAlreadyTerminalError,
  InvalidTransitionError,
  ConcurrentModificationError,
  isCommerceError,
} from './utils/errors';

export {
  ValidationError,
  validateRequired,
  validatePositiveInteger,
  validatePrice,
  validateEnum,
  containsDigitRun,
  sanitizeString,
} from './utils/validators';

// Repositories
export { ProductRepository } from './repositories/product-repository';
export { CartRepository } from './repositories/cart-repository';
export { OrderRepository } from './repositories/order-repository';
export { OrderEventRepository } from './repositories/order-event-repository';
export { SettingsRepository } from './repositories/settings-repository';

// Services
export { OperatorIdentity, StaticOperatorIdentity, parseOperatorIds } from './services/operator-identity';
export { OrderLifecycleListener, notifyListeners } from './services/lifecycle-listeners';
export { CartService, MAX_CART_LINES } from './services/cart-service';
export { CheckoutService, validateCheckoutDetails, MIN_PHONE_DIGITS } from './services/checkout-service';
export { PaymentLedger, UNKNOWN_PAYMENT_METHOD, PHOTO_PROOF_REFERENCE } from './services/payment-ledger';
export {
  OrderStateMachine,
  OrderStateMachineOptions,
  STATUS_SEQUENCE,
  isTerminalStatus,
  canTransition,
  nextStatuses,
  parseOrderStatus,
} from './services/order-state-machine';
export { OrderQueryService } from './services/order-query-service';
export { CatalogService } from './services/catalog-service';
export { SettingsService, DEFAULT_PAYMENT_METHODS, DEFAULT_PAYMENT_TEXT } from './services/settings-service';
export { EventPublisher, EventPublisherOptions } from './services/event-publisher';
export { NotificationService, Notifier } from './services/notification-service';

/**
 * Usage Example:
 *
 * import { createStorefront, OrderStatus } from 'storefront-order-core';
 *
 * const shop = createStorefront({ notifier: chatNotifier });
 *
 * await shop.cart.add(userId, productId, 2);
 * const result = await shop.checkout.checkout(userId, {
 *   customerName: 'Aye Aye',
 *   phone: '09777712345',
 *   address: 'No. 12, Main Road',
 *   note: '',
 * });
 *
 * if (result.status === 'PLACED') {
 *   await shop.payments.submitPayment(result.orderId, userId, 'KBZPay', 'TXN-0001');
 *   await shop.orderStatus.setStatus(result.orderId, OrderStatus.PAID, operatorId);
 * }
 */
