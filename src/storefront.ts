import { EventBridgeClient } from '@aws-sdk/client-eventbridge';
import { loadConfig, type StorefrontConfig } from './config';
import { logger } from './utils/logger';
import { ProductRepository } from './repositories/product-repository';
import { CartRepository } from './repositories/cart-repository';
import { OrderRepository } from './repositories/order-repository';
import { OrderEventRepository } from './repositories/order-event-repository';
import { SettingsRepository } from './repositories/settings-repository';
import { StaticOperatorIdentity, type OperatorIdentity } from './services/operator-identity';
import type { OrderLifecycleListener } from './services/lifecycle-listeners';
import { EventPublisher } from './services/event-publisher';
import { NotificationService, type Notifier } from './services/notification-service';
import { CartService } from './services/cart-service';
import { CheckoutService } from './services/checkout-service';
import { PaymentLedger } from './services/payment-ledger';
import { OrderStateMachine } from './services/order-state-machine';
import { OrderQueryService } from './services/order-query-service';
import { CatalogService } from './services/catalog-service';
import { SettingsService } from './services/settings-service';

export interface StorefrontOptions {
  config?: StorefrontConfig;
  /** Chat transport; without one no notifications are sent */
  notifier?: Notifier;
  operators?: OperatorIdentity;
  /** Extra listeners, run after the built-in ones */
  listeners?: OrderLifecycleListener[];
  eventBridgeClient?: EventBridgeClient;
}

export interface Storefront {
  config: StorefrontConfig;
  operators: OperatorIdentity;
  catalog: CatalogService;
  cart: CartService;
  checkout: CheckoutService;
  payments: PaymentLedger;
  orderStatus: OrderStateMachine;
  orders: OrderQueryService;
  settings: SettingsService;
}

/**
 * Composition root: DynamoDB repositories, services and listeners wired from config
 */
export function createStorefront(options: StorefrontOptions = {}): Storefront {
  const config = options.config ?? loadConfig();
  logger.setLevel(config.logLevel);

  const { tables } = config;
  const products = new ProductRepository(tables.products, tables.sequences);
  const carts = new CartRepository(tables.carts);
  const events = new OrderEventRepository(tables.orderEvents);
  const orders = new OrderRepository(carts, events, tables.orders, tables.sequences);
  const settings = new SettingsRepository(tables.settings);

  const operators = options.operators ?? new StaticOperatorIdentity(config.operatorIds);

  const listeners: OrderLifecycleListener[] = [];
  if (config.eventBusName) {
    listeners.push(
      new EventPublisher({
        eventBusName: config.eventBusName,
        region: config.region,
        ...(options.eventBridgeClient ? { client: options.eventBridgeClient } : {}),
      })
    );
  }
  if (options.notifier) {
    listeners.push(new NotificationService(options.notifier, operators));
  }
  listeners.push(...(options.listeners ?? []));

  logger.info('Storefront initialized', {
    region: config.region,
    transitionMode: config.transitionMode,
    operators: operators.listOperators().length,
    listeners: listeners.map((listener) => listener.name),
  });

  return {
    config,
    operators,
    catalog: new CatalogService(products, operators),
    cart: new CartService(products, carts),
    checkout: new CheckoutService(products, carts, orders, listeners),
    payments: new PaymentLedger(orders, listeners),
    orderStatus: new OrderStateMachine(orders, operators, listeners, { mode: config.transitionMode }),
    orders: new OrderQueryService(orders, events, operators),
    settings: new SettingsService(settings, operators),
  };
}
