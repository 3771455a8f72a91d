import type {
  CartLine,
  NewOrder,
  NewProduct,
  Order,
  OrderEvent,
  OrderStatus,
  PaymentEvidenceUpdate,
  Product,
  ProductUpdate,
  QueryOptions,
  PaginatedResult,
} from './index';

/**
 * Store ports. The DynamoDB repositories implement them; tests use in-process fakes.
 * Every mutating method is one transaction boundary.
 */

export interface ProductStore {
  getById(productId: number): Promise<Product | null>;
  getByIds(productIds: number[]): Promise<Product[]>;
  getActiveProducts(): Promise<Product[]>;
  create(product: NewProduct): Promise<Product>;
  /** Resolves to null when the product does not exist. */
  update(productId: number, updates: ProductUpdate): Promise<Product | null>;
}

export interface CartStore {
  addQuantity(userId: number, productId: number, quantity: number): Promise<CartLine>;
  remove(userId: number, productId: number): Promise<void>;
  listLines(userId: number): Promise<CartLine[]>;
  clear(userId: number): Promise<void>;
}

export interface OrderStore {
  /**
   * Writes the order and its ORDER_PLACED event and deletes the consumed cart lines,
   * all or nothing. Throws ConcurrentModificationError if any line changed since it was read.
   */
  placeOrder(order: NewOrder, consumedLines: CartLine[]): Promise<Order>;
  getById(orderId: number): Promise<Order | null>;
  getByUserId(userId: number, options?: QueryOptions): Promise<PaginatedResult<Order>>;
  getRecent(limit: number): Promise<Order[]>;
  /**
   * Applies evidence only while `ownerId` still owns the order.
   * Resolves to null when the order is missing or owned by someone else.
   */
  recordPaymentEvidence(orderId: number, ownerId: number, evidence: PaymentEvidenceUpdate): Promise<Order | null>;
  /**
   * Compare-and-set on status, recorded together with a STATUS_CHANGED event.
   * Resolves to null when the stored status is no longer `current.status`;
   * otherwise to `current` with the new status, without a second read.
   */
  transitionStatus(current: Order, next: OrderStatus, actorId: number): Promise<Order | null>;
}

export interface OrderEventStore {
  getByOrderId(orderId: number, options?: QueryOptions): Promise<PaginatedResult<OrderEvent>>;
}

export interface SettingsStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
}
