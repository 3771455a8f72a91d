/**
 * Order Status Enum
 * Lifecycle of a storefront order from checkout to fulfillment
 */
export enum OrderStatus {
  NEW = 'NEW',                        // Reserved for flows where the order precedes checkout
  WAIT_PAYMENT = 'WAIT_PAYMENT',      // Placed, waiting for payment evidence to be confirmed
  PAID = 'PAID',                      // Operator confirmed payment
  PACKING = 'PACKING',
  SHIPPED = 'SHIPPED',
  DONE = 'DONE',                      // Terminal
  CANCELED = 'CANCELED',              // Terminal
}

/**
 * How strictly the state machine orders non-terminal transitions
 */
export enum TransitionMode {
  PERMISSIVE = 'PERMISSIVE',          // Any non-terminal status may move to any status
  FORWARD_ONLY = 'FORWARD_ONLY',      // Only later statuses, or CANCELED
}

/**
 * Order Event Types
 * Append-only history kept next to each order
 */
export enum OrderEventType {
  ORDER_PLACED = 'ORDER_PLACED',
  STATUS_CHANGED = 'STATUS_CHANGED',
}

/**
 * Product
 * Catalog entity. Prices are integer minor-currency units.
 */
export interface Product {
  productId: number;
  name: string;
  price: number;
  description: string;
  photoReference?: string;            // Transport-specific file reference
  active: boolean;                    // Soft delete flag
  createdAt: string;
  updatedAt: string;
}

export interface NewProduct {
  name: string;
  price: number;
  description?: string;
  photoReference?: string;
}

export type ProductUpdate = Partial<Pick<Product, 'name' | 'price' | 'description' | 'photoReference' | 'active'>>;

/**
 * Cart Line
 * One product in a user's cart, unique per (userId, productId)
 */
export interface CartLine {
  userId: number;
  productId: number;
  quantity: number;
  addedAt: string;
  updatedAt: string;
}

/**
 * Cart line joined with the current catalog name and price
 */
export interface CartLineView {
  productId: number;
  name: string;
  pricePerUnit: number;
  quantity: number;
  totalPrice: number;
}

export interface CartView {
  userId: number;
  lines: CartLineView[];
  totalAmount: number;
}

/**
 * Order Item
 * Frozen copy of a cart line at checkout time. Never mutated.
 */
export interface OrderItem {
  productId: number;
  productName: string;
  quantity: number;
  pricePerUnit: number;
  totalPrice: number;
}

/**
 * Order
 * Immutable snapshot of a checked-out cart plus mutable payment evidence and status
 */
export interface Order {
  orderId: number;
  userId: number;                     // Chat user that placed the order
  customerName: string;
  phone: string;
  address: string;
  note: string;
  items: OrderItem[];
  totalAmount: number;                // Σ pricePerUnit × quantity, fixed at creation
  status: OrderStatus;
  paymentMethod?: string;
  paymentReference?: string;          // Transaction id or free-text note
  paymentProofReference?: string;     // Screenshot / file reference
  createdAt: string;
  updatedAt: string;
}

export type NewOrder = Omit<Order, 'orderId' | 'createdAt' | 'updatedAt'>;

export interface CheckoutDetails {
  customerName: string;
  phone: string;
  address: string;
  note: string;
}

export type CheckoutResult =
  | { status: 'PLACED'; orderId: number; totalAmount: number; order: Order }
  | { status: 'EMPTY_CART'; orderId: 0; totalAmount: 0 };

/**
 * Evidence fields written by the payment ledger.
 * `fallback*` values only land where the stored field is unset.
 */
export interface PaymentEvidenceUpdate {
  paymentMethod?: string;
  paymentReference?: string;
  paymentProofReference?: string;
  fallbackPaymentMethod?: string;
  fallbackPaymentReference?: string;
}

export type OrderEventPayload = Record<string, string | number | boolean | null>;

/**
 * Order Event
 * History entry written in the same transaction as the change it records
 */
export interface OrderEvent {
  eventId: string;
  orderId: number;
  eventType: OrderEventType;
  timestamp: string;
  payload: OrderEventPayload;
  userId?: number;                    // Actor that caused the event
}

export interface OrderStatusChange {
  orderId: number;
  userId: number;                     // Order owner, the notification recipient
  oldStatus: OrderStatus;
  newStatus: OrderStatus;
  changedBy: number;
  changedAt: string;
}

export type PaymentEvidenceKind = 'REFERENCE' | 'PROOF';

export interface PaymentEvidenceSubmission {
  kind: PaymentEvidenceKind;
  order: Order;
  submittedBy: number;
  submittedAt: string;
}

export interface StatusTransitionResult {
  order: Order;
  previousStatus: OrderStatus;
  changed: boolean;
}

export interface PaymentInstructions {
  methods: string[];
  text: string;
}

/**
 * DynamoDB Item Mapper
 * Stored shapes carry their key attributes next to the entity fields
 */
export interface DynamoDBProductItem extends Product {
  PK: number;                         // productId
}

export interface DynamoDBCartLineItem extends CartLine {
  PK: number;                         // userId
  SK: number;                         // productId
}

export interface DynamoDBOrderItem extends Order {
  PK: number;                         // orderId
  recordType: 'ORDER';                // Constant partition for the recent-orders index
}

export interface DynamoDBOrderEventItem extends OrderEvent {
  PK: number;                         // orderId
  SK: string;                         // timestamp#eventId
}

export interface DynamoDBSettingItem {
  PK: string;                         // setting key
  value: string;
  updatedAt: string;
}

export type DynamoDBKey = Record<string, string | number>;

export interface PaginatedResult<T> {
  items: T[];
  lastEvaluatedKey?: DynamoDBKey;
  hasMore: boolean;
}

/**
 * Query Options
 */
export interface QueryOptions {
  limit?: number;
  lastEvaluatedKey?: DynamoDBKey;
  scanIndexForward?: boolean;
}

export * from './stores';
