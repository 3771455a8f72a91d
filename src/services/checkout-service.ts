import { logger } from '../utils/logger';
import { InvalidCheckoutDetailsError } from '../utils/errors';
import { containsDigitRun, sanitizeString } from '../utils/validators';
import { joinCartLines } from './cart-service';
import { notifyListeners, type OrderLifecycleListener } from './lifecycle-listeners';
import {
  OrderStatus,
  type CheckoutDetails,
  type CheckoutResult,
  type CartStore,
  type OrderItem,
  type OrderStore,
  type ProductStore,
} from '../types';

export const MIN_PHONE_DIGITS = 7;

export const EMPTY_CHECKOUT: CheckoutResult = { status: 'EMPTY_CART', orderId: 0, totalAmount: 0 };

/**
 * Re-check of the details the transport already collected. Format is not
 * enforced beyond a non-blank name and a phone with a run of digits.
 */
export function validateCheckoutDetails(details: CheckoutDetails): CheckoutDetails {
  const cleaned: CheckoutDetails = {
    customerName: sanitizeString(details.customerName),
    phone: sanitizeString(details.phone),
    address: sanitizeString(details.address),
    note: sanitizeString(details.note),
  };

  if (cleaned.customerName === '') {
    throw new InvalidCheckoutDetailsError('customerName', 'Customer name is required');
  }

  if (!containsDigitRun(cleaned.phone, MIN_PHONE_DIGITS)) {
    throw new InvalidCheckoutDetailsError(
      'phone',
      `Phone number must contain at least ${MIN_PHONE_DIGITS} digits`
    );
  }

  return cleaned;
}

/**
 * Order Builder
 * Freezes the cart at current catalog prices into an order and clears the cart atomically
 */
export class CheckoutService {
  constructor(
    private readonly products: ProductStore,
    private readonly carts: CartStore,
    private readonly orders: OrderStore,
    private readonly listeners: readonly OrderLifecycleListener[] = []
  ) {}

  async checkout(userId: number, details: CheckoutDetails): Promise<CheckoutResult> {
    const customer = validateCheckoutDetails(details);

    const lines = await this.carts.listLines(userId);
    const products = lines.length > 0 ? await this.products.getByIds(lines.map((line) => line.productId)) : [];
    const joined = joinCartLines(lines, products);

    if (joined.length === 0) {
      logger.info('Checkout on empty cart', { userId });
      return EMPTY_CHECKOUT;
    }

    const items: OrderItem[] = joined.map(({ line, product }) => ({
      productId: product.productId,
      productName: product.name,
      quantity: line.quantity,
      pricePerUnit: product.price,
      totalPrice: product.price * line.quantity,
    }));
    const totalAmount = items.reduce((sum, item) => sum + item.totalPrice, 0);

    // Every line is consumed, including ones whose product vanished, so the cart ends empty
    const order = await this.orders.placeOrder(
      {
        userId,
        ...customer,
        items,
        totalAmount,
        status: OrderStatus.WAIT_PAYMENT,
      },
      lines
    );

    logger.info('Order placed', { orderId: order.orderId, userId, totalAmount, itemCount: items.length });

    await notifyListeners(this.listeners, 'orderPlaced', order.orderId, (listener) =>
      listener.onOrderPlaced?.(order)
    );

    return { status: 'PLACED', orderId: order.orderId, totalAmount, order };
  }
}
