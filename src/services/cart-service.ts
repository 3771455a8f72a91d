import { logger } from '../utils/logger';
import { ProductUnavailableError } from '../utils/errors';
import { ValidationError, validatePositiveInteger } from '../utils/validators';
import type { CartLine, CartLineView, CartStore, CartView, Product, ProductStore } from '../types';

// Keeps a checkout (order + event + one delete per line) inside one store transaction
export const MAX_CART_LINES = 50;

/**
 * Join cart lines against the current catalog. Lines whose product record
 * is gone are dropped; inactive products still show at their current price.
 */
export function joinCartLines(lines: CartLine[], products: Product[]): Array<{ line: CartLine; product: Product }> {
  const byId = new Map(products.map((product) => [product.productId, product]));
  return lines
    .flatMap((line) => {
      const product = byId.get(line.productId);
      return product ? [{ line, product }] : [];
    })
    .sort((a, b) => b.line.productId - a.line.productId);
}

export class CartService {
  constructor(
    private readonly products: ProductStore,
    private readonly carts: CartStore
  ) {}

  /**
   * Add `quantity` of an active product, incrementing an existing line
   */
  async add(userId: number, productId: number, quantity: number = 1): Promise<CartLine> {
    validatePositiveInteger(quantity, 'quantity');

    const product = await this.products.getById(productId);
    if (!product || !product.active) {
      logger.warn('Rejected cart add for unavailable product', { userId, productId });
      throw new ProductUnavailableError(productId);
    }

    const lines = await this.carts.listLines(userId);
    const isNewLine = !lines.some((line) => line.productId === productId);
    if (isNewLine && lines.length >= MAX_CART_LINES) {
      throw new ValidationError(`A cart holds at most ${MAX_CART_LINES} products`, 'productId', productId);
    }

    const line = await this.carts.addQuantity(userId, productId, quantity);
    logger.info('Cart line added', { userId, productId, quantity: line.quantity });
    return line;
  }

  async remove(userId: number, productId: number): Promise<void> {
    await this.carts.remove(userId, productId);
    logger.info('Cart line removed', { userId, productId });
  }

  async list(userId: number): Promise<CartLineView[]> {
    const lines = await this.carts.listLines(userId);
    if (lines.length === 0) {
      return [];
    }

    const products = await this.products.getByIds(lines.map((line) => line.productId));
    return joinCartLines(lines, products).map(({ line, product }) => ({
      productId: product.productId,
      name: product.name,
      pricePerUnit: product.price,
      quantity: line.quantity,
      totalPrice: product.price * line.quantity,
    }));
  }

  async total(userId: number): Promise<number> {
    const lines = await this.list(userId);
    return lines.reduce((sum, line) => sum + line.totalPrice, 0);
  }

  async view(userId: number): Promise<CartView> {
    const lines = await this.list(userId);
    return {
      userId,
      lines,
      totalAmount: lines.reduce((sum, line) => sum + line.totalPrice, 0),
    };
  }

  async clear(userId: number): Promise<void> {
    await this.carts.clear(userId);
    logger.info('Cart cleared', { userId });
  }
}
