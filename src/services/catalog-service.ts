import { logger } from '../utils/logger';
import { ProductNotFoundError, UnauthorizedError } from '../utils/errors';
import { ValidationError, sanitizeString, validatePrice } from '../utils/validators';
import type { OperatorIdentity } from './operator-identity';
import type { NewProduct, Product, ProductStore, ProductUpdate } from '../types';

function cleanName(name: string): string {
  const cleaned = sanitizeString(name);
  if (cleaned === '') {
    throw new ValidationError('Product name is required', 'name', name);
  }
  return cleaned;
}

/**
 * Catalog reads for everyone, edits for operators only.
 * Products are never physically deleted: old orders still reference them.
 */
export class CatalogService {
  constructor(
    private readonly products: ProductStore,
    private readonly operators: OperatorIdentity
  ) {}

  async getProduct(productId: number): Promise<Product | null> {
    return this.products.getById(productId);
  }

  async listActiveProducts(): Promise<Product[]> {
    return this.products.getActiveProducts();
  }

  async createProduct(actorId: number, input: NewProduct): Promise<Product> {
    this.requireOperator(actorId, 'create products');
    validatePrice(input.price, 'price');

    const product = await this.products.create({
      name: cleanName(input.name),
      price: input.price,
      description: sanitizeString(input.description ?? ''),
      ...(input.photoReference ? { photoReference: input.photoReference } : {}),
    });

    logger.info('Product created', { productId: product.productId, actorId, price: product.price });
    return product;
  }

  async updateProduct(actorId: number, productId: number, updates: ProductUpdate): Promise<Product> {
    this.requireOperator(actorId, 'edit products');

    const changes: ProductUpdate = { ...updates };
    if (updates.name !== undefined) {
      changes.name = cleanName(updates.name);
    }
    if (updates.price !== undefined) {
      validatePrice(updates.price, 'price');
    }
    if (updates.description !== undefined) {
      changes.description = sanitizeString(updates.description);
    }

    const product = await this.products.update(productId, changes);
    if (!product) {
      throw new ProductNotFoundError(productId);
    }

    logger.info('Product updated', { productId, actorId, fields: Object.keys(changes) });
    return product;
  }

  /**
   * Soft delete
   */
  async deactivateProduct(actorId: number, productId: number): Promise<Product> {
    return this.updateProduct(actorId, productId, { active: false });
  }

  private requireOperator(actorId: number, action: string): void {
    if (!this.operators.isOperator(actorId)) {
      logger.warn('Rejected catalog change from non-operator', { actorId, action });
      throw new UnauthorizedError(actorId, action);
    }
  }
}
