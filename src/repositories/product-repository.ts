import {
  GetCommand,
  PutCommand,
  UpdateCommand,
  ScanCommand,
  BatchGetCommand,
} from '@aws-sdk/lib-dynamodb';
import {
  dynamoClient,
  handleDynamoDBError,
  withRetry,
  getCurrentTimestamp,
  getTableName,
  buildUpdateExpression,
  nextSequenceValue,
  errorName,
} from '../utils/dynamodb-client';
import {
  Product,
  NewProduct,
  ProductUpdate,
  ProductStore,
  DynamoDBProductItem,
  DynamoDBKey,
} from '../types';

export const PRODUCT_SEQUENCE = 'products';

// BatchGetItem accepts at most 100 keys per request
const BATCH_GET_LIMIT = 100;

function toProduct(item: DynamoDBProductItem): Product {
  const { PK, ...product } = item;
  return product;
}

export class ProductRepository implements ProductStore {
  constructor(
    private readonly tableName: string = getTableName('PRODUCTS_TABLE_NAME'),
    private readonly sequenceTableName: string = getTableName('SEQUENCES_TABLE_NAME')
  ) {}

  /**
   * Create a new product under the next id from the sequence table
   */
  async create(product: NewProduct): Promise<Product> {
    const productId = await nextSequenceValue(this.sequenceTableName, PRODUCT_SEQUENCE);
    const now = getCurrentTimestamp();
    const newProduct: Product = {
      productId,
      name: product.name,
      price: product.price,
      description: product.description ?? '',
      ...(product.photoReference ? { photoReference: product.photoReference } : {}),
      active: true,
      createdAt: now,
      updatedAt: now,
    };

    const item: DynamoDBProductItem = {
      PK: productId,
      ...newProduct,
    };

    try {
      await withRetry(() =>
        dynamoClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: item,
            ConditionExpression: 'attribute_not_exists(PK)',
          })
        )
      );

      return newProduct;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async getById(productId: number): Promise<Product | null> {
    try {
      const response = await dynamoClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { PK: productId },
        })
      );

      if (!response.Item) {
        return null;
      }

      return toProduct(response.Item as DynamoDBProductItem);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  /**
   * Get multiple products by IDs; missing ids are left out
   */
  async getByIds(productIds: number[]): Promise<Product[]> {
    const uniqueIds = [...new Set(productIds)];
    const products: Product[] = [];

    try {
      for (let start = 0; start < uniqueIds.length; start += BATCH_GET_LIMIT) {
        let pending: DynamoDBKey[] = uniqueIds
          .slice(start, start + BATCH_GET_LIMIT)
          .map((id) => ({ PK: id }));

        while (pending.length > 0) {
          const response = await withRetry(() =>
            dynamoClient.send(
              new BatchGetCommand({
                RequestItems: {
                  [this.tableName]: {
                    Keys: pending,
                  },
                },
              })
            )
          );

          const items = response.Responses?.[this.tableName] || [];
          products.push(...items.map((item) => toProduct(item as DynamoDBProductItem)));
          pending = response.UnprocessedKeys?.[this.tableName]?.Keys ?? [];
        }
      }

      return products;
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }

  async update(productId: number, updates: ProductUpdate): Promise<Product | null> {
    const { UpdateExpression, ExpressionAttributeNames, ExpressionAttributeValues } =
      buildUpdateExpression({
        ...updates,
        updatedAt: getCurrentTimestamp(),
      });

    try {
      const response = await withRetry(() =>
        dynamoClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { PK: productId },
            UpdateExpression,
            ExpressionAttributeNames,
            ExpressionAttributeValues,
            ConditionExpression: 'attribute_exists(PK)',
            ReturnValues: 'ALL_NEW',
          })
        )
      );

      return toProduct(response.Attributes as DynamoDBProductItem);
    } catch (error) {
      if (errorName(error) === 'ConditionalCheckFailedException') {
        return null;
      }
      return handleDynamoDBError(error);
    }
  }

  /**
   * All active products, newest first. Walks every scan page since the
   * filter is applied after the page limit.
   */
  async getActiveProducts(): Promise<Product[]> {
    const products: Product[] = [];
    let lastEvaluatedKey: DynamoDBKey | undefined;

    try {
      do {
        const response = await dynamoClient.send(
          new ScanCommand({
            TableName: this.tableName,
            FilterExpression: 'active = :active',
            ExpressionAttributeValues: {
              ':active': true,
            },
            ExclusiveStartKey: lastEvaluatedKey,
          })
        );

        products.push(...(response.Items || []).map((item) => toProduct(item as DynamoDBProductItem)));
        lastEvaluatedKey = response.LastEvaluatedKey;
      } while (lastEvaluatedKey);

      return products.sort((a, b) => b.productId - a.productId);
    } catch (error) {
      return handleDynamoDBError(error);
    }
  }
}
