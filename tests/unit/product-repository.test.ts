jest.mock('@aws-sdk/lib-dynamodb');
jest.mock('../../src/utils/dynamodb-client', () => ({
  ...jest.requireActual('../../src/utils/dynamodb-client'),
  dynamoClient: {
    send: jest.fn(),
  },
  getCurrentTimestamp: jest.fn(() => '2024-01-01T00:00:00.000Z'),
  nextSequenceValue: jest.fn(),
}));

import { BatchGetCommand, PutCommand, ScanCommand } from '@aws-sdk/lib-dynamodb';
import { ProductRepository } from '../../src/repositories/product-repository';
import { dynamoClient, nextSequenceValue } from '../../src/utils/dynamodb-client';
import { TEST_TIMESTAMP, mockProduct } from '../fixtures/test-data';

const send = dynamoClient.send as jest.Mock;

const stored = (productId: number, extra: Record<string, unknown> = {}) => ({
  PK: productId,
  ...mockProduct,
  productId,
  ...extra,
});

describe('ProductRepository', () => {
  let repository: ProductRepository;

  beforeEach(() => {
    jest.clearAllMocks();
    repository = new ProductRepository('test-products', 'test-sequences');
  });

  describe('create', () => {
    it('should store an active product under the next sequence id', async () => {
      jest.mocked(nextSequenceValue).mockResolvedValue(12);
      send.mockResolvedValue({});

      const product = await repository.create({ name: 'Tea', price: 1500 });

      expect(product).toEqual({
        productId: 12,
        name: 'Tea',
        price: 1500,
        description: '',
        active: true,
        createdAt: TEST_TIMESTAMP,
        updatedAt: TEST_TIMESTAMP,
      });
      expect(nextSequenceValue).toHaveBeenCalledWith('test-sequences', 'products');
      expect(PutCommand).toHaveBeenCalledWith({
        TableName: 'test-products',
        Item: { PK: 12, ...product },
        ConditionExpression: 'attribute_not_exists(PK)',
      });
    });
  });

  describe('getByIds', () => {
    it('should de-duplicate ids and follow unprocessed keys', async () => {
      send
        .mockResolvedValueOnce({
          Responses: { 'test-products': [stored(1)] },
          UnprocessedKeys: { 'test-products': { Keys: [{ PK: 2 }] } },
        })
        .mockResolvedValueOnce({ Responses: { 'test-products': [stored(2)] } });

      const products = await repository.getByIds([1, 2, 1]);

      expect(products.map((product) => product.productId)).toEqual([1, 2]);
      expect(jest.mocked(BatchGetCommand).mock.calls.map(([input]) => input.RequestItems)).toEqual([
        { 'test-products': { Keys: [{ PK: 1 }, { PK: 2 }] } },
        { 'test-products': { Keys: [{ PK: 2 }] } },
      ]);
    });

    it('should send nothing for an empty id list', async () => {
      expect(await repository.getByIds([])).toEqual([]);
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('should return null for a missing product', async () => {
      const error = new Error('The conditional request failed');
      error.name = 'ConditionalCheckFailedException';
      send.mockRejectedValue(error);

      expect(await repository.update(404, { price: 10 })).toBeNull();
    });
  });

  describe('getActiveProducts', () => {
    it('should walk every page and sort newest first', async () => {
      send
        .mockResolvedValueOnce({ Items: [stored(1), stored(3)], LastEvaluatedKey: { PK: 3 } })
        .mockResolvedValueOnce({ Items: [stored(2)] });

      const products = await repository.getActiveProducts();

      expect(products.map((product) => product.productId)).toEqual([3, 2, 1]);
      expect(ScanCommand).toHaveBeenCalledTimes(2);
      expect(jest.mocked(ScanCommand).mock.calls[1][0].ExclusiveStartKey).toEqual({ PK: 3 });
    });
  });
});
