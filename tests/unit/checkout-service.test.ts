import { CheckoutService, EMPTY_CHECKOUT, validateCheckoutDetails } from '../../src/services/checkout-service';
import { ConcurrentModificationError, InvalidCheckoutDetailsError } from '../../src/utils/errors';
import { OrderEventType, OrderStatus } from '../../src/types';
import {
  CUSTOMER_ID,
  createFailingListener,
  createRecordingListener,
  createStores,
  mockDetails,
  type TestStores,
} from '../fixtures/test-data';

describe('validateCheckoutDetails', () => {
  it('should trim every field', () => {
    expect(
      validateCheckoutDetails({
        customerName: '  Test Customer ',
        phone: ' 0977771234 ',
        address: ' No. 1 ',
        note: '  ',
      })
    ).toEqual({ customerName: 'Test Customer', phone: '0977771234', address: 'No. 1', note: '' });
  });

  it('should reject a blank customer name', () => {
    expect(() => validateCheckoutDetails({ ...mockDetails, customerName: '   ' })).toThrow(
      InvalidCheckoutDetailsError
    );
  });

  it('should require a run of at least 7 digits in the phone', () => {
    expect(() => validateCheckoutDetails({ ...mockDetails, phone: '12-34-56-78' })).toThrow(
      InvalidCheckoutDetailsError
    );
    expect(validateCheckoutDetails({ ...mockDetails, phone: 'call 0912345' }).phone).toBe('call 0912345');
  });
});

describe('CheckoutService', () => {
  let stores: TestStores;
  let service: CheckoutService;
  let teaId: number;
  let cakeId: number;

  beforeEach(async () => {
    stores = createStores();
    service = new CheckoutService(stores.products, stores.carts, stores.orders);
    teaId = (await stores.products.create({ name: 'Tea', price: 1000 })).productId;
    cakeId = (await stores.products.create({ name: 'Cake', price: 500 })).productId;
  });

  it('should freeze the cart into an order awaiting payment and empty the cart', async () => {
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 2);
    await stores.carts.addQuantity(CUSTOMER_ID, cakeId, 1);

    const result = await service.checkout(CUSTOMER_ID, mockDetails);

    expect(result.status).toBe('PLACED');
    expect(result.orderId).toBe(1);
    expect(result.totalAmount).toBe(2500);

    const order = await stores.orders.getById(result.orderId);
    expect(order?.status).toBe(OrderStatus.WAIT_PAYMENT);
    expect(order?.items).toEqual([
      { productId: cakeId, productName: 'Cake', quantity: 1, pricePerUnit: 500, totalPrice: 500 },
      { productId: teaId, productName: 'Tea', quantity: 2, pricePerUnit: 1000, totalPrice: 2000 },
    ]);
    expect(order?.customerName).toBe('Test Customer');
    expect(await stores.carts.listLines(CUSTOMER_ID)).toEqual([]);
  });

  it('should record an ORDER_PLACED history event', async () => {
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 2);

    await service.checkout(CUSTOMER_ID, mockDetails);

    expect(stores.events.events).toHaveLength(1);
    expect(stores.events.events[0].eventType).toBe(OrderEventType.ORDER_PLACED);
    expect(stores.events.events[0].payload).toEqual({
      status: OrderStatus.WAIT_PAYMENT,
      totalAmount: 2000,
      itemCount: 1,
    });
  });

  it('should return the zero result for an empty cart and create nothing', async () => {
    const result = await service.checkout(CUSTOMER_ID, mockDetails);

    expect(result).toEqual(EMPTY_CHECKOUT);
    expect(result).toEqual({ status: 'EMPTY_CART', orderId: 0, totalAmount: 0 });
    expect(stores.orders.orders.size).toBe(0);
  });

  it('should treat a cart whose products have all vanished as empty and leave it alone', async () => {
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 1);
    stores.products.purge(teaId);

    const result = await service.checkout(CUSTOMER_ID, mockDetails);

    expect(result.status).toBe('EMPTY_CART');
    expect(stores.carts.quantityOf(CUSTOMER_ID, teaId)).toBe(1);
  });

  it('should skip vanished products in the order but still consume their lines', async () => {
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 2);
    await stores.carts.addQuantity(CUSTOMER_ID, cakeId, 1);
    stores.products.purge(cakeId);

    const result = await service.checkout(CUSTOMER_ID, mockDetails);

    expect(result.totalAmount).toBe(2000);
    expect(await stores.carts.listLines(CUSTOMER_ID)).toEqual([]);
  });

  it('should not change a placed order when catalog prices change later', async () => {
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 2);
    const result = await service.checkout(CUSTOMER_ID, mockDetails);

    await stores.products.update(teaId, { price: 9999, name: 'Renamed Tea' });

    const order = await stores.orders.getById(result.orderId);
    expect(order?.totalAmount).toBe(2000);
    expect(order?.items[0]).toEqual({
      productId: teaId,
      productName: 'Tea',
      quantity: 2,
      pricePerUnit: 1000,
      totalPrice: 2000,
    });
  });

  it('should leave cart and orders untouched when the transaction fails', async () => {
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 2);
    await stores.carts.addQuantity(CUSTOMER_ID, cakeId, 1);
    stores.orders.failNextPlaceOrder = new Error('store unavailable');

    await expect(service.checkout(CUSTOMER_ID, mockDetails)).rejects.toThrow('store unavailable');

    expect(stores.orders.orders.size).toBe(0);
    expect(stores.carts.quantityOf(CUSTOMER_ID, teaId)).toBe(2);
    expect(stores.carts.quantityOf(CUSTOMER_ID, cakeId)).toBe(1);
  });

  it('should abort when the cart changes between read and write', async () => {
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 2);
    const readLines = stores.carts.listLines.bind(stores.carts);
    jest.spyOn(stores.carts, 'listLines').mockImplementationOnce(async (userId: number) => {
      const lines = await readLines(userId);
      await stores.carts.addQuantity(userId, teaId, 1);
      return lines;
    });

    await expect(service.checkout(CUSTOMER_ID, mockDetails)).rejects.toThrow(ConcurrentModificationError);

    expect(stores.orders.orders.size).toBe(0);
    expect(stores.carts.quantityOf(CUSTOMER_ID, teaId)).toBe(3);
  });

  it('should reject invalid details before touching the cart', async () => {
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 2);

    await expect(service.checkout(CUSTOMER_ID, { ...mockDetails, phone: 'none' })).rejects.toThrow(
      InvalidCheckoutDetailsError
    );
    expect(stores.carts.quantityOf(CUSTOMER_ID, teaId)).toBe(2);
  });

  it('should inform listeners and survive a failing one', async () => {
    const { listener, calls } = createRecordingListener();
    service = new CheckoutService(stores.products, stores.carts, stores.orders, [
      createFailingListener(),
      listener,
    ]);
    await stores.carts.addQuantity(CUSTOMER_ID, teaId, 1);

    const result = await service.checkout(CUSTOMER_ID, mockDetails);

    expect(result.status).toBe('PLACED');
    expect(calls).toEqual([{ event: 'orderPlaced', orderId: result.orderId }]);
  });
});
