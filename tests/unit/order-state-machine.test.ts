import {
  OrderStateMachine,
  canTransition,
  isTerminalStatus,
  nextStatuses,
  parseOrderStatus,
} from '../../src/services/order-state-machine';
import {
  ConcurrentModificationError,
  InvalidTransitionError,
  OrderAlreadyTerminalError,
  OrderNotFoundError,
  UnauthorizedError,
} from '../../src/utils/errors';
import { ValidationError } from '../../src/utils/validators';
import { OrderEventType, OrderStatus, TransitionMode, type OrderStatusChange } from '../../src/types';
import type { OrderLifecycleListener } from '../../src/services/lifecycle-listeners';
import {
  CUSTOMER_ID,
  OPERATOR_ID,
  createFailingListener,
  createStores,
  mockOrder,
  type TestStores,
} from '../fixtures/test-data';

describe('transition rules', () => {
  it('should mark DONE and CANCELED as terminal', () => {
    expect(isTerminalStatus(OrderStatus.DONE)).toBe(true);
    expect(isTerminalStatus(OrderStatus.CANCELED)).toBe(true);
    expect(isTerminalStatus(OrderStatus.SHIPPED)).toBe(false);
  });

  it('should allow any move from a non-terminal status in permissive mode', () => {
    expect(canTransition(OrderStatus.SHIPPED, OrderStatus.WAIT_PAYMENT)).toBe(true);
    expect(canTransition(OrderStatus.WAIT_PAYMENT, OrderStatus.PACKING)).toBe(true);
    expect(canTransition(OrderStatus.DONE, OrderStatus.PAID)).toBe(false);
  });

  it('should only allow later statuses or CANCELED in forward-only mode', () => {
    const mode = TransitionMode.FORWARD_ONLY;
    expect(canTransition(OrderStatus.PAID, OrderStatus.SHIPPED, mode)).toBe(true);
    expect(canTransition(OrderStatus.PAID, OrderStatus.CANCELED, mode)).toBe(true);
    expect(canTransition(OrderStatus.SHIPPED, OrderStatus.PAID, mode)).toBe(false);
  });

  it('should list the statuses an operator may pick', () => {
    expect(nextStatuses(OrderStatus.PACKING, TransitionMode.FORWARD_ONLY)).toEqual([
      OrderStatus.SHIPPED,
      OrderStatus.DONE,
      OrderStatus.CANCELED,
    ]);
    expect(nextStatuses(OrderStatus.PAID)).toEqual([
      OrderStatus.NEW,
      OrderStatus.WAIT_PAYMENT,
      OrderStatus.PACKING,
      OrderStatus.SHIPPED,
      OrderStatus.DONE,
      OrderStatus.CANCELED,
    ]);
    expect(nextStatuses(OrderStatus.CANCELED)).toEqual([]);
  });

  it('should parse status text and reject unknown values', () => {
    expect(parseOrderStatus(' shipped ')).toBe(OrderStatus.SHIPPED);
    expect(() => parseOrderStatus('LOST')).toThrow(ValidationError);
  });
});

describe('OrderStateMachine', () => {
  let stores: TestStores;
  let changes: OrderStatusChange[];
  let recorder: OrderLifecycleListener;
  let machine: OrderStateMachine;
  let orderId: number;

  beforeEach(async () => {
    stores = createStores();
    changes = [];
    recorder = {
      name: 'recorder',
      async onStatusChanged(change) {
        changes.push(change);
      },
    };
    machine = new OrderStateMachine(stores.orders, stores.operators, [recorder]);
    const { orderId: id, createdAt, updatedAt, ...newOrder } = mockOrder;
    orderId = (await stores.orders.placeOrder(newOrder, [])).orderId;
  });

  it('should move WAIT_PAYMENT to PACKING and notify with old and new status', async () => {
    const result = await machine.setStatus(orderId, OrderStatus.PACKING, OPERATOR_ID);

    expect(result.changed).toBe(true);
    expect(result.previousStatus).toBe(OrderStatus.WAIT_PAYMENT);
    expect(result.order.status).toBe(OrderStatus.PACKING);
    expect(changes).toEqual([
      {
        orderId,
        userId: CUSTOMER_ID,
        oldStatus: OrderStatus.WAIT_PAYMENT,
        newStatus: OrderStatus.PACKING,
        changedBy: OPERATOR_ID,
        changedAt: result.order.updatedAt,
      },
    ]);
  });

  it('should record a STATUS_CHANGED history event', async () => {
    await machine.setStatus(orderId, OrderStatus.PAID, OPERATOR_ID);

    const history = stores.events.events.filter((event) => event.eventType === OrderEventType.STATUS_CHANGED);
    expect(history).toHaveLength(1);
    expect(history[0].payload).toEqual({ from: OrderStatus.WAIT_PAYMENT, to: OrderStatus.PAID });
    expect(history[0].userId).toBe(OPERATOR_ID);
  });

  it('should reject non-operators and leave the status unchanged', async () => {
    await expect(machine.setStatus(orderId, OrderStatus.PAID, CUSTOMER_ID)).rejects.toThrow(UnauthorizedError);

    expect((await stores.orders.getById(orderId))?.status).toBe(OrderStatus.WAIT_PAYMENT);
    expect(changes).toEqual([]);
  });

  it('should reject unknown orders', async () => {
    await expect(machine.setStatus(999, OrderStatus.PAID, OPERATOR_ID)).rejects.toThrow(OrderNotFoundError);
  });

  it.each([OrderStatus.DONE, OrderStatus.CANCELED])('should refuse any change once %s', async (terminal) => {
    stores.orders.forceStatus(orderId, terminal);

    for (const target of Object.values(OrderStatus)) {
      await expect(machine.setStatus(orderId, target, OPERATOR_ID)).rejects.toThrow(OrderAlreadyTerminalError);
    }
    expect((await stores.orders.getById(orderId))?.status).toBe(terminal);
  });

  it('should treat the current status as a no-op without notifying', async () => {
    const result = await machine.setStatus(orderId, OrderStatus.WAIT_PAYMENT, OPERATOR_ID);

    expect(result.changed).toBe(false);
    expect(result.order.status).toBe(OrderStatus.WAIT_PAYMENT);
    expect(changes).toEqual([]);
    expect(stores.events.events.map((event) => event.eventType)).toEqual([OrderEventType.ORDER_PLACED]);
  });

  it('should allow moving backwards in permissive mode', async () => {
    await machine.setStatus(orderId, OrderStatus.SHIPPED, OPERATOR_ID);
    const result = await machine.setStatus(orderId, OrderStatus.WAIT_PAYMENT, OPERATOR_ID);

    expect(result.order.status).toBe(OrderStatus.WAIT_PAYMENT);
  });

  it('should reject backwards moves in forward-only mode', async () => {
    machine = new OrderStateMachine(stores.orders, stores.operators, [], { mode: TransitionMode.FORWARD_ONLY });
    await machine.setStatus(orderId, OrderStatus.SHIPPED, OPERATOR_ID);

    await expect(machine.setStatus(orderId, OrderStatus.PAID, OPERATOR_ID)).rejects.toThrow(InvalidTransitionError);
    expect((await machine.setStatus(orderId, OrderStatus.CANCELED, OPERATOR_ID)).changed).toBe(true);
  });

  it('should keep the status change when a listener fails', async () => {
    machine = new OrderStateMachine(stores.orders, stores.operators, [createFailingListener(), recorder]);

    const result = await machine.setStatus(orderId, OrderStatus.PAID, OPERATOR_ID);

    expect(result.changed).toBe(true);
    expect((await stores.orders.getById(orderId))?.status).toBe(OrderStatus.PAID);
    expect(changes).toHaveLength(1);
  });

  it('should re-validate after losing a race to another writer', async () => {
    stores.orders.beforeTransition = (id) => {
      stores.orders.beforeTransition = undefined;
      stores.orders.forceStatus(id, OrderStatus.CANCELED);
    };

    await expect(machine.setStatus(orderId, OrderStatus.PAID, OPERATOR_ID)).rejects.toThrow(
      OrderAlreadyTerminalError
    );
    expect(changes).toEqual([]);
  });

  it('should retry the compare-and-set when the status moved to another open status', async () => {
    stores.orders.beforeTransition = (id) => {
      stores.orders.beforeTransition = undefined;
      stores.orders.forceStatus(id, OrderStatus.PAID);
    };

    const result = await machine.setStatus(orderId, OrderStatus.PACKING, OPERATOR_ID);

    expect(result.previousStatus).toBe(OrderStatus.PAID);
    expect(changes[0].oldStatus).toBe(OrderStatus.PAID);
  });

  it('should give up after repeated conflicts', async () => {
    let flip = false;
    stores.orders.beforeTransition = (id) => {
      flip = !flip;
      stores.orders.forceStatus(id, flip ? OrderStatus.PAID : OrderStatus.PACKING);
    };

    await expect(machine.setStatus(orderId, OrderStatus.SHIPPED, OPERATOR_ID)).rejects.toThrow(
      ConcurrentModificationError
    );
    expect(changes).toEqual([]);
  });
});
