import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { OrderService, formatOrderId } from '../src/domain/services/OrderService.js';
import { CatalogUnavailableError, EmptyCartError, PersistenceError } from '../src/domain/errors/index.js';
import { Order } from '../src/domain/models.js';
import { IOrderLedger } from '../src/infrastructure/ledger/IOrderLedger.js';
import { InMemoryOrderLedger } from '../src/infrastructure/ledger/InMemoryOrderLedger.js';
import { TestServices, makeServices } from './fixtures.js';

// ledger whose writes fail until told otherwise
class FlakyLedger implements IOrderLedger {
  failing = true;
  private readonly inner = new InMemoryOrderLedger();

  readAll(): Promise<Order[]> {
    return this.inner.readAll();
  }

  async append(build: (ledgerLength: number) => Order): Promise<Order> {
    if (this.failing) throw new PersistenceError('disk full');
    return this.inner.append(build);
  }
}

describe('formatOrderId', () => {
  it('zero-pads to four digits', () => {
    expect(formatOrderId(1)).toBe('order-0001');
    expect(formatOrderId(42)).toBe('order-0042');
    expect(formatOrderId(12345)).toBe('order-12345');
  });
});

describe('OrderService', () => {
  let services: TestServices;
  let orderService: OrderService;

  beforeEach(() => {
    services = makeServices();
    orderService = services.orders;
  });

  afterEach(() => {
    services.sessions.destroy();
  });

  describe('commit', () => {
    it('creates order-0001 on an empty ledger and order-0002 after it', async () => {
      const first = await orderService.commit([{ productName: 'Black Pullover Hoodie', quantity: 2, variant: 'M' }]);
      const second = await orderService.commit([{ productName: 'Classic White Mug', quantity: 1 }]);

      expect(first.order).toEqual({
        id: 'order-0001',
        lines: [
          {
            productId: 'hoodie-01',
            productName: 'Black Pullover Hoodie',
            quantity: 2,
            unitPrice: 1800,
            lineTotal: 3600,
            variant: 'M',
          },
        ],
        total: 3600,
        currency: 'INR',
        createdAt: '2026-03-14T10:30:00.000Z',
        status: 'confirmed',
      });
      expect(first.droppedLines).toEqual([]);
      expect(second.order.id).toBe('order-0002');
    });

    it('totals every line', async () => {
      const { order } = await orderService.commit([
        { productName: 'Classic White Mug', quantity: 3 },
        { productName: 'Black Baseball Cap', quantity: 2 },
      ]);

      expect(order.lines.map(l => l.lineTotal)).toEqual([1050, 900]);
      expect(order.total).toBe(1950);
    });

    it('rejects an empty request without touching the ledger', async () => {
      await expect(orderService.commit([])).rejects.toThrow(EmptyCartError);
      expect(await services.ledger.readAll()).toEqual([]);
    });

    it('drops lines whose product is gone and reports them', async () => {
      services.catalogStore.remove('cap-01');

      const { order, droppedLines } = await orderService.commit([
        { productName: 'Classic White Mug', quantity: 1 },
        { productName: 'Black Baseball Cap', quantity: 2 },
      ]);

      expect(order.lines.map(l => l.productId)).toEqual(['mug-01']);
      expect(order.total).toBe(350);
      expect(droppedLines).toEqual([{ productName: 'Black Baseball Cap', quantity: 2 }]);
    });

    it('fails with EmptyCartError when nothing resolves', async () => {
      await expect(
        orderService.commit([{ productName: 'Discontinued Scarf', quantity: 1 }])
      ).rejects.toThrow(EmptyCartError);
      expect(await services.ledger.readAll()).toEqual([]);
    });

    it('propagates an unavailable catalog instead of dropping everything', async () => {
      services.catalogStore.unavailable = true;

      await expect(
        orderService.commit([{ productName: 'Classic White Mug', quantity: 1 }])
      ).rejects.toThrow(CatalogUnavailableError);
    });

    it('hands out distinct, increasing ids to concurrent commits', async () => {
      const results = await Promise.all(
        Array.from({ length: 12 }, () => orderService.commit([{ productName: 'Classic White Mug', quantity: 1 }]))
      );

      const ids = results.map(r => r.order.id).sort();
      expect(new Set(ids).size).toBe(12);
      expect(ids[0]).toBe('order-0001');
      expect(ids[11]).toBe('order-0012');

      const ledgerIds = (await services.ledger.readAll()).map(o => o.id);
      expect(ledgerIds).toEqual(ids);
    });
  });

  describe('commitCart', () => {
    it('prices lines at commit time, not at add time', async () => {
      const { cartId } = await services.carts.createCart();
      await services.carts.addLine(cartId, 'Black Pullover Hoodie', 2, 'M');

      services.catalogStore.setPrice('hoodie-01', 2000);
      const { order } = await orderService.commitCart(cartId);

      expect(order.lines[0].unitPrice).toBe(2000);
      expect(order.lines[0].lineTotal).toBe(4000);
      expect(order.total).toBe(4000);
    });

    it('clears the cart after a successful commit', async () => {
      const { cartId } = await services.carts.createCart();
      await services.carts.addLine(cartId, 'Classic White Mug', 1);

      await orderService.commitCart(cartId);

      expect(await services.carts.list(cartId)).toEqual([]);
    });

    it('rejects an empty cart', async () => {
      const { cartId } = await services.carts.createCart();

      await expect(orderService.commitCart(cartId)).rejects.toThrow(EmptyCartError);
      expect(await services.ledger.readAll()).toEqual([]);
    });

    it('keeps the cart when the ledger write fails, so a retry succeeds', async () => {
      const ledger = new FlakyLedger();
      const flaky = makeServices(ledger);
      const { cartId } = await flaky.carts.createCart();
      await flaky.carts.addLine(cartId, 'Classic White Mug', 2);

      await expect(flaky.orders.commitCart(cartId)).rejects.toThrow(PersistenceError);
      expect(await flaky.carts.list(cartId)).toHaveLength(1);

      ledger.failing = false;
      const { order } = await flaky.orders.commitCart(cartId);

      expect(order.id).toBe('order-0001');
      expect(order.total).toBe(700);
      flaky.sessions.destroy();
    });
  });

  describe('lookups', () => {
    it('returns null when there are no orders', async () => {
      expect(await orderService.getLastOrder()).toBeNull();
      expect(await orderService.getOrderById('order-0001')).toBeNull();
    });

    it('finds the last order and orders by id', async () => {
      await orderService.commit([{ productName: 'Classic White Mug', quantity: 1 }]);
      await orderService.commit([{ productName: 'Steel Water Bottle', quantity: 1 }]);

      expect((await orderService.getLastOrder())?.id).toBe('order-0002');
      expect((await orderService.getOrderById('order-0001'))?.total).toBe(350);
      expect(await orderService.getOrderById('order-0003')).toBeNull();
      expect(await orderService.listOrders()).toHaveLength(2);
    });
  });
});
