import { Order } from '../../domain/models.js';
import { IOrderLedger } from './IOrderLedger.js';
import { WriteQueue } from './WriteQueue.js';

export class InMemoryOrderLedger implements IOrderLedger {
  private orders: Order[] = [];
  private readonly queue = new WriteQueue();

  constructor(initial: readonly Order[] = []) {
    this.orders = structuredClone([...initial]);
  }

  async readAll(): Promise<Order[]> {
    return structuredClone(this.orders);
  }

  append(build: (ledgerLength: number) => Order): Promise<Order> {
    return this.queue.run(async () => {
      const order = build(this.orders.length);
      this.orders = [...this.orders, structuredClone(order)];
      return order;
    });
  }
}
