import { Order } from '../../domain/models.js';

export interface IOrderLedger {
  readAll(): Promise<Order[]>;
  // build runs inside the ledger's critical section with the current ledger length,
  // so ids derived from it are unique; the returned order is persisted before resolving
  append(build: (ledgerLength: number) => Order): Promise<Order>;
}
