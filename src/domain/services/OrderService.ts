import { CommitResult, ORDER_CURRENCY, Order, OrderLineRequest } from '../models.js';
import { EmptyCartError, ProductNotFoundError } from '../errors/index.js';
import { IPricingStrategy, ResolvedLine } from '../strategies/IPricingStrategy.js';
import { IOrderLedger } from '../../infrastructure/ledger/IOrderLedger.js';
import { normalizeQuantity, normalizeOptionalText } from '../lineItems.js';
import { CatalogService } from './CatalogService.js';
import { CartService } from './CartService.js';
import { Logger, silentLogger } from '../../logger.js';

export function formatOrderId(sequence: number): string {
  return `order-${String(sequence).padStart(4, '0')}`;
}

export interface OrderServiceOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Turns carts and explicit line-item lists into ledger entries.
 *
 * Prices always come from the catalog as it is at commit time. Lines whose
 * product no longer resolves are left out of the order and returned in
 * `droppedLines`.
 */
export class OrderService {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly catalog: CatalogService,
    private readonly ledger: IOrderLedger,
    private readonly pricing: IPricingStrategy,
    private readonly carts: CartService,
    options?: OrderServiceOptions
  ) {
    this.logger = options?.logger ?? silentLogger;
    this.now = options?.now ?? (() => new Date());
  }

  async commit(requests: readonly OrderLineRequest[]): Promise<CommitResult> {
    if (requests.length === 0) throw new EmptyCartError();

    const resolved: ResolvedLine[] = [];
    const droppedLines: OrderLineRequest[] = [];

    for (const request of requests) {
      const quantity = normalizeQuantity(request.quantity);
      try {
        const product = await this.catalog.findByName(request.productName);
        resolved.push({ product, quantity, variant: normalizeOptionalText(request.variant) });
      } catch (err) {
        if (!(err instanceof ProductNotFoundError)) throw err;
        droppedLines.push(request);
      }
    }

    if (droppedLines.length > 0) {
      this.logger.warn(
        { dropped: droppedLines.map(line => line.productName) },
        'order lines dropped, products no longer in catalog'
      );
    }

    if (resolved.length === 0) {
      throw new EmptyCartError('None of the requested products are available any more.');
    }

    const priced = this.pricing.priceLines(resolved);
    const order = await this.ledger.append((ledgerLength): Order => ({
      id: formatOrderId(ledgerLength + 1),
      lines: priced.lines,
      total: priced.total,
      currency: ORDER_CURRENCY,
      createdAt: this.now().toISOString(),
      status: 'confirmed',
    }));

    this.logger.info({ orderId: order.id, total: order.total, lines: order.lines.length }, 'order committed');
    return { order, droppedLines };
  }

  // the cart is emptied only once the order is durably recorded
  async commitCart(cartId: string): Promise<CommitResult> {
    const cart = await this.carts.getCart(cartId);
    if (cart.lines.length === 0) throw new EmptyCartError();

    const result = await this.commit(
      cart.lines.map(({ productName, quantity, variant }) => ({ productName, quantity, variant }))
    );

    try {
      await this.carts.clear(cartId);
    } catch (err) {
      // the order stands; a failed clear must not make the caller retry it
      this.logger.warn({ err, cartId, orderId: result.order.id }, 'order committed but cart could not be cleared');
    }

    return result;
  }

  async listOrders(): Promise<Order[]> {
    return this.ledger.readAll();
  }

  async getLastOrder(): Promise<Order | null> {
    const orders = await this.ledger.readAll();
    return orders.length > 0 ? orders[orders.length - 1] : null;
  }

  async getOrderById(orderId: string): Promise<Order | null> {
    const orders = await this.ledger.readAll();
    return orders.find(order => order.id === orderId) ?? null;
  }
}
