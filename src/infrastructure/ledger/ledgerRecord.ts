import { z } from 'zod';
import { ORDER_CURRENCY, Order, OrderLine } from '../../domain/models.js';

// on-disk shape shared with the orders.json files the voice agent already writes
const storedOrderItemSchema = z.object({
  product_id: z.string(),
  product_name: z.string(),
  quantity: z.number().int().positive(),
  price: z.number().int().nonnegative(),
  item_total: z.number().int().nonnegative(),
  size: z.string().optional(),
});

const storedOrderSchema = z.object({
  id: z.string(),
  items: z.array(storedOrderItemSchema),
  total: z.number().int().nonnegative(),
  currency: z.literal(ORDER_CURRENCY),
  created_at: z.string(),
  status: z.literal('confirmed'),
});

export const storedLedgerSchema = z.array(storedOrderSchema);

export type StoredOrder = z.infer<typeof storedOrderSchema>;
type StoredOrderItem = z.infer<typeof storedOrderItemSchema>;

export function toStoredOrder(order: Order): StoredOrder {
  return {
    id: order.id,
    items: order.lines.map(line => {
      const item: StoredOrderItem = {
        product_id: line.productId,
        product_name: line.productName,
        quantity: line.quantity,
        price: line.unitPrice,
        item_total: line.lineTotal,
      };
      if (line.variant !== undefined) item.size = line.variant;
      return item;
    }),
    total: order.total,
    currency: order.currency,
    created_at: order.createdAt,
    status: order.status,
  };
}

export function fromStoredOrder(stored: StoredOrder): Order {
  return {
    id: stored.id,
    lines: stored.items.map(item => {
      const line: OrderLine = {
        productId: item.product_id,
        productName: item.product_name,
        quantity: item.quantity,
        unitPrice: item.price,
        lineTotal: item.item_total,
      };
      if (item.size !== undefined) line.variant = item.size;
      return line;
    }),
    total: stored.total,
    currency: stored.currency,
    createdAt: stored.created_at,
    status: stored.status,
  };
}
