import { CartLine, Order, OrderLine, OrderLineRequest, Product } from '../domain/models.js';
import {
  CartExpiredError,
  CartLineNotFoundError,
  CatalogUnavailableError,
  DomainError,
  EmptyCartError,
  ProductNotFoundError,
  ResourceNotFoundError,
  ValidationError,
} from '../domain/errors/index.js';
import { CatalogService, parseCategory } from '../domain/services/CatalogService.js';
import { CartService } from '../domain/services/CartService.js';
import { OrderService } from '../domain/services/OrderService.js';
import { normalizeOptionalText } from '../domain/lineItems.js';
import { Logger, silentLogger } from '../logger.js';

export const ASSISTANT_TOOLS = [
  'browse_catalog',
  'add_to_cart',
  'remove_from_cart',
  'show_cart',
  'place_order',
  'view_last_order',
  'view_order',
] as const;

export type AssistantTool = (typeof ASSISTANT_TOOLS)[number];

// flat argument bag as sent by the language model; unused fields are blank or 0
export interface AssistantToolArgs {
  category?: string;
  maxPrice?: number;
  color?: string;
  keyword?: string;
  productName?: string;
  quantity?: number;
  size?: string;
  orderId?: string;
}

export interface ShoppingAssistantDeps {
  catalog: CatalogService;
  carts: CartService;
  orders: OrderService;
  logger?: Logger;
}

const MAX_PRODUCTS_SPOKEN = 5;
const CLOTHING = new Set<string>(['tshirt', 'hoodie']);

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatAmount(amount: number): string {
  return `₹${amount}`;
}

function sizeSuffix(variant: string | undefined): string {
  return variant ? ` (size ${variant})` : '';
}

function describeProduct(product: Product, position: number): string {
  const lines = [
    `${position}. ${product.name}`,
    `   Price: ${formatAmount(product.price)}`,
    `   ${product.description}`,
  ];
  if (product.color) lines.push(`   Color: ${product.color}`);
  const sizes = product.attributes.sizes;
  if (CLOTHING.has(product.category) && sizes && sizes.length > 0) {
    lines.push(`   Sizes: ${sizes.join(', ')}`);
  }
  return lines.join('\n');
}

function describeCartLine(line: CartLine, position: number): string {
  return `${position}. ${line.quantity} x ${line.productName}${sizeSuffix(line.variant)} - ${formatAmount(
    line.unitPrice * line.quantity
  )}`;
}

function describeOrderLine(line: OrderLine): string {
  const size = line.variant ? ` in size ${line.variant}` : '';
  return `${line.quantity} ${line.productName}${size} for ${line.lineTotal} rupees`;
}

function describeOrder(order: Order): string {
  return (
    `was placed on ${order.createdAt.slice(0, 10)}. ` +
    `You ordered: ${order.lines.map(describeOrderLine).join(' and ')}. ` +
    `Total amount: ${order.total} rupees. Status: ${order.status}.`
  );
}

function describeDropped(dropped: readonly OrderLineRequest[]): string {
  const names = dropped.map(line => line.productName).join(', ');
  return dropped.length === 1
    ? `Note: ${names} is no longer available and was left out.`
    : `Note: ${names} are no longer available and were left out.`;
}

/**
 * Function tools for the voice pipeline, bound to one conversation's cart.
 *
 * Every tool answers with text meant to be read aloud and never throws:
 * domain errors become clarification prompts, anything else is logged and
 * answered with an apology.
 */
export class ShoppingAssistant {
  private readonly catalog: CatalogService;
  private readonly carts: CartService;
  private readonly orders: OrderService;
  private readonly logger: Logger;

  constructor(
    public readonly cartId: string,
    deps: ShoppingAssistantDeps
  ) {
    this.catalog = deps.catalog;
    this.carts = deps.carts;
    this.orders = deps.orders;
    this.logger = (deps.logger ?? silentLogger).child({ cartId });
  }

  invoke(tool: AssistantTool, args: AssistantToolArgs = {}): Promise<string> {
    switch (tool) {
      case 'browse_catalog':
        return this.browseCatalog(args);
      case 'add_to_cart':
        return this.addToCart(args.productName ?? '', args.quantity ?? 1, args.size ?? '');
      case 'remove_from_cart':
        return this.removeFromCart(args.productName ?? '', args.size ?? '');
      case 'show_cart':
        return this.showCart();
      case 'place_order':
        return this.placeOrder();
      case 'view_last_order':
        return this.viewLastOrder();
      case 'view_order':
        return this.viewOrder(args.orderId ?? '');
    }
  }

  browseCatalog(args: Pick<AssistantToolArgs, 'category' | 'maxPrice' | 'color' | 'keyword'>): Promise<string> {
    return this.respond('browse_catalog', 'Sorry, I had trouble accessing the catalog. Please try again.', async () => {
      const filters = {
        category: parseCategory(args.category),
        maxPrice: args.maxPrice && args.maxPrice > 0 ? args.maxPrice : undefined,
        color: normalizeOptionalText(args.color),
        keyword: normalizeOptionalText(args.keyword),
      };
      this.logger.info({ filters }, 'browsing catalog');

      const { products, loadError } = await this.catalog.query(filters);
      if (loadError) return 'Sorry, I had trouble accessing the catalog. Please try again.';
      if (products.length === 0) {
        return "I couldn't find any products matching those criteria. Would you like to try different filters or browse another category?";
      }

      const spoken = products.slice(0, MAX_PRODUCTS_SPOKEN);
      let reply = `I found ${plural(products.length, 'product')}:\n\n`;
      reply += spoken.map((product, i) => describeProduct(product, i + 1)).join('\n\n');
      if (products.length > spoken.length) {
        reply += `\n\nI have ${products.length - spoken.length} more options. Would you like to hear about them?`;
      }
      return reply;
    });
  }

  addToCart(productName: string, quantity: number, size: string): Promise<string> {
    return this.respond('add_to_cart', "I'm sorry, there was an issue adding that to your cart. Could you try again?", async () => {
      if (!productName.trim()) return 'Which product would you like me to add?';

      const cart = await this.carts.addLine(this.cartId, productName, quantity, size);
      const variant = normalizeOptionalText(size);
      const added = quantity > 0 ? quantity : 1;
      const line = cart.lines.find(l => l.productName === productName && l.variant === variant);
      const unitPrice = line ? line.unitPrice : 0;

      return (
        `Great! I've added ${added} x ${productName}${sizeSuffix(variant)} to your cart for ${formatAmount(unitPrice * added)}. ` +
        `Your cart now has ${plural(cart.lines.length, 'item')}. Would you like to continue shopping or view your cart?`
      );
    });
  }

  removeFromCart(productName: string, size: string): Promise<string> {
    return this.respond('remove_from_cart', "I'm sorry, there was an issue removing that item. Could you try again?", async () => {
      const lines = await this.carts.list(this.cartId);
      if (lines.length === 0) return "Your cart is empty. There's nothing to remove.";

      const removed = await this.carts.removeLine(this.cartId, productName, size);
      const remaining = lines.length - 1;
      const tail =
        remaining > 0
          ? `You now have ${plural(remaining, 'item')} remaining in your cart.`
          : 'Your cart is now empty.';
      return `I've removed ${removed.productName}${sizeSuffix(removed.variant)} from your cart. ${tail}`;
    });
  }

  showCart(): Promise<string> {
    return this.respond('show_cart', "I'm sorry, I couldn't retrieve your cart right now.", async () => {
      const cart = await this.carts.getCart(this.cartId);
      if (cart.lines.length === 0) {
        return 'Your cart is empty. Browse our products and add items to get started!';
      }

      return (
        `Your cart has ${plural(cart.lines.length, 'item')}:\n\n` +
        `${cart.lines.map((line, i) => describeCartLine(line, i + 1)).join('\n')}\n\n` +
        `Cart Total: ${formatAmount(cart.estimatedTotal)}\n\n` +
        'Would you like to place your order or continue shopping?'
      );
    });
  }

  placeOrder(): Promise<string> {
    return this.respond(
      'place_order',
      "I'm sorry, there was an issue placing your order. Your cart is still saved. Please try again.",
      async () => {
        const lines = await this.carts.list(this.cartId);
        if (lines.length === 0) return 'Your cart is empty. Please add some items before placing an order.';

        const { order, droppedLines } = await this.orders.commitCart(this.cartId);
        const summary = order.lines
          .map(line => `- ${line.quantity} x ${line.productName}${sizeSuffix(line.variant)} - ${formatAmount(line.lineTotal)}`)
          .join('\n');

        let reply = `Excellent! Your order has been placed successfully. Order ID: ${order.id}.\n\n`;
        reply += `Order Summary:\n${summary}\n\n`;
        reply += `Total Amount: ${formatAmount(order.total)}\nStatus: Confirmed\n\n`;
        if (droppedLines.length > 0) reply += `${describeDropped(droppedLines)}\n\n`;
        reply += 'Thank you for your order! Is there anything else I can help you with?';
        return reply;
      }
    );
  }

  viewLastOrder(): Promise<string> {
    return this.respond('view_last_order', "Sorry, I couldn't retrieve your order information right now.", async () => {
      const order = await this.orders.getLastOrder();
      if (!order) return "You haven't placed any orders yet. Would you like to browse our catalog?";
      return `Your last order, Order ID ${order.id}, ${describeOrder(order)}`;
    });
  }

  viewOrder(orderId: string): Promise<string> {
    return this.respond('view_order', "Sorry, I couldn't retrieve your order information right now.", async () => {
      const order = await this.orders.getOrderById(orderId.trim());
      if (!order) return `I couldn't find an order with ID ${orderId}. Could you repeat the order ID?`;
      return `Order ${order.id} ${describeOrder(order)}`;
    });
  }

  private async respond(tool: AssistantTool, apology: string, run: () => Promise<string>): Promise<string> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof DomainError) {
        this.logger.info({ tool, code: err.code }, err.message);
        return this.clarify(err) ?? apology;
      }
      this.logger.error({ err, tool }, 'assistant tool failed');
      return apology;
    }
  }

  private clarify(err: DomainError): string | null {
    if (err instanceof ProductNotFoundError) {
      return `I'm not sure which product you mean by "${err.productName}". Could you say the product name exactly as I listed it?`;
    }
    if (err instanceof CartLineNotFoundError) {
      return err.variant
        ? `There's no ${err.productName} in size ${err.variant} in your cart.`
        : `There's no ${err.productName} without a size in your cart. Which size should I remove?`;
    }
    if (err instanceof EmptyCartError) {
      return "None of the items in your cart are available any more, so I couldn't place the order.";
    }
    if (err instanceof CartExpiredError || err instanceof ResourceNotFoundError) {
      return 'Your shopping session has expired. Shall we start a new cart?';
    }
    if (err instanceof CatalogUnavailableError) {
      return 'Sorry, I had trouble accessing the catalog. Please try again.';
    }
    if (err instanceof ValidationError) {
      return err.message;
    }
    return null;
  }
}
