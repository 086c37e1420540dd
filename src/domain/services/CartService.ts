import { v4 as uuidv4 } from 'uuid';
import { Cart, CartLine } from '../models.js';
import { ICartSessionStore } from '../../infrastructure/sessions/ICartSessionStore.js';
import { IPricingStrategy } from '../strategies/IPricingStrategy.js';
import { CartLineNotFoundError, ResourceNotFoundError, ValidationError } from '../errors/index.js';
import { normalizeQuantity, normalizeOptionalText } from '../lineItems.js';
import { CatalogService } from './CatalogService.js';
import { Logger, silentLogger } from '../../logger.js';

export interface CartServiceConfig {
  cartTtlMinutes?: number;
  maxQuantity?: number;
  logger?: Logger;
}

// one cart per conversation, addressed by its cartId handle
export class CartService {
  private ttlMinutes: number;
  private maxQty: number;
  private logger: Logger;

  constructor(
    private readonly store: ICartSessionStore,
    private readonly catalog: CatalogService,
    private readonly pricing: IPricingStrategy,
    config?: CartServiceConfig
  ) {
    this.ttlMinutes = config?.cartTtlMinutes ?? 30;
    this.maxQty = config?.maxQuantity ?? 99;
    this.logger = config?.logger ?? silentLogger;
  }

  async createCart(): Promise<Cart> {
    const now = new Date();
    const cart: Cart = {
      cartId: uuidv4(),
      lines: [],
      estimatedTotal: 0,
      createdAt: now,
      updatedAt: now,
      expiresAt: this.expiryFrom(now),
    };

    this.logger.info({ cartId: cart.cartId }, 'cart session created');
    return this.store.createCart(cart);
  }

  async getCart(cartId: string): Promise<Cart> {
    this.validateCartId(cartId);
    const cart = await this.store.getCart(cartId);
    if (!cart) throw new ResourceNotFoundError('Cart', cartId);
    return cart;
  }

  async list(cartId: string): Promise<CartLine[]> {
    const cart = await this.getCart(cartId);
    return cart.lines;
  }

  // merges into the (productId, variant) slot if one exists
  async addLine(cartId: string, productName: string, quantity: number, variant?: string): Promise<Cart> {
    const qty = normalizeQuantity(quantity);
    const slotVariant = normalizeOptionalText(variant);
    const cart = await this.getCart(cartId);
    const product = await this.catalog.findByName(productName);

    const existing = cart.lines.find(
      line => line.productId === product.id && line.variant === slotVariant
    );

    if (existing) {
      const newQty = existing.quantity + qty;
      if (newQty > this.maxQty) {
        throw new ValidationError(
          `Total quantity for product '${product.name}' would exceed maximum of ${this.maxQty}`
        );
      }
      existing.quantity = newQty;
    } else {
      if (qty > this.maxQty) {
        throw new ValidationError(`Quantity must not exceed ${this.maxQty}.`);
      }
      const line: CartLine = {
        productId: product.id,
        productName: product.name,
        quantity: qty,
        unitPrice: product.price,
      };
      if (slotVariant !== undefined) line.variant = slotVariant;
      cart.lines.push(line);
    }

    this.logger.debug({ cartId, productId: product.id, quantity: qty, variant: slotVariant }, 'added to cart');
    return this.save(cart);
  }

  // the variant must match exactly; a missing variant only matches lines without one
  async removeLine(cartId: string, productName: string, variant?: string): Promise<CartLine> {
    const slotVariant = normalizeOptionalText(variant);
    const cart = await this.getCart(cartId);
    const idx = this.findLineIndex(cart, productName, slotVariant);

    const [removed] = cart.lines.splice(idx, 1);
    await this.save(cart);

    this.logger.debug({ cartId, productId: removed.productId, variant: slotVariant }, 'removed from cart');
    return removed;
  }

  // 0 removes the line
  async setLineQuantity(cartId: string, productName: string, quantity: number, variant?: string): Promise<Cart> {
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new ValidationError('Quantity must be a non-negative integer.');
    }
    if (quantity > this.maxQty) {
      throw new ValidationError(`Quantity must not exceed ${this.maxQty}.`);
    }

    const cart = await this.getCart(cartId);
    const idx = this.findLineIndex(cart, productName, normalizeOptionalText(variant));

    if (quantity === 0) {
      cart.lines.splice(idx, 1);
    } else {
      cart.lines[idx].quantity = quantity;
    }

    return this.save(cart);
  }

  async clear(cartId: string): Promise<Cart> {
    const cart = await this.getCart(cartId);
    cart.lines = []; // keep session alive but empty
    return this.save(cart);
  }

  async deleteCart(cartId: string): Promise<void> {
    this.validateCartId(cartId);
    await this.store.deleteCart(cartId);
  }

  private findLineIndex(cart: Cart, productName: string, variant: string | undefined): number {
    const idx = cart.lines.findIndex(
      line => line.productName === productName && line.variant === variant
    );
    if (idx === -1) throw new CartLineNotFoundError(productName, variant);
    return idx;
  }

  private save(cart: Cart): Promise<Cart> {
    const now = new Date();
    return this.store.updateCart({
      ...cart,
      estimatedTotal: this.pricing.estimateCart(cart.lines),
      updatedAt: now,
      expiresAt: this.expiryFrom(now),
    });
  }

  private expiryFrom(from: Date): Date {
    return new Date(from.getTime() + this.ttlMinutes * 60 * 1000);
  }

  private validateCartId(cartId: string): void {
    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
    if (!uuidRegex.test(cartId)) {
      throw new ValidationError('Invalid cart ID format. Expected UUID v4.');
    }
  }
}
