import { Cart } from '../../domain/models.js';
import { ICartSessionStore } from './ICartSessionStore.js';
import { CartExpiredError, ResourceNotFoundError } from '../../domain/errors/index.js';
import { Logger, silentLogger } from '../../logger.js';

// per-conversation carts held in process memory, expired by cart.expiresAt
export class InMemoryCartSessionStore implements ICartSessionStore {
  private carts: Map<string, Cart> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(
    enableAutoCleanup: boolean = true,
    private readonly logger: Logger = silentLogger
  ) {
    if (enableAutoCleanup) {
      this.cleanupInterval = setInterval(() => {
        this.cleanupExpiredCarts();
      }, 60 * 1000);
      this.cleanupInterval.unref();
    }
  }

  // copies in and out so callers never hold a reference to stored state
  async createCart(cart: Cart): Promise<Cart> {
    this.carts.set(cart.cartId, structuredClone(cart));
    return structuredClone(cart);
  }

  async getCart(cartId: string): Promise<Cart | null> {
    const cart = this.carts.get(cartId);
    if (!cart) return null;

    // throw 410 Gone if expired (better than 404 for UX)
    if (this.isExpired(cart)) {
      this.carts.delete(cartId);
      throw new CartExpiredError(cartId);
    }

    return structuredClone(cart);
  }

  async updateCart(cart: Cart): Promise<Cart> {
    const stored = this.carts.get(cart.cartId);
    if (!stored) throw new ResourceNotFoundError('Cart', cart.cartId);

    if (this.isExpired(stored)) {
      this.carts.delete(cart.cartId);
      throw new CartExpiredError(cart.cartId);
    }

    this.carts.set(cart.cartId, structuredClone(cart));
    return structuredClone(cart);
  }

  async deleteCart(cartId: string): Promise<void> {
    this.carts.delete(cartId);
  }

  private isExpired(cart: Cart): boolean {
    return new Date() > cart.expiresAt;
  }

  private cleanupExpiredCarts(): void {
    const expiredCartIds: string[] = [];

    // collect expired carts first to avoid modifying map during iteration
    for (const [cartId, cart] of this.carts.entries()) {
      if (this.isExpired(cart)) {
        expiredCartIds.push(cartId);
      }
    }

    for (const cartId of expiredCartIds) {
      this.carts.delete(cartId);
    }

    if (expiredCartIds.length > 0) {
      this.logger.info({ count: expiredCartIds.length }, 'cleaned up expired carts');
    }
  }

  getCartCount(): number {
    return this.carts.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
