import { Cart } from '../../domain/models.js';

export interface ICartSessionStore {
  createCart(cart: Cart): Promise<Cart>;
  getCart(cartId: string): Promise<Cart | null>;
  updateCart(cart: Cart): Promise<Cart>;
  deleteCart(cartId: string): Promise<void>;
}
