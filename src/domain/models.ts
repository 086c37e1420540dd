import type { CatalogUnavailableError } from './errors/index.js';

export const PRODUCT_CATEGORIES = ['mug', 'tshirt', 'hoodie', 'bottle', 'cap'] as const;

export type ProductCategory = (typeof PRODUCT_CATEGORIES)[number];

export interface ProductAttributes {
  sizes?: string[];
  [key: string]: unknown;
}

export interface Product {
  id: string;
  name: string;
  category: ProductCategory;
  price: number; // whole currency units
  color?: string;
  description: string;
  attributes: ProductAttributes;
}

export interface CatalogFilters {
  category?: ProductCategory;
  maxPrice?: number;
  color?: string;
  keyword?: string;
}

export interface CatalogQueryResult {
  products: Product[];
  loadError?: CatalogUnavailableError;
}

export interface CartLine {
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: number; // price snapshot when added
  variant?: string;
}

export interface Cart {
  cartId: string;
  lines: CartLine[];
  estimatedTotal: number;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

export interface OrderLineRequest {
  productName: string;
  quantity: number;
  variant?: string;
}

export interface OrderLine {
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
  variant?: string;
}

export const ORDER_CURRENCY = 'INR';

export type OrderStatus = 'confirmed';

export interface Order {
  id: string;
  lines: OrderLine[];
  total: number;
  currency: typeof ORDER_CURRENCY;
  createdAt: string; // ISO-8601
  status: OrderStatus;
}

export interface CommitResult {
  order: Order;
  droppedLines: OrderLineRequest[];
}
