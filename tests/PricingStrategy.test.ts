import { describe, it, expect } from 'vitest';
import { StandardPricingStrategy } from '../src/domain/strategies/IPricingStrategy.js';
import { testProducts } from './fixtures.js';

describe('StandardPricingStrategy', () => {
  const strategy = new StandardPricingStrategy();
  const [hoodie, , mug] = testProducts;

  it('prices nothing as zero', () => {
    expect(strategy.priceLines([])).toEqual({ lines: [], total: 0 });
    expect(strategy.estimateCart([])).toBe(0);
  });

  it('computes line totals from the product price', () => {
    const { lines, total } = strategy.priceLines([
      { product: hoodie, quantity: 2, variant: 'M' },
      { product: mug, quantity: 3 },
    ]);

    expect(lines).toEqual([
      { productId: 'hoodie-01', productName: 'Black Pullover Hoodie', quantity: 2, unitPrice: 1800, lineTotal: 3600, variant: 'M' },
      { productId: 'mug-01', productName: 'Classic White Mug', quantity: 3, unitPrice: 350, lineTotal: 1050 },
    ]);
    expect(total).toBe(4650);
  });

  it('omits the variant key when there is none', () => {
    const { lines } = strategy.priceLines([{ product: mug, quantity: 1, variant: undefined }]);
    expect('variant' in lines[0]).toBe(false);
  });

  it('estimates carts from snapshot prices', () => {
    const estimate = strategy.estimateCart([
      { productId: 'hoodie-01', productName: 'Black Pullover Hoodie', quantity: 1, unitPrice: 1500 },
      { productId: 'mug-01', productName: 'Classic White Mug', quantity: 2, unitPrice: 350 },
    ]);

    expect(estimate).toBe(2200);
  });
});
