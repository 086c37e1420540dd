import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.cartTtlMinutes).toBe(30);
    expect(config.maxQuantity).toBe(99);
    expect(config.corsOrigin).toBe(true);
    expect(config.catalogFile.endsWith('/data/products.json')).toBe(true);
    expect(config.ordersFile.endsWith('/data/orders.json')).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      CART_TTL_MINUTES: '10',
      MAX_QUANTITY: 'lots',
      ORDERS_FILE: '/var/lib/shop/orders.json',
      CORS_ORIGIN: 'https://a.example,https://b.example',
    });

    expect(config.port).toBe(8080);
    expect(config.cartTtlMinutes).toBe(10);
    expect(config.maxQuantity).toBe(99);
    expect(config.ordersFile).toBe('/var/lib/shop/orders.json');
    expect(config.corsOrigin).toEqual(['https://a.example', 'https://b.example']);
  });
});
