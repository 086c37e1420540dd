import { fileURLToPath } from 'node:url';

const DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  nodeEnv: string;
  cartTtlMinutes: number;
  maxQuantity: number;
  catalogFile: string;
  ordersFile: string;
  corsOrigin: string[] | true;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
  apiBaseUrl?: string;
}

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: intFrom(env.PORT, 3000),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    nodeEnv: env.NODE_ENV || 'development',
    cartTtlMinutes: intFrom(env.CART_TTL_MINUTES, 30),
    maxQuantity: intFrom(env.MAX_QUANTITY, 99),
    catalogFile: env.CATALOG_FILE || `${DATA_DIR}products.json`,
    ordersFile: env.ORDERS_FILE || `${DATA_DIR}orders.json`,
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : true,
    apiTitle: env.API_TITLE || 'Voice Shop Commerce API',
    apiVersion: env.API_VERSION || '1.0.0',
    apiDescription:
      env.API_DESCRIPTION ||
      'Catalog queries, per-conversation carts and the order ledger behind the voice shopping assistant',
    apiBaseUrl: env.API_BASE_URL,
  };
}
