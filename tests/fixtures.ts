import { Product } from '../src/domain/models.js';
import { ICatalogStore } from '../src/infrastructure/catalog/ICatalogStore.js';
import { CatalogUnavailableError } from '../src/domain/errors/index.js';
import { CatalogService } from '../src/domain/services/CatalogService.js';
import { CartService } from '../src/domain/services/CartService.js';
import { OrderService } from '../src/domain/services/OrderService.js';
import { StandardPricingStrategy } from '../src/domain/strategies/IPricingStrategy.js';
import { InMemoryCartSessionStore } from '../src/infrastructure/sessions/InMemoryCartSessionStore.js';
import { InMemoryOrderLedger } from '../src/infrastructure/ledger/InMemoryOrderLedger.js';
import { IOrderLedger } from '../src/infrastructure/ledger/IOrderLedger.js';

export const testProducts: Product[] = [
  {
    id: 'hoodie-01',
    name: 'Black Pullover Hoodie',
    category: 'hoodie',
    price: 1800,
    color: 'black',
    description: 'Warm black hoodie with a front pocket.',
    attributes: { sizes: ['S', 'M', 'L', 'XL'] },
  },
  {
    id: 'hoodie-02',
    name: 'Grey Zip Hoodie',
    category: 'hoodie',
    price: 2100,
    color: 'grey',
    description: 'Grey hoodie with full zip closure.',
    attributes: { sizes: ['S', 'M', 'L', 'XL'] },
  },
  {
    id: 'mug-01',
    name: 'Classic White Mug',
    category: 'mug',
    price: 350,
    color: 'white',
    description: 'Glossy ceramic mug.',
    attributes: {},
  },
  {
    id: 'tshirt-01',
    name: 'Basic Cotton Tee',
    category: 'tshirt',
    price: 599,
    color: 'white',
    description: 'Soft crew-neck t-shirt.',
    attributes: { sizes: ['S', 'M', 'L'] },
  },
  {
    id: 'cap-01',
    name: 'Black Baseball Cap',
    category: 'cap',
    price: 450,
    color: 'black',
    description: 'Adjustable cotton cap.',
    attributes: {},
  },
  {
    id: 'bottle-01',
    name: 'Steel Water Bottle',
    category: 'bottle',
    price: 900,
    description: 'Keeps water cold all day.',
    attributes: {},
  },
];

// catalog whose contents a test can change between calls
export class SwappableCatalogStore implements ICatalogStore {
  unavailable = false;

  constructor(public products: Product[] = structuredClone(testProducts)) {}

  async load(): Promise<readonly Product[]> {
    if (this.unavailable) throw new CatalogUnavailableError('catalog offline for test');
    return this.products;
  }

  setPrice(productId: string, price: number): void {
    this.products = this.products.map(p => (p.id === productId ? { ...p, price } : p));
  }

  remove(productId: string): void {
    this.products = this.products.filter(p => p.id !== productId);
  }
}

export interface TestServices {
  catalogStore: SwappableCatalogStore;
  sessions: InMemoryCartSessionStore;
  ledger: IOrderLedger;
  catalog: CatalogService;
  carts: CartService;
  orders: OrderService;
}

export function makeServices(ledger: IOrderLedger = new InMemoryOrderLedger()): TestServices {
  const catalogStore = new SwappableCatalogStore();
  const sessions = new InMemoryCartSessionStore(false);
  const pricing = new StandardPricingStrategy();
  const catalog = new CatalogService(catalogStore);
  const carts = new CartService(sessions, catalog, pricing);
  const orders = new OrderService(catalog, ledger, pricing, carts, {
    now: () => new Date('2026-03-14T10:30:00.000Z'),
  });
  return { catalogStore, sessions, ledger, catalog, carts, orders };
}
