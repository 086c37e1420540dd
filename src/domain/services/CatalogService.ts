import { CatalogFilters, CatalogQueryResult, PRODUCT_CATEGORIES, Product, ProductCategory } from '../models.js';
import { CatalogUnavailableError, ProductNotFoundError, ResourceNotFoundError, ValidationError } from '../errors/index.js';
import { ICatalogStore } from '../../infrastructure/catalog/ICatalogStore.js';
import { normalizeOptionalText } from '../lineItems.js';
import { Logger, silentLogger } from '../../logger.js';

function isCategory(value: string): value is ProductCategory {
  return PRODUCT_CATEGORIES.some(category => category === value);
}

// closed set at the boundary so a typo fails loudly instead of matching nothing
export function parseCategory(input: string | undefined): ProductCategory | undefined {
  const normalized = input?.trim().toLowerCase();
  if (!normalized) return undefined;
  if (!isCategory(normalized)) {
    throw new ValidationError(
      `Unknown product category '${input}'. Expected one of: ${PRODUCT_CATEGORIES.join(', ')}.`
    );
  }
  return normalized;
}

type ProductPredicate = (product: Product) => boolean;

// read-only queries over the catalog store
export class CatalogService {
  constructor(
    private readonly store: ICatalogStore,
    private readonly logger: Logger = silentLogger
  ) {}

  async query(filters: CatalogFilters = {}): Promise<CatalogQueryResult> {
    let products: readonly Product[];
    try {
      products = await this.store.load();
    } catch (err) {
      if (!(err instanceof CatalogUnavailableError)) throw err;
      this.logger.warn({ err }, 'catalog unavailable, answering with no products');
      return { products: [], loadError: err };
    }

    let filtered = [...products];
    this.logger.debug({ count: filtered.length }, 'querying catalog');

    for (const [name, predicate] of this.buildPredicates(filters)) {
      filtered = filtered.filter(predicate);
      this.logger.debug({ filter: name, count: filtered.length }, 'applied catalog filter');
    }

    return { products: filtered };
  }

  // exact, case-sensitive match on the name field
  async findByName(productName: string): Promise<Product> {
    const products = await this.store.load();
    const product = products.find(p => p.name === productName);
    if (!product) throw new ProductNotFoundError(productName);
    return product;
  }

  async getById(productId: string): Promise<Product> {
    const products = await this.store.load();
    const product = products.find(p => p.id === productId);
    if (!product) throw new ResourceNotFoundError('Product', productId);
    return product;
  }

  private buildPredicates(filters: CatalogFilters): Array<[string, ProductPredicate]> {
    const predicates: Array<[string, ProductPredicate]> = [];
    const { category, maxPrice } = filters;
    const color = normalizeOptionalText(filters.color);
    const keyword = normalizeOptionalText(filters.keyword);

    if (category) {
      const wanted = category.toLowerCase();
      predicates.push(['category', p => p.category.toLowerCase() === wanted]);
    }

    // non-positive means no limit
    if (maxPrice !== undefined && maxPrice > 0) {
      predicates.push(['maxPrice', p => p.price <= maxPrice]);
    }

    if (color) {
      const wanted = color.toLowerCase();
      predicates.push(['color', p => (p.color ?? '').toLowerCase() === wanted]);
    }

    if (keyword) {
      const wanted = keyword.toLowerCase();
      predicates.push([
        'keyword',
        p => p.name.toLowerCase().includes(wanted) || p.description.toLowerCase().includes(wanted),
      ]);
    }

    return predicates;
  }
}
