import { readFile } from 'node:fs/promises';
import { Product } from '../../domain/models.js';
import { CatalogUnavailableError } from '../../domain/errors/index.js';
import { Logger, silentLogger } from '../../logger.js';
import { ICatalogStore } from './ICatalogStore.js';
import { parseCatalog } from './catalogSchema.js';

// loads lazily on first use, then serves the cached list for the process lifetime
export class JsonFileCatalogStore implements ICatalogStore {
  private products: readonly Product[] | null = null;

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async load(): Promise<readonly Product[]> {
    if (this.products) return this.products;

    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (err) {
      this.logger.error({ err, file: this.filePath }, 'catalog file could not be read');
      throw new CatalogUnavailableError(`Catalog file '${this.filePath}' could not be read.`, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      this.logger.error({ err, file: this.filePath }, 'catalog file is not valid JSON');
      throw new CatalogUnavailableError(`Catalog file '${this.filePath}' is not valid JSON.`, err);
    }

    // failed loads are not cached so a fixed file is picked up on the next call
    this.products = parseCatalog(raw, `file '${this.filePath}'`);
    this.logger.info({ count: this.products.length, file: this.filePath }, 'catalog loaded');
    return this.products;
  }
}
