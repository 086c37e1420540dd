import { Product } from '../../domain/models.js';

export interface ICatalogStore {
  // rejects with CatalogUnavailableError when the catalog cannot be read
  load(): Promise<readonly Product[]>;
}
