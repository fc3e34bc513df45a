import type { Product } from '../../domain/product';

/**
 * Full read of the sellable stock. Implementations throw CatalogSourceError on failure.
 */
export interface CatalogSourcePort {
  fetchAll(): Promise<Product[]>;
}
