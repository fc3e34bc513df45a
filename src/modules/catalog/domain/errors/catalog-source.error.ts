/**
 * Thrown when the catalog source cannot deliver the product list.
 * Fatal for the request that triggered the fetch; the cache keeps its previous state.
 */
export class CatalogSourceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CatalogSourceError';
  }
}
