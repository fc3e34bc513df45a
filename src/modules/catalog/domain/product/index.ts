export { DEFAULT_COLOR, DEFAULT_LOCATION_STOCK, DEFAULT_SIZE, type Product } from './types';
export { buildProductFromRow, type CatalogSourceRow } from './ingest';
