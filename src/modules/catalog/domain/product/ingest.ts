import { DEFAULT_COLOR, DEFAULT_LOCATION_STOCK, DEFAULT_SIZE, type Product } from './types';

export type CatalogSourceRow = {
  id: unknown;
  sku: unknown;
  name: unknown;
  color: unknown;
  size: unknown;
  stock: unknown;
  thumbnail_url: unknown;
  stock_location_a: unknown;
  stock_location_b: unknown;
};

/**
 * Builds a product from a catalog source row, or returns null for rows that are not
 * sellable (blank name, or stock <= 0).
 */
export function buildProductFromRow(row: CatalogSourceRow): Product | null {
  const name = coerceText(row.name);
  const stock = coerceStock(row.stock);

  if (name.length === 0 || stock <= 0) {
    return null;
  }

  const sku = coerceText(row.sku);

  return {
    sku: sku.length > 0 ? sku : coerceText(row.id),
    name,
    color: coerceText(row.color) || DEFAULT_COLOR,
    size: coerceText(row.size) || DEFAULT_SIZE,
    stock,
    thumbnailUrl: coerceText(row.thumbnail_url),
    stockLocationA: coerceText(row.stock_location_a) || DEFAULT_LOCATION_STOCK,
    stockLocationB: coerceText(row.stock_location_b) || DEFAULT_LOCATION_STOCK,
  };
}

function coerceText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  return String(value).trim();
}

function coerceStock(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }

  if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value.trim())) {
    return Math.trunc(Number(value));
  }

  return 0;
}
