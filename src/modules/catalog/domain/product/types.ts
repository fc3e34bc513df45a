/**
 * One in-stock variant as delivered by the catalog source.
 * `size` is the raw label; ordering for display goes through the size ranker.
 */
export interface Product {
  readonly sku: string;
  readonly name: string;
  readonly color: string;
  readonly size: string;
  readonly stock: number;
  readonly thumbnailUrl: string;
  readonly stockLocationA: string;
  readonly stockLocationB: string;
}

export const DEFAULT_COLOR = 'Sin color';
export const DEFAULT_SIZE = 'Única';
export const DEFAULT_LOCATION_STOCK = '0';
