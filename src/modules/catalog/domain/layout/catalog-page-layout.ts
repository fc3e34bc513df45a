import type { Product } from '../product';
import {
  COLUMN_SPACING,
  DEFAULT_IMAGE_DISPLAY_HEIGHT,
  GRID_COLUMNS,
  IMAGE_DISPLAY_WIDTH,
  PAGE_MARGIN,
  PRODUCTS_PER_PAGE,
  ROW_SPACING,
  STOCK_BLOCK_OFFSET_Y,
  TEXT_OFFSET_X,
  TITLE_OFFSET_Y,
  TITLE_WRAP_WIDTH,
} from './constants';
import { displayTitle, wrapText } from './text-wrap';

export type LayoutFont = 'Helvetica' | 'Helvetica-Bold';

/** Coordinates are PDF points with the origin at the top-left corner of the page. */
export interface LayoutRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LayoutTextLine {
  text: string;
  font: LayoutFont;
  size: number;
  x: number;
  baseline: number;
}

export interface CatalogCellLayout {
  product: Product;
  index: number;
  row: number;
  column: number;
  /** Solid panel behind the image, offset from the frame. */
  background: LayoutRect;
  /** Image box; the border is stroked on the same rect. */
  frame: LayoutRect;
  /** Drawn over a white frame when the image cannot be placed. */
  imageFailureLines: LayoutTextLine[];
  textLines: LayoutTextLine[];
}

export interface CatalogPageLayout {
  pageIndex: number;
  cells: CatalogCellLayout[];
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface CatalogLayoutOptions {
  imageSizeFor: (product: Product) => ImageSize | null;
  locationLabels: { a: string; b: string };
}

export function gridPosition(index: number): { page: number; row: number; column: number } {
  const slot = index % PRODUCTS_PER_PAGE;
  return {
    page: Math.floor(index / PRODUCTS_PER_PAGE),
    row: Math.floor(slot / GRID_COLUMNS),
    column: slot % GRID_COLUMNS,
  };
}

export function imageDisplayHeight(size: ImageSize | null): number {
  if (!size || size.width <= 0 || size.height <= 0) {
    return DEFAULT_IMAGE_DISPLAY_HEIGHT;
  }

  return IMAGE_DISPLAY_WIDTH * (size.height / size.width);
}

/**
 * Lays products out on a 2x3 grid, six per page, in the given order.
 * An empty product list still yields one (empty) page.
 */
export function layoutCatalogPages(
  products: readonly Product[],
  options: CatalogLayoutOptions,
): CatalogPageLayout[] {
  const pages: CatalogPageLayout[] = [{ pageIndex: 0, cells: [] }];

  products.forEach((product, index) => {
    const position = gridPosition(index);
    if (position.page >= pages.length) {
      pages.push({ pageIndex: position.page, cells: [] });
    }

    pages[position.page].cells.push(
      layoutCell(product, index, position.row, position.column, options),
    );
  });

  return pages;
}

function layoutCell(
  product: Product,
  index: number,
  row: number,
  column: number,
  options: CatalogLayoutOptions,
): CatalogCellLayout {
  const x = PAGE_MARGIN + column * COLUMN_SPACING;
  const top = PAGE_MARGIN + row * ROW_SPACING;
  const height = imageDisplayHeight(options.imageSizeFor(product));

  return {
    product,
    index,
    row,
    column,
    background: { x: x - 3, y: top + 5, width: IMAGE_DISPLAY_WIDTH, height },
    frame: { x: x + 2, y: top, width: IMAGE_DISPLAY_WIDTH, height },
    imageFailureLines: [
      { text: 'Error al cargar', font: 'Helvetica', size: 10, x: x + 30, baseline: top + height / 2 },
      { text: 'imagen', font: 'Helvetica', size: 10, x: x + 30, baseline: top + height / 2 + 12 },
    ],
    textLines: layoutTextBlock(product, x + TEXT_OFFSET_X, top, options.locationLabels),
  };
}

function layoutTextBlock(
  product: Product,
  textX: number,
  top: number,
  labels: CatalogLayoutOptions['locationLabels'],
): LayoutTextLine[] {
  const lines: LayoutTextLine[] = [];
  let baseline = top + TITLE_OFFSET_Y;

  for (const text of wrapText(displayTitle(product.name), TITLE_WRAP_WIDTH)) {
    lines.push({ text, font: 'Helvetica', size: 12, x: textX, baseline });
    baseline += 14;
  }

  baseline += 6;
  lines.push({ text: `SKU: ${product.sku}`, font: 'Helvetica', size: 10, x: textX, baseline });
  baseline += 14;
  lines.push({ text: `Color: ${product.color}`, font: 'Helvetica', size: 12, x: textX, baseline });
  baseline += 18;
  lines.push({ text: product.size, font: 'Helvetica-Bold', size: 15, x: textX, baseline });

  // Stock lines sit at fixed offsets regardless of how many title lines were drawn.
  const stockBaseline = top + STOCK_BLOCK_OFFSET_Y;
  lines.push(
    { text: `Disponible: ${product.stock}`, font: 'Helvetica', size: 12, x: textX, baseline: stockBaseline },
    { text: `${labels.a}: ${product.stockLocationA}`, font: 'Helvetica', size: 10, x: textX, baseline: stockBaseline + 14 },
    { text: `${labels.b}: ${product.stockLocationB}`, font: 'Helvetica', size: 10, x: textX, baseline: stockBaseline + 26 },
  );

  return lines;
}
