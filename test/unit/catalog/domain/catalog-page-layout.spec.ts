import {
  gridPosition,
  imageDisplayHeight,
  layoutCatalogPages,
  type CatalogLayoutOptions,
} from '@/modules/catalog/domain/layout';
import { buildProduct } from '../../../fixtures/catalog/products';

const options: CatalogLayoutOptions = {
  imageSizeFor: () => ({ width: 100, height: 150 }),
  locationLabels: { a: 'Tienda', b: 'Bodega' },
};

describe('catalog page layout', () => {
  it('places cells on a two by three grid', () => {
    expect(gridPosition(0)).toEqual({ page: 0, row: 0, column: 0 });
    expect(gridPosition(3)).toEqual({ page: 0, row: 1, column: 1 });
    expect(gridPosition(5)).toEqual({ page: 0, row: 2, column: 1 });
    expect(gridPosition(6)).toEqual({ page: 1, row: 0, column: 0 });
  });

  it('scales image height to the display width', () => {
    expect(imageDisplayHeight({ width: 100, height: 150 })).toBe(216);
    expect(imageDisplayHeight(null)).toBe(144);
    expect(imageDisplayHeight({ width: 0, height: 150 })).toBe(144);
  });

  it('splits products into pages of six', () => {
    const products = Array.from({ length: 13 }, () => buildProduct());

    const pages = layoutCatalogPages(products, options);

    expect(pages.map((page) => page.cells.length)).toEqual([6, 6, 1]);
    expect(pages[2]?.cells[0]?.product).toBe(products[12]);
    expect(pages[1]?.cells.map((cell) => cell.index)).toEqual([6, 7, 8, 9, 10, 11]);
  });

  it('returns a single empty page for no products', () => {
    expect(layoutCatalogPages([], options)).toEqual([{ pageIndex: 0, cells: [] }]);
  });

  it('positions image boxes from the cell origin', () => {
    const [page] = layoutCatalogPages(
      Array.from({ length: 4 }, () => buildProduct()),
      options,
    );
    const cell = page?.cells[3];

    expect(cell?.row).toBe(1);
    expect(cell?.column).toBe(1);
    expect(cell?.frame).toEqual({ x: 326, y: 288, width: 144, height: 216 });
    expect(cell?.background).toEqual({ x: 321, y: 293, width: 144, height: 216 });
    expect(cell?.imageFailureLines.map((line) => [line.text, line.x, line.baseline])).toEqual([
      ['Error al cargar', 354, 396],
      ['imagen', 354, 408],
    ]);
  });

  it('stacks the text block and pins stock lines to fixed baselines', () => {
    const product = buildProduct({
      sku: 'JG-9',
      name: 'Jogger Cargo Negro - M',
      color: 'Negro',
      size: 'M',
      stock: 5,
      stockLocationA: '2',
      stockLocationB: '3',
    });

    const [page] = layoutCatalogPages([product], options);
    const lines = page?.cells[0]?.textLines ?? [];

    expect(lines.map((line) => [line.text, line.font, line.size, line.baseline])).toEqual([
      ['Jogger Cargo', 'Helvetica', 12, 86],
      ['Negro', 'Helvetica', 12, 100],
      ['SKU: JG-9', 'Helvetica', 10, 120],
      ['Color: Negro', 'Helvetica', 12, 134],
      ['M', 'Helvetica-Bold', 15, 152],
      ['Disponible: 5', 'Helvetica', 12, 204],
      ['Tienda: 2', 'Helvetica', 10, 218],
      ['Bodega: 3', 'Helvetica', 10, 230],
    ]);
    for (const line of lines) {
      expect(line.x).toBeCloseTo(205.2, 5);
    }
  });

  it('uses the configured stock location labels', () => {
    const [page] = layoutCatalogPages([buildProduct({ stockLocationA: '4' })], {
      ...options,
      locationLabels: { a: 'Centro', b: 'Norte' },
    });
    const texts = page?.cells[0]?.textLines.map((line) => line.text) ?? [];

    expect(texts).toContain('Centro: 4');
    expect(texts[texts.length - 1]).toBe('Norte: 2');
  });
});
