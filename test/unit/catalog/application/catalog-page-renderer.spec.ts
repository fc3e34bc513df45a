import type {
  CatalogPdfWriteInput,
  CatalogPdfWriterPort,
} from '@/modules/catalog/application/ports/catalog-pdf-writer.port';
import { CatalogPageRenderer } from '@/modules/catalog/application/services/catalog-page-renderer.service';
import type { ImageResolver } from '@/modules/catalog/application/services/image-resolver.service';
import type { ResolvedImage } from '@/modules/catalog/domain/images';
import { DEFAULT_IMAGE_DISPLAY_HEIGHT } from '@/modules/catalog/domain/layout';
import { createConfigService, createMetricsMock, FakeClock } from '../../../fixtures/catalog/fakes';
import { buildProduct } from '../../../fixtures/catalog/products';

function image(url: string): ResolvedImage {
  return { sourceUrl: url, origin: 'optimized', data: Buffer.from(url), width: 1070, height: 1536 };
}

function setup() {
  const writes: CatalogPdfWriteInput[] = [];
  const writer: CatalogPdfWriterPort = {
    write: async (input) => {
      writes.push(input);
      return { content: Buffer.from('%PDF-fake'), failedImageCells: 1 };
    },
  };
  const resolver: jest.Mocked<Pick<ImageResolver, 'resolve'>> = {
    resolve: jest.fn(async (url: string) => image(url)),
  };
  const metrics = createMetricsMock();
  const renderer = new CatalogPageRenderer(
    resolver,
    writer,
    new FakeClock(),
    metrics,
    createConfigService({
      CATALOG_DOCUMENT_TITLE: 'Inventario de prueba',
      CATALOG_TIMEZONE: 'UTC',
      STOCK_LOCATION_A_LABEL: 'Tienda',
      STOCK_LOCATION_B_LABEL: 'Bodega',
    }),
  );

  return { renderer, writes, resolver, metrics };
}

describe('CatalogPageRenderer', () => {
  it('hands the laid out pages and stamp to the writer', async () => {
    const { renderer, writes } = setup();
    const products = Array.from({ length: 7 }, () => buildProduct());
    const images = new Map(products.map((product) => [product.thumbnailUrl, image(product.thumbnailUrl)]));

    const rendered = await renderer.render(products, images);

    expect(rendered).toEqual({
      content: Buffer.from('%PDF-fake'),
      pageCount: 2,
      failedImageCells: 1,
    });
    expect(writes).toHaveLength(1);
    expect(writes[0]?.title).toBe('Inventario de prueba');
    expect(writes[0]?.timestampLabel).toBe('05/03/2024 (14:07)');
    expect(writes[0]?.createdAt).toEqual(new Date(Date.UTC(2024, 2, 5, 14, 7)));
    expect(writes[0]?.pages.map((page) => page.cells.length)).toEqual([6, 1]);
    expect(writes[0]?.imageFor(products[0]?.thumbnailUrl ?? '')).toEqual(
      image(products[0]?.thumbnailUrl ?? ''),
    );
  });

  it('sizes image boxes from the resolved image', async () => {
    const { renderer, writes } = setup();
    const product = buildProduct();

    await renderer.render([product], new Map([[product.thumbnailUrl, image(product.thumbnailUrl)]]));

    expect(writes[0]?.pages[0]?.cells[0]?.frame.height).toBeCloseTo((144 * 1536) / 1070, 6);
  });

  it('resolves images the prefetch did not cover', async () => {
    const { renderer, resolver, writes } = setup();
    const product = buildProduct();

    await renderer.render([product], new Map());

    expect(resolver.resolve).toHaveBeenCalledWith(product.thumbnailUrl);
    expect(writes[0]?.imageFor(product.thumbnailUrl)?.origin).toBe('optimized');
  });

  it('renders one page for an empty selection', async () => {
    const { renderer, writes } = setup();

    const rendered = await renderer.render([], new Map());

    expect(rendered.pageCount).toBe(1);
    expect(writes[0]?.pages).toEqual([{ pageIndex: 0, cells: [] }]);
  });

  it('records render metrics', async () => {
    const { renderer, metrics } = setup();

    await renderer.render([], new Map());

    expect(metrics.observeRenderLatency).toHaveBeenCalledWith(0);
    expect(metrics.incrementDocumentsRendered).toHaveBeenCalledWith({ failedImageCells: 1 });
  });

  it('leaves a cell without an image when resolution rejects', async () => {
    const { renderer, resolver, writes } = setup();
    resolver.resolve.mockRejectedValue(new Error('placeholder unavailable'));
    const first = buildProduct({ thumbnailUrl: 'https://cdn.example/shared.jpg' });
    const second = buildProduct({ thumbnailUrl: 'https://cdn.example/shared.jpg' });

    const rendered = await renderer.render([first, second], new Map());

    expect(rendered.pageCount).toBe(1);
    expect(resolver.resolve).toHaveBeenCalledTimes(1);
    expect(writes[0]?.imageFor('https://cdn.example/shared.jpg')).toBeUndefined();
    expect(writes[0]?.pages[0]?.cells[0]?.frame.height).toBe(DEFAULT_IMAGE_DISPLAY_HEIGHT);
  });
});
