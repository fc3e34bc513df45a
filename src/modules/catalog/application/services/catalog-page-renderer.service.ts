import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../common/utils/logger';
import type { ResolvedImage } from '../../domain/images';
import { formatGenerationTimestamp, layoutCatalogPages } from '../../domain/layout';
import type { Product } from '../../domain/product';
import type { CatalogPdfWriterPort } from '../ports/catalog-pdf-writer.port';
import type { ClockPort } from '../ports/clock.port';
import type { MetricsPort } from '../ports/metrics.port';
import { CATALOG_PDF_WRITER_PORT, CLOCK, METRICS_PORT } from '../ports/tokens';
import { ImageResolver } from './image-resolver.service';

export interface RenderedCatalogDocument {
  content: Buffer;
  pageCount: number;
  failedImageCells: number;
}

/**
 * Turns an ordered product list plus prefetched thumbnails into one PDF.
 * Expects products already filtered to one (category, size) and sorted.
 */
@Injectable()
export class CatalogPageRenderer {
  private readonly logger = createLogger(CatalogPageRenderer.name);
  private readonly title: string;
  private readonly timeZone: string;
  private readonly locationLabels: { a: string; b: string };

  constructor(
    @Inject(ImageResolver)
    private readonly imageResolver: Pick<ImageResolver, 'resolve'>,
    @Inject(CATALOG_PDF_WRITER_PORT)
    private readonly writer: CatalogPdfWriterPort,
    @Inject(CLOCK)
    private readonly clock: ClockPort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
    configService: ConfigService,
  ) {
    this.title = configService.get<string>('CATALOG_DOCUMENT_TITLE') ?? 'Catálogo de inventario';
    this.timeZone = configService.get<string>('CATALOG_TIMEZONE') ?? 'America/Bogota';
    this.locationLabels = {
      a: configService.get<string>('STOCK_LOCATION_A_LABEL') ?? 'Tienda',
      b: configService.get<string>('STOCK_LOCATION_B_LABEL') ?? 'Bodega',
    };
  }

  async render(
    products: readonly Product[],
    images: ReadonlyMap<string, ResolvedImage>,
  ): Promise<RenderedCatalogDocument> {
    const startedAt = this.clock.now();
    const available = await this.completeImages(products, images);

    const pages = layoutCatalogPages(products, {
      imageSizeFor: (product) => available.get(product.thumbnailUrl) ?? null,
      locationLabels: this.locationLabels,
    });

    const createdAt = new Date(startedAt);
    const result = await this.writer.write({
      title: this.title,
      timestampLabel: formatGenerationTimestamp(createdAt, this.timeZone),
      createdAt,
      pages,
      imageFor: (thumbnailUrl) => available.get(thumbnailUrl),
    });

    const seconds = Math.max(0, this.clock.now() - startedAt) / 1000;
    this.metrics.observeRenderLatency(seconds);
    this.metrics.incrementDocumentsRendered({ failedImageCells: result.failedImageCells });
    this.logger.render('catalog_document_rendered', {
      event: 'catalog_document_rendered',
      products: products.length,
      pages: pages.length,
      failed_image_cells: result.failedImageCells,
      bytes: result.content.length,
    });

    return {
      content: result.content,
      pageCount: pages.length,
      failedImageCells: result.failedImageCells,
    };
  }

  private async completeImages(
    products: readonly Product[],
    images: ReadonlyMap<string, ResolvedImage>,
  ): Promise<Map<string, ResolvedImage>> {
    const available = new Map(images);
    const attempted = new Set<string>();

    for (const product of products) {
      if (available.has(product.thumbnailUrl) || attempted.has(product.thumbnailUrl)) {
        continue;
      }
      attempted.add(product.thumbnailUrl);

      this.logger.debug('image_missing_from_prefetch', {
        event: 'image_missing_from_prefetch',
        sku: product.sku,
      });
      const image = await this.resolveForCell(product.thumbnailUrl);
      if (image) {
        available.set(product.thumbnailUrl, image);
      }
    }

    return available;
  }

  /** A rejection leaves the cell without an image; the writer draws the failure block. */
  private async resolveForCell(url: string): Promise<ResolvedImage | null> {
    try {
      return await this.imageResolver.resolve(url);
    } catch (error: unknown) {
      this.logger.warn('image_unavailable_for_cell', {
        event: 'image_unavailable_for_cell',
        url,
        error_type: error instanceof Error ? error.name : 'UnknownError',
      });
      return null;
    }
  }
}
