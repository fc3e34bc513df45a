import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { NO_SIZES_SELECTED_MESSAGE } from '../../../../../common/constants/error-messages.constants';
import { createLogger } from '../../../../../common/utils/logger';
import { CategoryClassifier } from '../../../domain/categories';
import { NoSizesSelectedError } from '../../../domain/errors';
import type { Product } from '../../../domain/product';
import { buildDocumentFilename, selectProductsForSize } from '../../../domain/selection';
import type { ArtifactStorePort } from '../../ports/artifact-store.port';
import type { MetricsPort } from '../../ports/metrics.port';
import { ARTIFACT_STORE_PORT, METRICS_PORT } from '../../ports/tokens';
import { CatalogCache } from '../../services/catalog-cache';
import { CatalogPageRenderer } from '../../services/catalog-page-renderer.service';
import { ImagePrefetcher } from '../../services/image-prefetcher.service';
import { loadCatalogSnapshot } from '../shared/catalog-snapshot';

export interface GenerateCatalogDocumentsInput {
  category: string;
  sizes: readonly string[];
}

export interface StoredCatalogDocument {
  token: string;
  size: string;
  filename: string;
}

export type GenerateCatalogDocumentsResult =
  | { kind: 'document'; size: string; filename: string; content: Buffer }
  | { kind: 'artifacts'; files: StoredCatalogDocument[] };

interface SizeSelection {
  size: string;
  products: Product[];
}

interface RenderedSizeDocument {
  size: string;
  content: Buffer;
}

@Injectable()
export class GenerateCatalogDocumentsUseCase {
  private readonly logger = createLogger(GenerateCatalogDocumentsUseCase.name);

  constructor(
    private readonly catalogCache: CatalogCache,
    private readonly classifier: CategoryClassifier,
    private readonly prefetcher: ImagePrefetcher,
    private readonly renderer: CatalogPageRenderer,
    @Inject(ARTIFACT_STORE_PORT)
    private readonly artifactStore: ArtifactStorePort,
    @Inject(METRICS_PORT)
    private readonly metrics: MetricsPort,
  ) {}

  async execute(input: GenerateCatalogDocumentsInput): Promise<GenerateCatalogDocumentsResult> {
    try {
      return await this.generate(input);
    } catch (error: unknown) {
      if (error instanceof NoSizesSelectedError) {
        throw new BadRequestException(NO_SIZES_SELECTED_MESSAGE);
      }

      throw error;
    }
  }

  private async generate(
    input: GenerateCatalogDocumentsInput,
  ): Promise<GenerateCatalogDocumentsResult> {
    const sizes = [...new Set(input.sizes)];
    if (sizes.length === 0) {
      throw new NoSizesSelectedError();
    }

    const snapshot = await loadCatalogSnapshot(this.catalogCache);
    const selections: SizeSelection[] = sizes.map((size) => ({
      size,
      products: selectProductsForSize(snapshot.products, this.classifier, input.category, size),
    }));

    const images = await this.prefetcher.prefetch(
      selections.flatMap((selection) => selection.products.map((product) => product.thumbnailUrl)),
    );

    if (selections.length === 1) {
      const [selection] = selections;
      const rendered = await this.renderer.render(selection.products, images);

      return {
        kind: 'document',
        size: selection.size,
        filename: buildDocumentFilename(input.category, selection.size),
        content: rendered.content,
      };
    }

    const documents: RenderedSizeDocument[] = [];
    for (const selection of selections) {
      const rendered = await this.renderer.render(selection.products, images);
      documents.push({ size: selection.size, content: rendered.content });
    }

    const files = await this.storeAll(input.category, documents);

    this.logger.artifact('artifacts_stored', {
      event: 'artifacts_stored',
      category: input.category,
      count: files.length,
    });

    return { kind: 'artifacts', files };
  }

  /** All or nothing: a failed put takes back the documents stored before it. */
  private async storeAll(
    category: string,
    documents: readonly RenderedSizeDocument[],
  ): Promise<StoredCatalogDocument[]> {
    const files: StoredCatalogDocument[] = [];

    try {
      for (const document of documents) {
        const token = await this.artifactStore.put(document.content);
        this.metrics.incrementArtifact('stored');
        files.push({
          token,
          size: document.size,
          filename: buildDocumentFilename(category, document.size),
        });
      }
    } catch (error: unknown) {
      await Promise.allSettled(files.map((file) => this.artifactStore.take(file.token)));
      this.logger.warn('artifacts_store_failed', {
        event: 'artifacts_store_failed',
        category,
        discarded: files.length,
        error_type: error instanceof Error ? error.name : 'UnknownError',
      });
      throw error;
    }

    return files;
  }
}
