import type { ImageOrigin } from '../../domain/images';

export type CatalogCacheOutcome = 'hit' | 'miss' | 'shared';
export type ArtifactOutcome = 'stored' | 'retrieved' | 'not_found';

export interface MetricsPort {
  incrementCatalogCache(outcome: CatalogCacheOutcome): void;

  incrementCatalogSourceFailure(): void;

  incrementImageResolution(origin: ImageOrigin): void;

  incrementDocumentsRendered(input: { failedImageCells: number }): void;

  observeRenderLatency(seconds: number): void;

  incrementArtifact(outcome: ArtifactOutcome): void;
}
