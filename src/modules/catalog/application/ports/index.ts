export type { ArtifactStorePort } from './artifact-store.port';
export type { CatalogPdfWriteInput, CatalogPdfWriteResult, CatalogPdfWriterPort } from './catalog-pdf-writer.port';
export type { CatalogSourcePort } from './catalog-source.port';
export { systemClock, type ClockPort } from './clock.port';
export type { ImageDecoderPort } from './image-decoder.port';
export type { ImageOriginPort } from './image-origin.port';
export type { ArtifactOutcome, CatalogCacheOutcome, MetricsPort } from './metrics.port';
export * from './tokens';
