import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CatalogSourcePort } from './application/ports/catalog-source.port';
import type { ClockPort } from './application/ports/clock.port';
import { systemClock } from './application/ports/clock.port';
import type { MetricsPort } from './application/ports/metrics.port';
import {
  CATALOG_PDF_WRITER_PORT,
  CATALOG_SOURCE_PORT,
  CLOCK,
  IMAGE_DECODER_PORT,
  IMAGE_ORIGIN_PORT,
  METRICS_PORT,
} from './application/ports/tokens';
import {
  CatalogCache,
  CatalogPageRenderer,
  DEFAULT_CATALOG_CACHE_TTL_MS,
  ImagePrefetcher,
  ImageResolver,
} from './application/services';
import {
  GenerateCatalogDocumentsUseCase,
  ListCategoriesUseCase,
  ListSizesUseCase,
  RetrieveArtifactUseCase,
} from './application/use-cases';
import { CatalogController } from './controllers/catalog.controller';
import { MetricsController } from './controllers/metrics.controller';
import { CategoryClassifier } from './domain/categories';
import { artifactStoreFactory } from './infrastructure/adapters/artifact-store';
import { SharpImageDecoderAdapter } from './infrastructure/adapters/image-decoder';
import { HttpImageOriginAdapter } from './infrastructure/adapters/image-origin';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics/prometheus-metrics.adapter';
import { PdfkitCatalogWriter } from './infrastructure/adapters/pdf-writer';
import { PgCatalogSourceRepository } from './infrastructure/repositories/pg-catalog-source.repository';
import { pgPoolFactory, PgPoolProvider } from './infrastructure/repositories/pg-pool.provider';

@Module({
  controllers: [CatalogController, MetricsController],
  providers: [
    PgPoolProvider,
    pgPoolFactory,
    PgCatalogSourceRepository,
    HttpImageOriginAdapter,
    SharpImageDecoderAdapter,
    PdfkitCatalogWriter,
    PrometheusMetricsAdapter,
    ImageResolver,
    ImagePrefetcher,
    CatalogPageRenderer,
    ListCategoriesUseCase,
    ListSizesUseCase,
    GenerateCatalogDocumentsUseCase,
    RetrieveArtifactUseCase,
    artifactStoreFactory,
    {
      provide: CLOCK,
      useValue: systemClock,
    },
    {
      provide: CategoryClassifier,
      useFactory: () => new CategoryClassifier(),
    },
    {
      provide: CatalogCache,
      useFactory: (
        configService: ConfigService,
        source: CatalogSourcePort,
        clock: ClockPort,
        metrics: MetricsPort,
      ) =>
        new CatalogCache({
          fetchAll: () => source.fetchAll(),
          clock,
          ttlMs: configService.get<number>('CATALOG_CACHE_TTL_MS') ?? DEFAULT_CATALOG_CACHE_TTL_MS,
          metrics,
        }),
      inject: [ConfigService, CATALOG_SOURCE_PORT, CLOCK, METRICS_PORT],
    },
    {
      provide: CATALOG_SOURCE_PORT,
      useExisting: PgCatalogSourceRepository,
    },
    {
      provide: IMAGE_ORIGIN_PORT,
      useExisting: HttpImageOriginAdapter,
    },
    {
      provide: IMAGE_DECODER_PORT,
      useExisting: SharpImageDecoderAdapter,
    },
    {
      provide: CATALOG_PDF_WRITER_PORT,
      useExisting: PdfkitCatalogWriter,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
  ],
})
export class CatalogModule {}
