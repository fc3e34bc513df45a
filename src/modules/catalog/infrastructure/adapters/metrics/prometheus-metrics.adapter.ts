import { Injectable } from '@nestjs/common';
import {
  CATALOG_METRIC_ARTIFACTS_TOTAL,
  CATALOG_METRIC_CACHE_TOTAL,
  CATALOG_METRIC_DOCUMENTS_RENDERED_TOTAL,
  CATALOG_METRIC_FAILED_IMAGE_CELLS_TOTAL,
  CATALOG_METRIC_IMAGE_RESOLUTIONS_TOTAL,
  CATALOG_METRIC_RENDER_LATENCY_SECONDS,
  CATALOG_METRIC_SOURCE_FAILURES_TOTAL,
  CATALOG_RENDER_LATENCY_BUCKETS,
} from '../../../../../common/metrics';
import type { ImageOrigin } from '../../../domain/images';
import type {
  ArtifactOutcome,
  CatalogCacheOutcome,
  MetricsPort,
} from '../../../application/ports/metrics.port';

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly cacheOutcomes = new Map<string, number>();
  private readonly imageResolutions = new Map<string, number>();
  private readonly artifacts = new Map<string, number>();
  private sourceFailures = 0;
  private documentsRendered = 0;
  private failedImageCells = 0;

  private readonly latencyBuckets = new Map<string, number>();
  private latencySum = 0;
  private latencyCount = 0;

  incrementCatalogCache(outcome: CatalogCacheOutcome): void {
    increment(this.cacheOutcomes, outcome);
  }

  incrementCatalogSourceFailure(): void {
    this.sourceFailures += 1;
  }

  incrementImageResolution(origin: ImageOrigin): void {
    increment(this.imageResolutions, origin);
  }

  incrementDocumentsRendered(input: { failedImageCells: number }): void {
    this.documentsRendered += 1;
    this.failedImageCells += Math.max(0, input.failedImageCells);
  }

  observeRenderLatency(seconds: number): void {
    const latency = Number.isFinite(seconds) && seconds >= 0 ? seconds : 0;

    this.latencySum += latency;
    this.latencyCount += 1;

    for (const bucket of CATALOG_RENDER_LATENCY_BUCKETS) {
      if (latency <= bucket) {
        increment(this.latencyBuckets, String(bucket));
      }
    }

    increment(this.latencyBuckets, '+Inf');
  }

  incrementArtifact(outcome: ArtifactOutcome): void {
    increment(this.artifacts, outcome);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${CATALOG_METRIC_CACHE_TOTAL} Catalog cache lookups by outcome.`);
    lines.push(`# TYPE ${CATALOG_METRIC_CACHE_TOTAL} counter`);
    for (const [outcome, value] of this.cacheOutcomes.entries()) {
      lines.push(`${CATALOG_METRIC_CACHE_TOTAL}{outcome="${sanitizeLabelValue(outcome)}"} ${value}`);
    }

    lines.push(`# HELP ${CATALOG_METRIC_SOURCE_FAILURES_TOTAL} Failed catalog source reads.`);
    lines.push(`# TYPE ${CATALOG_METRIC_SOURCE_FAILURES_TOTAL} counter`);
    lines.push(`${CATALOG_METRIC_SOURCE_FAILURES_TOTAL} ${this.sourceFailures}`);

    lines.push(`# HELP ${CATALOG_METRIC_IMAGE_RESOLUTIONS_TOTAL} Thumbnail resolutions by the URL that served them.`);
    lines.push(`# TYPE ${CATALOG_METRIC_IMAGE_RESOLUTIONS_TOTAL} counter`);
    for (const [origin, value] of this.imageResolutions.entries()) {
      lines.push(`${CATALOG_METRIC_IMAGE_RESOLUTIONS_TOTAL}{origin="${sanitizeLabelValue(origin)}"} ${value}`);
    }

    lines.push(`# HELP ${CATALOG_METRIC_DOCUMENTS_RENDERED_TOTAL} Catalog PDFs rendered.`);
    lines.push(`# TYPE ${CATALOG_METRIC_DOCUMENTS_RENDERED_TOTAL} counter`);
    lines.push(`${CATALOG_METRIC_DOCUMENTS_RENDERED_TOTAL} ${this.documentsRendered}`);

    lines.push(`# HELP ${CATALOG_METRIC_FAILED_IMAGE_CELLS_TOTAL} Cells drawn without their image.`);
    lines.push(`# TYPE ${CATALOG_METRIC_FAILED_IMAGE_CELLS_TOTAL} counter`);
    lines.push(`${CATALOG_METRIC_FAILED_IMAGE_CELLS_TOTAL} ${this.failedImageCells}`);

    lines.push(`# HELP ${CATALOG_METRIC_ARTIFACTS_TOTAL} Artifact handoff operations by outcome.`);
    lines.push(`# TYPE ${CATALOG_METRIC_ARTIFACTS_TOTAL} counter`);
    for (const [outcome, value] of this.artifacts.entries()) {
      lines.push(`${CATALOG_METRIC_ARTIFACTS_TOTAL}{outcome="${sanitizeLabelValue(outcome)}"} ${value}`);
    }

    lines.push(`# HELP ${CATALOG_METRIC_RENDER_LATENCY_SECONDS} Catalog PDF render latency in seconds.`);
    lines.push(`# TYPE ${CATALOG_METRIC_RENDER_LATENCY_SECONDS} histogram`);
    for (const bucket of [...CATALOG_RENDER_LATENCY_BUCKETS.map(String), '+Inf']) {
      const value = this.latencyBuckets.get(bucket) ?? 0;
      lines.push(`${CATALOG_METRIC_RENDER_LATENCY_SECONDS}_bucket{le="${bucket}"} ${value}`);
    }
    lines.push(`${CATALOG_METRIC_RENDER_LATENCY_SECONDS}_sum ${this.latencySum}`);
    lines.push(`${CATALOG_METRIC_RENDER_LATENCY_SECONDS}_count ${this.latencyCount}`);

    return `${lines.join('\n')}\n`;
  }
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
