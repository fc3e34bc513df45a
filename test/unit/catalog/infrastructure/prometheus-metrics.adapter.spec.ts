import { PrometheusMetricsAdapter } from '@/modules/catalog/infrastructure/adapters/metrics/prometheus-metrics.adapter';

describe('PrometheusMetricsAdapter', () => {
  it('renders counters by label', () => {
    const metrics = new PrometheusMetricsAdapter();
    metrics.incrementCatalogCache('miss');
    metrics.incrementCatalogCache('hit');
    metrics.incrementCatalogCache('hit');
    metrics.incrementImageResolution('placeholder');
    metrics.incrementArtifact('stored');
    metrics.incrementCatalogSourceFailure();

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toContain('catalog_cache_requests_total{outcome="miss"} 1');
    expect(lines).toContain('catalog_cache_requests_total{outcome="hit"} 2');
    expect(lines).toContain('catalog_image_resolutions_total{origin="placeholder"} 1');
    expect(lines).toContain('catalog_artifacts_total{outcome="stored"} 1');
    expect(lines).toContain('catalog_source_failures_total 1');
  });

  it('accumulates rendered documents and failed cells', () => {
    const metrics = new PrometheusMetricsAdapter();
    metrics.incrementDocumentsRendered({ failedImageCells: 2 });
    metrics.incrementDocumentsRendered({ failedImageCells: 0 });

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toContain('catalog_documents_rendered_total 2');
    expect(lines).toContain('catalog_failed_image_cells_total 2');
  });

  it('renders the render latency histogram', () => {
    const metrics = new PrometheusMetricsAdapter();
    metrics.observeRenderLatency(0.4);
    metrics.observeRenderLatency(3);

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toContain('catalog_render_latency_seconds_bucket{le="0.25"} 0');
    expect(lines).toContain('catalog_render_latency_seconds_bucket{le="0.5"} 1');
    expect(lines).toContain('catalog_render_latency_seconds_bucket{le="5"} 2');
    expect(lines).toContain('catalog_render_latency_seconds_bucket{le="+Inf"} 2');
    expect(lines).toContain('catalog_render_latency_seconds_sum 3.4');
    expect(lines).toContain('catalog_render_latency_seconds_count 2');
  });
});
