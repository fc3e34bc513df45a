export const CATALOG_METRIC_CACHE_TOTAL = 'catalog_cache_requests_total';
export const CATALOG_METRIC_SOURCE_FAILURES_TOTAL = 'catalog_source_failures_total';
export const CATALOG_METRIC_IMAGE_RESOLUTIONS_TOTAL = 'catalog_image_resolutions_total';
export const CATALOG_METRIC_DOCUMENTS_RENDERED_TOTAL = 'catalog_documents_rendered_total';
export const CATALOG_METRIC_FAILED_IMAGE_CELLS_TOTAL = 'catalog_failed_image_cells_total';
export const CATALOG_METRIC_RENDER_LATENCY_SECONDS = 'catalog_render_latency_seconds';
export const CATALOG_METRIC_ARTIFACTS_TOTAL = 'catalog_artifacts_total';

export const CATALOG_RENDER_LATENCY_BUCKETS = [0.25, 0.5, 1, 2, 5, 10, 30, 60] as const;
