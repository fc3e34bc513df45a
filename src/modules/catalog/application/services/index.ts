export {
  CatalogCache,
  DEFAULT_CATALOG_CACHE_TTL_MS,
  type CatalogCacheOptions,
  type CatalogSnapshot,
} from './catalog-cache';
export { CatalogPageRenderer, type RenderedCatalogDocument } from './catalog-page-renderer.service';
export { ImagePrefetcher } from './image-prefetcher.service';
export { ImageResolver } from './image-resolver.service';
