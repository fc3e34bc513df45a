export {
  gridPosition,
  imageDisplayHeight,
  layoutCatalogPages,
  type CatalogCellLayout,
  type CatalogLayoutOptions,
  type CatalogPageLayout,
  type ImageSize,
  type LayoutFont,
  type LayoutRect,
  type LayoutTextLine,
} from './catalog-page-layout';
export * from './constants';
export { displayTitle, wrapText } from './text-wrap';
export { formatGenerationTimestamp } from './timestamp';
