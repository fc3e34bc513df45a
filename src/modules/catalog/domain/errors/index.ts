export { CatalogSourceError } from './catalog-source.error';
export { NoSizesSelectedError } from './no-sizes-selected.error';
