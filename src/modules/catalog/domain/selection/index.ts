export {
  countProductsByCategory,
  countSizesInCategory,
  selectProductsForSize,
} from './select-products';
export { buildDocumentFilename } from './filename';
