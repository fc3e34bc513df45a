export {
  GenerateCatalogDocumentsUseCase,
  type GenerateCatalogDocumentsInput,
  type GenerateCatalogDocumentsResult,
  type StoredCatalogDocument,
} from './generate-catalog-documents/generate-catalog-documents.use-case';
export {
  ListCategoriesUseCase,
  type CategorySummary,
  type ListCategoriesResponse,
} from './list-categories/list-categories.use-case';
export { ListSizesUseCase, type ListSizesResponse, type SizeSummary } from './list-sizes/list-sizes.use-case';
export { RetrieveArtifactUseCase } from './retrieve-artifact/retrieve-artifact.use-case';
export { loadCatalogSnapshot } from './shared/catalog-snapshot';
