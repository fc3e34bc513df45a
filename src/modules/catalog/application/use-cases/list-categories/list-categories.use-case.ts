import { Injectable } from '@nestjs/common';
import { CategoryClassifier, UNCATEGORIZED } from '../../../domain/categories';
import { countProductsByCategory } from '../../../domain/selection';
import { CatalogCache } from '../../services/catalog-cache';
import { loadCatalogSnapshot } from '../shared/catalog-snapshot';

export interface CategorySummary {
  name: string;
  productCount: number;
}

export interface ListCategoriesResponse {
  categories: CategorySummary[];
  uncategorizedCount: number;
  /** ISO timestamp of the catalog read backing this answer. */
  fetchedAt: string;
}

@Injectable()
export class ListCategoriesUseCase {
  constructor(
    private readonly catalogCache: CatalogCache,
    private readonly classifier: CategoryClassifier,
  ) {}

  async execute(): Promise<ListCategoriesResponse> {
    const snapshot = await loadCatalogSnapshot(this.catalogCache);
    const counts = countProductsByCategory(snapshot.products, this.classifier);

    const categories = this.classifier
      .categoryNames()
      .map((name) => ({ name, productCount: counts.get(name) ?? 0 }))
      .filter((category) => category.productCount > 0);

    return {
      categories,
      uncategorizedCount: counts.get(UNCATEGORIZED) ?? 0,
      fetchedAt: new Date(snapshot.fetchedAt).toISOString(),
    };
  }
}
