import { Injectable } from '@nestjs/common';
import { CategoryClassifier } from '../../../domain/categories';
import { countSizesInCategory } from '../../../domain/selection';
import { rankSizes } from '../../../domain/sizes/size-ranker';
import { CatalogCache } from '../../services/catalog-cache';
import { loadCatalogSnapshot } from '../shared/catalog-snapshot';

export interface SizeSummary {
  size: string;
  productCount: number;
}

export interface ListSizesResponse {
  category: string;
  sizes: SizeSummary[];
}

@Injectable()
export class ListSizesUseCase {
  constructor(
    private readonly catalogCache: CatalogCache,
    private readonly classifier: CategoryClassifier,
  ) {}

  async execute(category: string): Promise<ListSizesResponse> {
    const snapshot = await loadCatalogSnapshot(this.catalogCache);
    const counts = countSizesInCategory(snapshot.products, this.classifier, category);

    return {
      category,
      sizes: rankSizes(counts.keys()).map((size) => ({
        size,
        productCount: counts.get(size) ?? 0,
      })),
    };
  }
}
