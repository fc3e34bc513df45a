import type { CategoryClassifier } from '../categories';
import type { Product } from '../product';
import { compareCodePoints } from '../sizes/size-ranker';

/**
 * Products of one category with exactly the given size label, sorted by color
 * (lower-cased, ascending). The sort is stable, so source order breaks ties.
 */
export function selectProductsForSize(
  products: readonly Product[],
  classifier: CategoryClassifier,
  category: string,
  size: string,
): Product[] {
  return products
    .filter((product) => product.size === size && classifier.classify(product.name) === category)
    .sort((left, right) => compareCodePoints(left.color.toLowerCase(), right.color.toLowerCase()));
}

export function countProductsByCategory(
  products: readonly Product[],
  classifier: CategoryClassifier,
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const product of products) {
    const category = classifier.classify(product.name);
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  return counts;
}

export function countSizesInCategory(
  products: readonly Product[],
  classifier: CategoryClassifier,
  category: string,
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const product of products) {
    if (classifier.classify(product.name) !== category) {
      continue;
    }
    counts.set(product.size, (counts.get(product.size) ?? 0) + 1);
  }

  return counts;
}
