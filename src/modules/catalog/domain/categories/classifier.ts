import { normalizeForKeywordMatch } from '../../../../common/utils/text-normalize.utils';
import { CATEGORY_DEFINITIONS, UNCATEGORIZED, type CategoryDefinition } from './definitions';

interface NormalizedCategory {
  name: string;
  keywords: string[];
}

/**
 * Maps product display names to categories by plain substring containment.
 * Keywords are normalized once; results are memoized per exact input string.
 */
export class CategoryClassifier {
  private readonly categories: NormalizedCategory[];
  private readonly memo = new Map<string, string>();

  constructor(definitions: readonly CategoryDefinition[] = CATEGORY_DEFINITIONS) {
    this.categories = definitions.map((definition) => ({
      name: definition.name,
      keywords: definition.keywords.map(normalizeForKeywordMatch),
    }));
  }

  classify(name: string): string {
    const cached = this.memo.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const category = this.match(normalizeForKeywordMatch(name));
    this.memo.set(name, category);
    return category;
  }

  categoryNames(): string[] {
    return this.categories.map((category) => category.name);
  }

  private match(normalizedName: string): string {
    for (const category of this.categories) {
      if (category.keywords.every((keyword) => normalizedName.includes(keyword))) {
        return category.name;
      }
    }

    return UNCATEGORIZED;
  }
}
