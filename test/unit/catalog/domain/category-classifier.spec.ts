import * as textNormalize from '@/common/utils/text-normalize.utils';
import {
  CATEGORY_DEFINITIONS,
  CategoryClassifier,
  UNCATEGORIZED,
} from '@/modules/catalog/domain/categories';

describe('CategoryClassifier', () => {
  const classifier = new CategoryClassifier();

  it('matches regardless of case and accents', () => {
    expect(classifier.classify('Camiseta Oveŕsizé Negra')).toBe('Camiseta Oversize');
    expect(classifier.classify('JOGGER cargo - M')).toBe('Jogger');
  });

  it('lets the first declared category win when several match', () => {
    expect(classifier.classify('Hoodie Oversize Fit con Cierre')).toBe('Hoodie Oversize');
    expect(classifier.classify('Camiseta Boxy Fit Polo Original')).toBe(
      'Camiseta Estampado Boxy Fit Original',
    );
  });

  it('matches keywords as plain substrings', () => {
    expect(classifier.classify('Pantaloneta deportiva')).toBe('Pantaloneta');
    expect(classifier.classify('Pantalon recto')).toBe('Pantalones');
    expect(classifier.classify('Set Twofold edición limitada')).toBe('Colección Exclusiva');
  });

  it('requires every keyword of a category', () => {
    expect(classifier.classify('Camiseta Boxy')).toBe(UNCATEGORIZED);
  });

  it('falls back to the uncategorized sentinel', () => {
    expect(classifier.classify('Gorra bordada')).toBe('Sin categoría');
    expect(classifier.classify('')).toBe('Sin categoría');
  });

  it('memoizes results per exact name', () => {
    const normalize = jest.spyOn(textNormalize, 'normalizeForKeywordMatch');
    const local = new CategoryClassifier([{ name: 'Medias', keywords: ['Media'] }]);
    normalize.mockClear();

    try {
      expect(local.classify('Medias tobilleras')).toBe('Medias');
      expect(normalize).toHaveBeenCalledTimes(1);

      expect(local.classify('Medias tobilleras')).toBe('Medias');
      expect(normalize).toHaveBeenCalledTimes(1);

      expect(local.classify('medias tobilleras')).toBe('Medias');
      expect(normalize).toHaveBeenCalledTimes(2);
    } finally {
      normalize.mockRestore();
    }
  });

  it('lists category names in declaration order', () => {
    expect(classifier.categoryNames()).toEqual(CATEGORY_DEFINITIONS.map((item) => item.name));
    expect(classifier.categoryNames()[0]).toBe('Camiseta Oversize');
  });
});
