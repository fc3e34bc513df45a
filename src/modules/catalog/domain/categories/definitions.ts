export interface CategoryDefinition {
  readonly name: string;
  readonly keywords: readonly string[];
}

export const UNCATEGORIZED = 'Sin categoría';

/**
 * Declaration order is the tie-break: several categories share keywords, and the first
 * definition whose keywords all appear in the product name wins.
 */
export const CATEGORY_DEFINITIONS: readonly CategoryDefinition[] = [
  { name: 'Camiseta Oversize', keywords: ['Camiseta', 'Oversize'] },
  { name: 'Camiseta Estampado Boxy Fit Original', keywords: ['Camiseta', 'Boxy', 'Fit', 'Original'] },
  { name: 'Camiseta Estampado Boxy Fit Premium', keywords: ['Camiseta', 'Boxy', 'Fit', 'Premium'] },
  { name: 'Jogger', keywords: ['Jogger'] },
  { name: 'Hoodie Oversize', keywords: ['Hoodie', 'Oversize Fit'] },
  { name: 'Hoodie Oversize con Cierre', keywords: ['Hoodie Oversize', 'con Cierre'] },
  { name: 'Pantaloneta', keywords: ['Pantaloneta'] },
  { name: 'Hoodie Relaxed Fit', keywords: ['Hoodie', 'Relaxed'] },
  { name: 'Camiseta Boxy Polo', keywords: ['Camiseta', 'Boxy', 'Polo'] },
  { name: 'Colección Exclusiva', keywords: ['Twofold'] },
  { name: 'Pantalones', keywords: ['Pantalon'] },
];
