export const CANONICAL_SIZE_ORDER: readonly string[] = [
  'XXS',
  'XS',
  'S',
  'M',
  'L',
  'XL',
  'XXL',
  'XXXL',
];

const CANONICAL_POSITION = new Map(CANONICAL_SIZE_ORDER.map((size, index) => [size, index]));

/**
 * Orders size labels for display: canonical labels first by garment scale,
 * then everything else in code-point order.
 */
export function rankSizes(sizes: Iterable<string>): string[] {
  const known: string[] = [];
  const unknown: string[] = [];

  for (const size of new Set(sizes)) {
    if (CANONICAL_POSITION.has(size)) {
      known.push(size);
    } else {
      unknown.push(size);
    }
  }

  known.sort((left, right) => (CANONICAL_POSITION.get(left) ?? 0) - (CANONICAL_POSITION.get(right) ?? 0));
  unknown.sort(compareCodePoints);

  return [...known, ...unknown];
}

export function compareCodePoints(left: string, right: string): number {
  if (left < right) {
    return -1;
  }

  return left > right ? 1 : 0;
}
