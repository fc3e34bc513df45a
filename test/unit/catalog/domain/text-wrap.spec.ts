import { displayTitle, wrapText } from '@/modules/catalog/domain/layout';

describe('wrapText', () => {
  it('wraps greedily on word boundaries', () => {
    expect(wrapText('Camiseta Estampado Boxy Fit Original', 15)).toEqual([
      'Camiseta',
      'Estampado Boxy',
      'Fit Original',
    ]);
  });

  it('splits words longer than the width, filling the current line first', () => {
    expect(wrapText('ab abcdefghij', 5)).toEqual(['ab ab', 'cdefg', 'hij']);
  });

  it('collapses whitespace and ignores empty input', () => {
    expect(wrapText('  Jogger    Cargo  ', 15)).toEqual(['Jogger Cargo']);
    expect(wrapText('   ', 15)).toEqual([]);
  });

  it('treats non positive widths as one character', () => {
    expect(wrapText('abc', 0)).toEqual(['a', 'b', 'c']);
  });
});

describe('displayTitle', () => {
  it('keeps the part before the first hyphen', () => {
    expect(displayTitle('Jogger Cargo Negro - M')).toBe('Jogger Cargo Negro');
    expect(displayTitle('Hoodie Relaxed Fit')).toBe('Hoodie Relaxed Fit');
  });
});
