import { describe, expect, it } from 'vitest';
import { normalizeSpelling, removeParensFromWord } from '../dictionary/spelling.js';

describe('removeParensFromWord', () => {
  it('strips a numeric disambiguation suffix', () => {
    expect(removeParensFromWord('LEAD(2)')).toBe('LEAD');
    expect(removeParensFromWord('LEAD(12)')).toBe('LEAD');
  });

  it('leaves words without a suffix alone', () => {
    expect(removeParensFromWord('LEAD')).toBe('LEAD');
    expect(removeParensFromWord('LEAD(2')).toBe('LEAD(2');
  });

  it('strips any parenthesized tail past index 0', () => {
    expect(removeParensFromWord('A(B)')).toBe('A');
  });

  it('keeps a parenthesis at index 0', () => {
    expect(removeParensFromWord('(2)')).toBe('(2)');
    expect(removeParensFromWord('(PAREN)')).toBe('(PAREN)');
  });

  it('cuts at the last open parenthesis', () => {
    expect(removeParensFromWord('X(Y)(3)')).toBe('X(Y)');
  });
});

describe('normalizeSpelling', () => {
  it('lowercases after stripping', () => {
    expect(normalizeSpelling('LEAD(2)')).toBe('lead');
    expect(normalizeSpelling('Lead')).toBe('lead');
  });

  it('is idempotent', () => {
    const once = normalizeSpelling('ZERO(2)');
    expect(normalizeSpelling(once)).toBe(once);
  });
});
