import { describe, it, expect } from 'vitest';
import { cleanCopy } from 'src/utils/clean-copy';
import { createMassTable } from 'src/constants';

describe('cleanCopy', () => {
  it('should leave valid formulas unchanged', () => {
    expect(cleanCopy('Ca(NO3)2')).toBe('Ca(NO3)2');
  });

  it('should drop invalid characters and unknown symbols', () => {
    expect(cleanCopy('H2$O')).toBe('H2O');
    expect(cleanCopy('XxH2O')).toBe('H2O');
    expect(cleanCopy('h2o')).toBe('2');
  });

  it('should drop whitespace', () => {
    expect(cleanCopy('H2 O')).toBe('H2O');
  });

  it('should not rebalance parentheses', () => {
    expect(cleanCopy('(H2O')).toBe('(H2O');
    expect(cleanCopy('H2O))')).toBe('H2O))');
  });

  it('should join digit runs split by removed tokens', () => {
    expect(cleanCopy('H2$3')).toBe('H23');
  });

  it('should return an empty string when nothing survives', () => {
    expect(cleanCopy('')).toBe('');
    expect(cleanCopy('$%&')).toBe('');
  });

  it('should be idempotent', () => {
    const inputs = ['H2$O', 'Ca(NO3)2', 'XxH2O', 'H2$3', 'h2o', ' (Fe$Cl3 ', 'Qq2(Xx)Na', 'C\u{1F600}l', ''];
    for (const formula of inputs) {
      const once = cleanCopy(formula);
      expect(cleanCopy(once)).toBe(once);
    }
  });

  it('should filter against a custom table', () => {
    const table = createMassTable({ Xx: 5 });
    expect(cleanCopy('XxH2', table)).toBe('Xx2');
  });
});
