import { describe, it, expect } from 'vitest';
import {
  AtomCountOverflowError,
  EmptyFormulaError,
  FormulaError,
  FormulaErrorKind,
  InvalidTokenError,
  NestingDepthError,
  UnbalancedParenthesesError,
  UnknownSymbolError,
} from 'src/errors';

describe('Formula errors', () => {
  it('should carry kind, position and name', () => {
    const err = new InvalidTokenError('$', 2);
    expect(err).toBeInstanceOf(FormulaError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('InvalidTokenError');
    expect(err.kind).toBe(FormulaErrorKind.INVALID_TOKEN);
    expect(err.token).toBe('$');
    expect(err.message).toBe("Invalid token '$' at position 2");
  });

  it('should omit the position of source-less unknown symbols', () => {
    const err = new UnknownSymbolError('Xx');
    expect(err.position).toBe(-1);
    expect(err.symbol).toBe('Xx');
    expect(err.message).toBe("Unknown element symbol 'Xx'");
  });

  it('should describe structural errors', () => {
    expect(new UnbalancedParenthesesError(4, "Unmatched ')'").message).toBe("Unmatched ')' at position 4");
    expect(new EmptyFormulaError().kind).toBe(FormulaErrorKind.EMPTY_FORMULA);
    expect(new EmptyFormulaError().position).toBe(-1);
    const deep = new NestingDepthError(8, 8);
    expect(deep.maxDepth).toBe(8);
    expect(deep.message).toBe('Group nesting exceeds maximum depth of 8 at position 8');
    const overflow = new AtomCountOverflowError('C');
    expect(overflow.kind).toBe(FormulaErrorKind.COUNT_OVERFLOW);
    expect(overflow.symbol).toBe('C');
  });
});
