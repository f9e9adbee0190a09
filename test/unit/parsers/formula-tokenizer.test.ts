import { describe, it, expect } from 'vitest';
import { tokenize } from 'src/parsers/formula-tokenizer';
import { TokenType } from 'types';

describe('Formula Tokenizer', () => {
  it('should split a grouped formula into symbols, digits and parentheses', () => {
    const tokens = tokenize('Ca(NO3)2');
    expect(tokens.map(t => t.value)).toEqual(['Ca', '(', 'N', 'O', '3', ')', '2']);
    expect(tokens.map(t => t.type)).toEqual([
      TokenType.ELEMENT,
      TokenType.LPAREN,
      TokenType.ELEMENT,
      TokenType.ELEMENT,
      TokenType.NUMBER,
      TokenType.RPAREN,
      TokenType.NUMBER,
    ]);
  });

  it('should record source positions and lengths', () => {
    const tokens = tokenize('Ca(NO3)2');
    expect(tokens.map(t => t.position)).toEqual([0, 2, 3, 4, 5, 6, 7]);
    expect(tokens[0]).toEqual({ type: TokenType.ELEMENT, value: 'Ca', position: 0, length: 2 });
  });

  it('should take maximal lowercase runs and digit runs', () => {
    const tokens = tokenize('Xyz12');
    expect(tokens).toEqual([
      { type: TokenType.ELEMENT, value: 'Xyz', position: 0, length: 3 },
      { type: TokenType.NUMBER, value: '12', position: 3, length: 2 },
    ]);
  });

  it('should treat consecutive capitals as separate symbols', () => {
    expect(tokenize('CO').map(t => t.value)).toEqual(['C', 'O']);
    expect(tokenize('Co').map(t => t.value)).toEqual(['Co']);
  });

  it('should skip whitespace', () => {
    const tokens = tokenize('H2 O');
    expect(tokens.map(t => t.value)).toEqual(['H', '2', 'O']);
    expect(tokens.map(t => t.position)).toEqual([0, 1, 3]);
    expect(tokenize('  \t\n')).toEqual([]);
  });

  it('should keep unrecognized characters as OTHER tokens', () => {
    const tokens = tokenize('H2$O');
    expect(tokens[2]).toEqual({ type: TokenType.OTHER, value: '$', position: 2, length: 1 });
    expect(tokenize('h2o').map(t => t.type)).toEqual([TokenType.OTHER, TokenType.NUMBER, TokenType.OTHER]);
  });

  it('should keep astral characters in a single token', () => {
    const tokens = tokenize('H\u{1F600}');
    expect(tokens).toHaveLength(2);
    expect(tokens[1]).toEqual({ type: TokenType.OTHER, value: '\u{1F600}', position: 1, length: 2 });
  });

  it('should return no tokens for an empty string', () => {
    expect(tokenize('')).toEqual([]);
  });

  it('should be deterministic', () => {
    expect(tokenize('K4(Fe(CN)6)')).toEqual(tokenize('K4(Fe(CN)6)'));
  });
});
