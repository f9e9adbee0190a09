import type { Token } from 'types';
import { TokenType } from 'types';

const isUpper = (ch: string) => ch >= 'A' && ch <= 'Z';
const isLower = (ch: string) => ch >= 'a' && ch <= 'z';
const isDigit = (ch: string) => ch >= '0' && ch <= '9';

/**
 * Scan a formula into tokens, left to right. Never fails: characters that
 * fit no other rule become OTHER tokens and are left for the validator.
 * Whitespace is skipped.
 */
export function tokenize(formula: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const push = (type: TokenType, start: number) => {
    tokens.push({ type, value: formula.slice(start, i), position: start, length: i - start });
  };

  while (i < formula.length) {
    const ch = formula[i];
    const start = i;

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // Element symbol: one uppercase letter, then any lowercase run ("Ca", "Xyz")
    if (isUpper(ch)) {
      i++;
      while (i < formula.length && isLower(formula[i])) i++;
      push(TokenType.ELEMENT, start);
      continue;
    }

    if (isDigit(ch)) {
      while (i < formula.length && isDigit(formula[i])) i++;
      push(TokenType.NUMBER, start);
      continue;
    }

    if (ch === '(' || ch === ')') {
      i++;
      push(ch === '(' ? TokenType.LPAREN : TokenType.RPAREN, start);
      continue;
    }

    // Anything else is a single code point; keep surrogate pairs together
    const codePoint = formula.codePointAt(i) ?? 0;
    i += codePoint > 0xffff ? 2 : 1;
    push(TokenType.OTHER, start);
  }

  return tokens;
}
