import type { AtomicMassTable, Token } from 'types';
import { TokenType } from 'types';
import { ATOMIC_MASSES } from 'src/constants';
import { tokenize } from 'src/parsers/formula-tokenizer';
import { EmptyFormulaError, FormulaError, InvalidTokenError, UnknownSymbolError } from 'src/errors';

const LETTER = /^\p{L}$/u;

/**
 * Whether a token may appear in a formula: parentheses, digit runs and
 * element symbols present in the table.
 */
export function isAcceptedToken(token: Token, table: AtomicMassTable = ATOMIC_MASSES): boolean {
  switch (token.type) {
    case TokenType.LPAREN:
    case TokenType.RPAREN:
    case TokenType.NUMBER:
      return true;
    case TokenType.ELEMENT:
      return table.has(token.value);
    case TokenType.OTHER:
      return false;
  }
}

/**
 * Check every token against the table, throwing on the first rejected one.
 * Alphabetic tokens (well-formed symbols as well as stray letters such as a
 * lowercase 'h') raise UnknownSymbolError, anything else InvalidTokenError.
 */
export function validateTokens(tokens: readonly Token[], table: AtomicMassTable = ATOMIC_MASSES): void {
  if (tokens.length === 0) {
    throw new EmptyFormulaError();
  }

  for (const token of tokens) {
    if (isAcceptedToken(token, table)) continue;

    if (process.env.VERBOSE) {
      console.log(`[symbol-validator] Rejected ${token.type} token '${token.value}' at position ${token.position}`);
    }

    if (token.type === TokenType.ELEMENT || LETTER.test(token.value)) {
      throw new UnknownSymbolError(token.value, token.position);
    }
    throw new InvalidTokenError(token.value, token.position);
  }
}

export function validateFormula(formula: string, table: AtomicMassTable = ATOMIC_MASSES): void {
  validateTokens(tokenize(formula), table);
}

/**
 * Non-throwing form of validateFormula. Note this does not mean the
 * formula parses: parentheses and multipliers are not checked here.
 */
export function isValidFormula(formula: string, table: AtomicMassTable = ATOMIC_MASSES): boolean {
  try {
    validateFormula(formula, table);
    return true;
  } catch (e) {
    if (e instanceof FormulaError) return false;
    throw e;
  }
}
