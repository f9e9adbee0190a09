export enum FormulaErrorKind {
  INVALID_TOKEN = 'invalid-token',
  UNKNOWN_SYMBOL = 'unknown-symbol',
  UNBALANCED_PARENTHESES = 'unbalanced-parentheses',
  EMPTY_FORMULA = 'empty-formula',
  NESTING_TOO_DEEP = 'nesting-too-deep',
  COUNT_OVERFLOW = 'count-overflow',
}

/**
 * Base class for everything the tokenizer, validator, parser and
 * evaluators reject. `position` is the 0-based offset in the formula
 * string, or -1 when the error is not tied to the source.
 */
export class FormulaError extends Error {
  readonly kind: FormulaErrorKind;
  readonly position: number;

  constructor(kind: FormulaErrorKind, message: string, position = -1) {
    super(message);
    this.name = 'FormulaError';
    this.kind = kind;
    this.position = position;
  }
}

/** A character that is not part of a symbol, a digit run or a parenthesis. */
export class InvalidTokenError extends FormulaError {
  readonly token: string;

  constructor(token: string, position: number, reason = 'Invalid token') {
    super(FormulaErrorKind.INVALID_TOKEN, `${reason} '${token}' at position ${position}`, position);
    this.name = 'InvalidTokenError';
    this.token = token;
  }
}

/** Alphabetic token missing from the atomic mass table. */
export class UnknownSymbolError extends FormulaError {
  readonly symbol: string;

  constructor(symbol: string, position = -1) {
    super(
      FormulaErrorKind.UNKNOWN_SYMBOL,
      position >= 0
        ? `Unknown element symbol '${symbol}' at position ${position}`
        : `Unknown element symbol '${symbol}'`,
      position,
    );
    this.name = 'UnknownSymbolError';
    this.symbol = symbol;
  }
}

export class UnbalancedParenthesesError extends FormulaError {
  constructor(position: number, detail: string) {
    super(FormulaErrorKind.UNBALANCED_PARENTHESES, `${detail} at position ${position}`, position);
    this.name = 'UnbalancedParenthesesError';
  }
}

export class EmptyFormulaError extends FormulaError {
  constructor() {
    super(FormulaErrorKind.EMPTY_FORMULA, 'Formula contains no tokens');
    this.name = 'EmptyFormulaError';
  }
}

export class NestingDepthError extends FormulaError {
  readonly maxDepth: number;

  constructor(maxDepth: number, position: number) {
    super(
      FormulaErrorKind.NESTING_TOO_DEEP,
      `Group nesting exceeds maximum depth of ${maxDepth} at position ${position}`,
      position,
    );
    this.name = 'NestingDepthError';
    this.maxDepth = maxDepth;
  }
}

/** Atom count too large to represent exactly as a number. */
export class AtomCountOverflowError extends FormulaError {
  readonly symbol: string;

  constructor(symbol: string) {
    super(FormulaErrorKind.COUNT_OVERFLOW, `Atom count for '${symbol}' exceeds ${Number.MAX_SAFE_INTEGER}`);
    this.name = 'AtomCountOverflowError';
    this.symbol = symbol;
  }
}
