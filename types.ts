// Core types for chemical formula parsing

export enum TokenType {
  ELEMENT = 'element', // e.g. 'Ca', 'O', or an unknown 'Xx'
  NUMBER = 'number', // digit run
  LPAREN = 'lparen',
  RPAREN = 'rparen',
  OTHER = 'other', // any other single non-whitespace character
}

/**
 * Lexical unit of a formula.
 * `value` is the exact source text, so concatenating token values
 * reproduces the input minus whitespace.
 */
export interface Token {
  type: TokenType;
  value: string;
  position: number; // character position in formula string (0-based)
  length: number;
}

/**
 * Element symbol leaf. The symbol is not checked against any mass table
 * at parse time.
 */
export interface SymbolNode {
  kind: 'symbol';
  symbol: string;
  multiplier: number; // >= 1, 1 when no digits follow
  position?: number; // source offset, absent on hand-built trees
}

/**
 * Parenthesized sub-formula. Owns its children exclusively.
 */
export interface GroupNode {
  kind: 'group';
  children: FormulaTree;
  multiplier: number;
  position?: number; // offset of the opening '('
}

export type FormulaNode = SymbolNode | GroupNode;

/**
 * Formula tree, nodes in left-to-right source order.
 * Trees are built fresh per computation and never mutated.
 */
export type FormulaTree = readonly FormulaNode[];

/** Element symbol -> atomic mass (u). */
export type AtomicMassTable = ReadonlyMap<string, number>;

export interface ElementCount {
  symbol: string;
  count: number;
}

export interface FormulaOptions {
  table?: AtomicMassTable; // default ATOMIC_MASSES
  maxDepth?: number; // maximum group nesting, default DEFAULT_MAX_NESTING_DEPTH
}
