import type { FormulaNode, FormulaOptions, FormulaTree, Token } from 'types';
import { TokenType } from 'types';
import { DEFAULT_MAX_NESTING_DEPTH } from './constants';
import { tokenize } from './parsers/formula-tokenizer';
import {
  EmptyFormulaError,
  InvalidTokenError,
  NestingDepthError,
  UnbalancedParenthesesError,
} from './errors';

export function parseFormula(formula: string, options: FormulaOptions = {}): FormulaTree {
  return parseFormulaTokens(tokenize(formula), options);
}

/**
 * Build a formula tree from tokens. Purely structural: unknown symbols
 * become ordinary symbol nodes. Groups are tracked on an explicit stack,
 * so nesting depth is limited only by `maxDepth`.
 */
export function parseFormulaTokens(tokens: readonly Token[], options: FormulaOptions = {}): FormulaTree {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_NESTING_DEPTH;

  if (tokens.length === 0) {
    throw new EmptyFormulaError();
  }

  if (process.env.VERBOSE) {
    console.log('[formula-parser] Tokens:', tokens.map(t => t.value).join(' '));
  }

  const root: FormulaNode[] = [];
  // Each open group remembers the node list it will be appended to
  const groupStack: { parent: FormulaNode[]; open: Token }[] = [];
  let current = root;
  let i = 0;

  // Consume the digit run directly after a symbol or ')', if any. Digits
  // separated by whitespace are left for the loop to reject.
  const readMultiplier = (prev: Token): number => {
    const next = tokens[i];
    if (next === undefined || next.type !== TokenType.NUMBER) return 1;
    if (next.position !== prev.position + prev.length) return 1;
    i++;
    const value = Number(next.value);
    if (value < 1 || !Number.isSafeInteger(value)) {
      throw new InvalidTokenError(next.value, next.position, 'Invalid multiplier');
    }
    return value;
  };

  while (i < tokens.length) {
    const token = tokens[i];
    i++;

    switch (token.type) {
      case TokenType.ELEMENT: {
        current.push({
          kind: 'symbol',
          symbol: token.value,
          multiplier: readMultiplier(token),
          position: token.position,
        });
        break;
      }

      case TokenType.LPAREN: {
        if (groupStack.length >= maxDepth) {
          throw new NestingDepthError(maxDepth, token.position);
        }
        groupStack.push({ parent: current, open: token });
        current = [];
        break;
      }

      case TokenType.RPAREN: {
        const frame = groupStack.pop();
        if (!frame) {
          throw new UnbalancedParenthesesError(token.position, "Unmatched ')'");
        }
        frame.parent.push({
          kind: 'group',
          children: current,
          multiplier: readMultiplier(token),
          position: frame.open.position,
        });
        current = frame.parent;
        break;
      }

      case TokenType.NUMBER:
        // Digits not attached to a symbol or a group, e.g. "2H", "(2)" or "H 2"
        throw new InvalidTokenError(token.value, token.position, 'Unexpected multiplier');

      case TokenType.OTHER:
        throw new InvalidTokenError(token.value, token.position);
    }
  }

  const unclosed = groupStack.pop();
  if (unclosed) {
    throw new UnbalancedParenthesesError(unclosed.open.position, "Unclosed '('");
  }

  return root;
}
