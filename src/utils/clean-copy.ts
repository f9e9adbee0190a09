import type { AtomicMassTable } from 'types';
import { ATOMIC_MASSES } from 'src/constants';
import { tokenize } from 'src/parsers/formula-tokenizer';
import { isAcceptedToken } from 'src/validators/symbol-validator';

/**
 * Copy of the formula with every rejected token dropped. Parentheses are
 * not rebalanced, so the result may still fail to parse.
 */
export function cleanCopy(formula: string, table: AtomicMassTable = ATOMIC_MASSES): string {
  return tokenize(formula)
    .filter(token => isAcceptedToken(token, table))
    .map(token => token.value)
    .join('');
}
