import type { ElementCount, FormulaOptions } from 'types';
import { TokenType } from 'types';
import { uniq } from 'es-toolkit';
import { ATOMIC_MASSES } from 'src/constants';
import { tokenize } from 'src/parsers/formula-tokenizer';
import { parseFormula } from 'src/parser';
import { countAtoms } from 'src/utils/formula-properties';

/**
 * Distinct element symbols of a formula with their total atom counts,
 * sorted by symbol.
 *
 * The result is restartable: each iteration re-tokenizes and re-parses the
 * formula, and nothing is computed until iteration begins. Parse errors
 * and unknown symbols surface as exceptions from the iterator.
 */
export function enumerateElements(formula: string, opts: FormulaOptions = {}): Iterable<ElementCount> {
  const table = opts.table ?? ATOMIC_MASSES;
  return {
    *[Symbol.iterator]() {
      const symbols = uniq(
        tokenize(formula)
          .filter(t => t.type === TokenType.ELEMENT)
          .map(t => t.value),
      ).sort();
      const tree = parseFormula(formula, opts);

      if (process.env.VERBOSE) {
        console.log(`[element-enumerator] ${formula}: ${symbols.join(', ')}`);
      }

      for (const symbol of symbols) {
        yield { symbol, count: countAtoms(tree, symbol, table) };
      }
    },
  };
}

export function getElementCounts(formula: string, opts: FormulaOptions = {}): ElementCount[] {
  return [...enumerateElements(formula, opts)];
}
