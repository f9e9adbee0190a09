import type { FormulaOptions } from 'types';
import { getMolecularMass } from 'src/utils/formula-properties';
import { enumerateElements } from 'src/utils/element-enumerator';

/**
 * Human-readable summary of a formula: mass to 7 decimals, then one line
 * per element.
 */
export function formatFormulaReport(formula: string, opts: FormulaOptions = {}): string[] {
  const lines = [
    `The molecular mass of ${formula} is ${getMolecularMass(formula, opts).toFixed(7)}`,
    `The elements of ${formula} are:`,
  ];
  for (const { symbol, count } of enumerateElements(formula, opts)) {
    lines.push(`  ${symbol} ${count}`);
  }
  return lines;
}
