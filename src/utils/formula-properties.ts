import type { AtomicMassTable, FormulaNode, FormulaOptions, FormulaTree } from 'types';
import { sumBy } from 'es-toolkit';
import { ATOMIC_MASSES } from 'src/constants';
import { AtomCountOverflowError, UnknownSymbolError } from 'src/errors';
import { parseFormula } from 'src/parser';
import { validateFormula } from 'src/validators/symbol-validator';

/**
 * Molecular mass of a tree: each node's mass (atomic or group) times its
 * multiplier, summed. Throws UnknownSymbolError on the first symbol,
 * depth-first, that the table does not know.
 */
export function getFormulaMass(tree: FormulaTree, table: AtomicMassTable = ATOMIC_MASSES): number {
  return sumBy(tree, node => getNodeMass(node, table) * node.multiplier);
}

function getNodeMass(node: FormulaNode, table: AtomicMassTable): number {
  if (node.kind === 'group') {
    return getFormulaMass(node.children, table);
  }
  const mass = table.get(node.symbol);
  if (mass === undefined) {
    throw new UnknownSymbolError(node.symbol, node.position);
  }
  return mass;
}

/**
 * Number of `symbol` atoms in the tree. The queried symbol must be in the
 * table even when the answer would be zero. Counts beyond
 * Number.MAX_SAFE_INTEGER throw AtomCountOverflowError.
 */
export function countAtoms(tree: FormulaTree, symbol: string, table: AtomicMassTable = ATOMIC_MASSES): number {
  if (!table.has(symbol)) {
    throw new UnknownSymbolError(symbol);
  }
  // Multipliers are non-zero, so an overflow anywhere shows in the total
  const count = countInTree(tree, symbol, table);
  if (!Number.isSafeInteger(count)) {
    throw new AtomCountOverflowError(symbol);
  }
  return count;
}

function countInTree(tree: FormulaTree, symbol: string, table: AtomicMassTable): number {
  return sumBy(tree, node => {
    if (node.kind === 'group') {
      return countInTree(node.children, symbol, table) * node.multiplier;
    }
    if (!table.has(node.symbol)) {
      throw new UnknownSymbolError(node.symbol, node.position);
    }
    return node.symbol === symbol ? node.multiplier : 0;
  });
}

export function getMolecularMass(formula: string, opts: FormulaOptions = {}): number {
  const table = opts.table ?? ATOMIC_MASSES;
  validateFormula(formula, table);
  return getFormulaMass(parseFormula(formula, opts), table);
}

export function getAtomCount(formula: string, symbol: string, opts: FormulaOptions = {}): number {
  const table = opts.table ?? ATOMIC_MASSES;
  if (!table.has(symbol)) {
    throw new UnknownSymbolError(symbol);
  }
  validateFormula(formula, table);
  return countAtoms(parseFormula(formula, opts), symbol, table);
}
