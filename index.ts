export { tokenize } from 'src/parsers/formula-tokenizer';
export { parseFormula, parseFormulaTokens } from 'src/parser';
export { validateFormula, validateTokens, isAcceptedToken, isValidFormula } from 'src/validators/symbol-validator';
export { getFormulaMass, countAtoms, getMolecularMass, getAtomCount } from 'src/utils/formula-properties';
export { enumerateElements, getElementCounts } from 'src/utils/element-enumerator';
export { cleanCopy } from 'src/utils/clean-copy';
export { formatFormulaReport } from 'src/cli/formula-report';
export { ATOMIC_MASSES, DEFAULT_MAX_NESTING_DEPTH, createMassTable } from 'src/constants';
export {
  FormulaError,
  FormulaErrorKind,
  InvalidTokenError,
  UnknownSymbolError,
  UnbalancedParenthesesError,
  EmptyFormulaError,
  NestingDepthError,
  AtomCountOverflowError,
} from 'src/errors';
export { TokenType } from 'types';
export type {
  Token,
  FormulaNode,
  SymbolNode,
  GroupNode,
  FormulaTree,
  AtomicMassTable,
  ElementCount,
  FormulaOptions,
} from 'types';
