import type { AtomicMassTable } from 'types';
import atomicMasses from 'src/data/atomic-masses.json';

const SYMBOL_PATTERN = /^[A-Z][a-z]*$/;

/**
 * Maximum parenthesis nesting accepted by the parser. Evaluators recurse once
 * per group level, so this also bounds their stack depth.
 */
export const DEFAULT_MAX_NESTING_DEPTH = 256;

/**
 * Build an immutable mass table, rejecting malformed symbols and masses.
 */
export function createMassTable(entries: Record<string, number>): AtomicMassTable {
  const table = new Map<string, number>();
  for (const [symbol, mass] of Object.entries(entries)) {
    if (!SYMBOL_PATTERN.test(symbol)) {
      throw new Error(`Invalid element symbol in mass table: '${symbol}'`);
    }
    if (!Number.isFinite(mass) || mass <= 0) {
      throw new Error(`Invalid atomic mass for ${symbol}: ${mass}`);
    }
    table.set(symbol, mass);
  }
  return table;
}

/** Standard atomic masses for H through Mt. */
export const ATOMIC_MASSES: AtomicMassTable = createMassTable(atomicMasses);
