import { cleanCopy, enumerateElements, getAtomCount, getMolecularMass, parseFormula } from 'index';

console.log('molform Formula Examples');
console.log('========================\n');

const formula = 'Be3Al2(SiO3)6';

console.log('Formula:', formula);
console.log('Tree:', JSON.stringify(parseFormula(formula)));
console.log();

console.log(`getMolecularMass('${formula}') =`, getMolecularMass(formula).toFixed(4));
console.log(`getAtomCount('${formula}', 'O') =`, getAtomCount(formula, 'O'));
console.log();

console.log('Elements:');
for (const { symbol, count } of enumerateElements(formula)) {
  console.log(`  ${symbol}: ${count}`);
}
console.log();

// Unrecognized tokens are dropped, parentheses are left as they are
const dirty = 'Ca(N$O3)2';
console.log(`cleanCopy('${dirty}') =`, cleanCopy(dirty));
