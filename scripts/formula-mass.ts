import { createInterface } from 'node:readline';
import { Command } from 'commander';
import { FormulaError, cleanCopy, getElementCounts, getMolecularMass } from 'index';
import { formatFormulaReport } from 'src/cli/formula-report';

interface CliOptions {
  json?: boolean;
  clean?: boolean;
}

function report(input: string, options: CliOptions): void {
  const formula = options.clean ? cleanCopy(input) : input;
  try {
    if (options.json) {
      const result = { formula, mass: getMolecularMass(formula), elements: getElementCounts(formula) };
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(formatFormulaReport(formula).join('\n'));
    }
  } catch (e) {
    if (!(e instanceof FormulaError)) throw e;
    console.error(`Error: ${e.message}`);
    process.exitCode = 1;
  }
}

async function prompt(options: CliOptions): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'Enter molecular formula: ' });
  rl.prompt();
  for await (const line of rl) {
    const formula = line.trim();
    if (formula !== '') {
      report(formula, options);
      console.log();
    }
    rl.prompt();
  }
}

const program = new Command();

program
  .name('formula-mass')
  .description('Molecular mass and element counts of chemical formulas')
  .argument('[formulas...]', 'formulas such as H2SO4 or "Ca(NO3)2"; prompts when omitted')
  .option('--json', 'Output as JSON')
  .option('--clean', 'Drop unrecognized tokens before computing')
  .action(async (formulas: string[], options: CliOptions) => {
    if (formulas.length === 0) {
      await prompt(options);
      return;
    }
    for (const formula of formulas) report(formula, options);
  });

await program.parseAsync(process.argv);
