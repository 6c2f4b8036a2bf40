import { DEFAULT_WEIGHTS, parseWeights, rescoreProviders } from '../src/scoring';
import { readResults, writeResults } from '../src/spreadsheet';
import { logProvider } from '../src/ui';

/**
 * Re-rank an existing results workbook under different weights. Nothing is
 * fetched and no model is called.
 *
 * Usage:
 *   npx tsx scripts/rescore.ts results.xlsx "Mandarin=5,MSFT Discount=1" [output.xlsx]
 */
async function main() {
  const [input, weightSpec, output] = process.argv.slice(2);
  if (!input) {
    console.error('Usage: npx tsx scripts/rescore.ts <results.xlsx> [weights] [output.xlsx]');
    process.exit(1);
  }

  const weights = weightSpec ? parseWeights(weightSpec) : DEFAULT_WEIGHTS;
  const rows = rescoreProviders(await readResults(input), weights);

  for (const row of rows) logProvider(row);

  const outFile = output ?? input;
  await writeResults(outFile, rows, weights);
  console.log(`\nSaved results to ${outFile}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
