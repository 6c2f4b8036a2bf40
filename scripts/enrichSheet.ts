import 'dotenv/config';
import path from 'node:path';

import { loadAllowList } from '../src/allowList';
import { loadConfig } from '../src/config';
import { runBatch } from '../src/pipeline';
import { createPipelineDeps } from '../src/runtime';
import { DEFAULT_WEIGHTS, parseWeights } from '../src/scoring';
import { readProviderRows, writeResults } from '../src/spreadsheet';
import { logProvider, showLoader } from '../src/ui';

// Enrich an existing provider workbook (Name, Address, Phone, Rating,
// Website, Website_2, Website_3, Status columns) and write a ranked copy.
//
//   npx tsx scripts/enrichSheet.ts providers.xlsx [output.xlsx] [--keep-only] [--keywords] [--weights "Mandarin=3,..."]
async function main() {
  const args = process.argv.slice(2);
  const weightsAt = args.indexOf('--weights');
  const weightSpec = weightsAt >= 0 ? args[weightsAt + 1] : undefined;
  const [input, output] = args.filter(
    (arg, i) => !arg.startsWith('--') && (weightsAt < 0 || i !== weightsAt + 1)
  );

  if (!input) {
    console.error(
      'Usage: npx tsx scripts/enrichSheet.ts <input.xlsx> [output.xlsx] [--keep-only] [--keywords] [--weights "Mandarin=3,..."]'
    );
    process.exit(1);
  }

  const config = loadConfig();
  const weights = weightSpec ? parseWeights(weightSpec) : DEFAULT_WEIGHTS;

  const providers = await readProviderRows(input, { onlyKeep: args.includes('--keep-only') });
  console.log(`Loaded ${providers.length} providers from ${input}`);

  const deps = await createPipelineDeps(config, { keywords: args.includes('--keywords') });
  const { entries: allowList } = await loadAllowList();

  const spinner = showLoader('Enriching providers...');
  const rows = await runBatch(providers, deps, {
    weights,
    allowList,
    maxPages: config.maxPages,
    onProgress: (row, index, total) => spinner.update(`[${index + 1}/${total}] ${row.Name}`),
  });
  spinner.succeed(`Enriched ${rows.length} providers`);

  for (const row of rows) logProvider(row);

  const parsed = path.parse(input);
  const outFile = output ?? path.join(parsed.dir, `${parsed.name}_enriched.xlsx`);
  await writeResults(outFile, rows, weights);
  console.log(`\nSaved results to ${outFile}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
