import 'dotenv/config';
import path from 'node:path';

import { createPlacesClient } from '../src/agents/placesSearch';
import { loadAllowList } from '../src/allowList';
import { loadConfig } from '../src/config';
import { runBatch } from '../src/pipeline';
import { createPipelineDeps } from '../src/runtime';
import { DEFAULT_WEIGHTS, parseWeights } from '../src/scoring';
import { writeResults } from '../src/spreadsheet';
import { logProvider, showLoader } from '../src/ui';

const OUTPUT_DIR = 'demo outputs';

function parseIntArg(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function safeName(input: string): string {
  return input.trim().replace(/[^\p{L}\p{N}]+/gu, '_').replace(/^_+|_+$/g, '');
}

function flagValue(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i >= 0 ? args[i + 1] : undefined;
}

/**
 * Search for providers around an address, enrich each one from its website and
 * write the ranked workbook.
 *
 * Usage:
 *   npx tsx scripts/pipeline.ts "<address>" [radiusMeters] [maxResults]
 *     [--keywords] [--weights "Mandarin=3,MSFT Discount=5"] [--out file.xlsx]
 */
async function main() {
  const args = process.argv.slice(2);
  const positional: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    if (args[i] === '--weights' || args[i] === '--out') i += 1;
    else if (!args[i].startsWith('--')) positional.push(args[i]);
  }
  const [address, radiusArg, maxArg] = positional;

  if (!address) {
    console.error(
      'Usage: npx tsx scripts/pipeline.ts "<address>" [radiusMeters] [maxResults] [--keywords] [--weights "Mandarin=3,..."] [--out file]'
    );
    process.exit(1);
  }

  const config = loadConfig();
  const weightSpec = flagValue(args, '--weights');
  const weights = weightSpec ? parseWeights(weightSpec) : DEFAULT_WEIGHTS;
  const radiusMeters = parseIntArg(radiusArg, 5000);
  const limit = parseIntArg(maxArg, 20);

  const places = createPlacesClient({ apiKey: config.googleMapsApiKey });
  const searching = showLoader(`Searching providers near ${address}...`);
  const found = await places.searchProviders(address, { radiusMeters, limit });
  if (found.error) {
    searching.fail(found.error);
    process.exit(1);
  }
  searching.succeed(`Found ${found.candidates.length} providers`);

  const deps = await createPipelineDeps(config, { keywords: args.includes('--keywords') });
  const { entries: allowList } = await loadAllowList();

  const enriching = showLoader('Enriching providers...');
  const rows = await runBatch(found.candidates, deps, {
    weights,
    allowList,
    maxPages: config.maxPages,
    onProgress: (row, index, total) => enriching.update(`[${index + 1}/${total}] ${row.Name}`),
  });
  enriching.succeed(`Enriched ${rows.length} providers`);

  for (const row of rows) logProvider(row);

  const outFile =
    flagValue(args, '--out') ?? path.join(OUTPUT_DIR, `${safeName(address)}_providers.xlsx`);
  await writeResults(outFile, rows, weights);
  console.log(`\nSaved results to ${outFile}`);
}

main().catch((err) => {
  console.error('Pipeline failed:', err);
  process.exit(1);
});
