import 'dotenv/config';

import { loadConfig } from '../src/config';
import { enrichProvider } from '../src/pipeline';
import { createPipelineDeps } from '../src/runtime';

/**
 * Scrape and summarize one provider website, ignoring any cached record.
 *
 * Usage:
 *   npx tsx scripts/testSingleWebsite.ts <url> [name] [--keywords]
 */
async function main() {
  const args = process.argv.slice(2);
  const [url, name = url] = args.filter((arg) => !arg.startsWith('--'));
  if (!url) {
    console.error('Usage: npx tsx scripts/testSingleWebsite.ts <url> [name] [--keywords]');
    process.exit(1);
  }

  const config = loadConfig();
  const deps = await createPipelineDeps(config, { keywords: args.includes('--keywords') });
  await deps.cache.invalidate(name);

  console.log(`Fetching ${url} ...`);
  const result = await enrichProvider({ name, websites: [url] }, deps, {
    maxPages: config.maxPages,
  });

  console.log(`\nStatus: ${result.status} (${result.source})`);
  if (result.metadata) {
    console.log('\nScrape summary:');
    console.dir(result.metadata, { depth: null });
  }
  console.log('\nExtracted record:\n');
  console.log(JSON.stringify(result.record, null, 2));
  console.log(`\nRaw text saved to ${deps.cache.textPath(name)}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
