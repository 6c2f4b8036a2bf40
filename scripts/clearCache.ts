import 'dotenv/config';

import { RecordCache } from '../src/cache';
import { loadConfig } from '../src/config';

// Drop one cached provider, or list the cached keys when no name is given.
async function main() {
  const name = process.argv.slice(2).join(' ').trim();
  const config = loadConfig();
  const cache = await RecordCache.open(config.cacheDir);

  if (!name) {
    const keys = await cache.keys();
    console.log(`${keys.length} cached providers in ${cache.dir}`);
    for (const key of keys) console.log(`  ${key}`);
    return;
  }

  const removed = await cache.invalidate(name);
  console.log(removed ? `Removed cached record for ${name}` : `No cached record for ${name}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
