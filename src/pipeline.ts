import type { Aggregator } from './agents/aggregator';
import type { RecordExtractor } from './agents/extractor';
import type { RecordCache } from './cache';
import { defaultRecord } from './record';
import { checkDiscountEligible, classifyType, computeScore, rankProviders } from './scoring';
import type {
  AggregatedContent,
  CacheMetadata,
  ExtractedRecord,
  ExtractionMode,
  ProviderCandidate,
  ScoredProvider,
  WeightConfig,
} from './types';
import { log } from './ui';
import { dedupeStrings, errorMessage, normalizeUrl } from './utils';

export const DEFAULT_MAX_PAGES = 5;

export type PipelineDeps = {
  aggregator: Aggregator;
  extractor: RecordExtractor;
  cache: RecordCache;
};

export type EnrichmentSource = 'cache' | 'extracted' | 'fallback' | 'no-website' | 'no-content';

export type EnrichmentResult = {
  record: ExtractedRecord;
  source: EnrichmentSource;
  status: string;
  metadata?: CacheMetadata;
};

/** Website, Website_2, Website_3 → normalized, deduplicated URL list. */
export function providerWebsites(...values: Array<string | null | undefined>): string[] {
  return dedupeStrings(
    values
      .map((value) => (value ? normalizeUrl(value) : null))
      .filter((url): url is string => Boolean(url))
  );
}

function extractionModeOf(aggregate: AggregatedContent): ExtractionMode {
  if (aggregate.mode === 'url-list') return 'multi-source';
  return aggregate.pages.length > 1 ? 'multi-page' : 'single-page';
}

/**
 * Cache first; otherwise aggregate the provider's website(s), summarize, and
 * store the outcome. Providers without websites or without any fetchable text
 * get the default record and are not cached, so a later run tries again.
 */
export async function enrichProvider(
  provider: Pick<ProviderCandidate, 'name' | 'websites'>,
  { aggregator, extractor, cache }: PipelineDeps,
  { maxPages = DEFAULT_MAX_PAGES }: { maxPages?: number } = {}
): Promise<EnrichmentResult> {
  const cached = await cache.lookup(provider.name);
  if (cached) {
    log.debug(`[pipeline] cache hit for ${provider.name}`);
    return { record: cached, source: 'cache', status: 'cached' };
  }

  const websites = providerWebsites(...provider.websites);
  if (websites.length === 0) {
    return { record: defaultRecord(), source: 'no-website', status: 'No website' };
  }

  const aggregate =
    websites.length === 1
      ? await aggregator.aggregateFromSite(websites[0], { maxPages })
      : await aggregator.aggregateFromUrlList(websites, provider.name);

  if (!aggregate.combinedText) {
    log.warn(`[pipeline] no content for ${provider.name}`);
    return { record: defaultRecord(), source: 'no-content', status: 'No content' };
  }

  const mode = extractionModeOf(aggregate);
  const outcome = await extractor.extract({
    text: aggregate.combinedText,
    sourceUrls: aggregate.scrapedUrls,
    mode,
  });

  const metadata: CacheMetadata = {
    scraping_method: mode,
    ...(aggregate.mode === 'url-list'
      ? { total_urls_provided: websites.length }
      : { pages_scraped: aggregate.pages.length }),
    scraped_urls: aggregate.scrapedUrls,
    failed_urls: aggregate.failedUrls,
    total_text_length: aggregate.combinedText.length,
  };

  await cache.store(provider.name, outcome.record, metadata, {
    text: aggregate.combinedText,
    urls: aggregate.scrapedUrls,
    methods: dedupeStrings(aggregate.pages.map((page) => page.method)),
  });

  if (!outcome.ok) {
    return {
      record: outcome.record,
      source: 'fallback',
      status: `Extraction failed: ${outcome.error ?? 'unknown error'}`,
      metadata,
    };
  }
  return { record: outcome.record, source: 'extracted', status: 'ok', metadata };
}

export type BatchOptions = {
  weights: WeightConfig;
  allowList: string[];
  maxProviders?: number;
  maxPages?: number;
  onProgress?: (row: ScoredProvider, index: number, total: number) => void;
};

/**
 * Enrich and score providers one at a time. A provider that fails is kept
 * with default values and the failure in its Status; the batch carries on.
 */
export async function runBatch(
  providers: ProviderCandidate[],
  deps: PipelineDeps,
  { weights, allowList, maxProviders, maxPages, onProgress }: BatchOptions
): Promise<ScoredProvider[]> {
  const selected = maxProviders !== undefined ? providers.slice(0, maxProviders) : providers;
  const rows: ScoredProvider[] = [];

  for (const [index, provider] of selected.entries()) {
    const MSFTDiscount = checkDiscountEligible(provider.name, allowList);

    let record: ExtractedRecord;
    let status: string;
    try {
      const result = await enrichProvider(provider, deps, { maxPages });
      record = result.record;
      status = result.status;
    } catch (e) {
      log.error(`[pipeline] ${provider.name}: ${errorMessage(e)}`);
      record = defaultRecord();
      status = `Error: ${errorMessage(e)}`;
    }

    const row: ScoredProvider = {
      Rank: 0,
      Name: provider.name,
      Address: provider.address,
      Phone: provider.phone,
      Rating: provider.rating,
      Website: provider.websites[0] ?? '',
      Distance: provider.distance,
      Type: classifyType(provider.name),
      MSFTDiscount,
      ...record,
      Score: computeScore({ ...record, MSFTDiscount }, weights),
      Status: status,
    };
    rows.push(row);
    onProgress?.(row, index, selected.length);
  }

  return rankProviders(rows);
}
