import {
  discoverLinks,
  filterRelevant,
  DEFAULT_LINK_RULES,
  type LinkRules,
} from '../tools/discoverLinks';
import type { PageFetcher, SmartFetchResult } from '../tools/fetchPage';
import type { AggregatedContent, PageContent, PageRole } from '../types';
import { log } from '../ui';
import { sleep as defaultSleep, type Sleep } from '../utils';

export const MIN_PAGE_TEXT = 200;
export const DEFAULT_PAGE_DELAY_MS = 500;

export type AggregatorOptions = {
  fetcher: PageFetcher;
  rules?: LinkRules;
  delayMs?: number;
  sleep?: Sleep;
};

export const sourceHeader = (url: string) => `=== SOURCE: ${url} ===`;

export function combinePages(pages: PageContent[]): string {
  return pages.map((page) => `${sourceHeader(page.url)}\n${page.text}`).join('\n\n');
}

const toPage = (fetched: SmartFetchResult, role: PageRole): PageContent => ({
  url: fetched.url,
  text: fetched.text,
  method: fetched.method,
  length: fetched.text.length,
  role,
});

export function createAggregator(options: AggregatorOptions) {
  const { fetcher } = options;
  const rules = options.rules ?? DEFAULT_LINK_RULES;
  const delayMs = options.delayMs ?? DEFAULT_PAGE_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;

  const pause = async () => {
    if (delayMs > 0) await sleep(delayMs);
  };

  /**
   * Homepage plus up to `maxPages - 1` discovered subpages, priority links
   * first. Subpages with too little text are skipped, never retried.
   */
  const aggregateFromSite = async (
    baseUrl: string,
    { maxPages }: { maxPages: number }
  ): Promise<AggregatedContent> => {
    const pages: PageContent[] = [];
    const failedUrls: string[] = [];

    const home = await fetcher.fetchSmart(baseUrl);
    if (home.text) {
      pages.push(toPage(home, 'homepage'));
    } else {
      failedUrls.push(baseUrl);
      log.warn(`[aggregate] homepage ${baseUrl} returned no text (${home.error ?? home.method})`);
    }

    const budget = Math.max(0, Math.floor(maxPages) - 1);
    const unreachable = home.method === 'failed' && !home.html;
    if (budget > 0 && !unreachable) {
      const discovered = await discoverLinks(baseUrl, fetcher, home.html || undefined);
      const targets = filterRelevant(discovered, rules).slice(0, budget);
      log.debug(
        `[aggregate] ${discovered.length} links on ${baseUrl}, fetching ${targets.length}`
      );

      for (const url of targets) {
        await pause();
        const sub = await fetcher.fetchSmart(url);
        if (sub.text.length > MIN_PAGE_TEXT) {
          pages.push(toPage(sub, 'subpage'));
        } else {
          failedUrls.push(url);
          log.debug(`[aggregate] skipped ${url}: ${sub.text.length} chars (${sub.method})`);
        }
      }
    }

    return {
      mode: 'site',
      baseUrl,
      pages,
      combinedText: combinePages(pages),
      scrapedUrls: pages.map((page) => page.url),
      failedUrls,
    };
  };

  /**
   * Caller-supplied URLs in caller order, no discovery. A single URL is
   * treated as a homepage with a one-page budget instead.
   */
  const aggregateFromUrlList = async (urls: string[], name: string): Promise<AggregatedContent> => {
    if (urls.length === 1) {
      return aggregateFromSite(urls[0], { maxPages: 1 });
    }

    const pages: PageContent[] = [];
    const failedUrls: string[] = [];

    for (const [i, url] of urls.entries()) {
      if (i > 0) await pause();
      const fetched = await fetcher.fetchSmart(url);
      if (fetched.text.length > MIN_PAGE_TEXT) {
        pages.push(toPage(fetched, 'source'));
      } else {
        failedUrls.push(url);
        log.warn(`[aggregate] ${name}: no usable content at ${url} (${fetched.method})`);
      }
    }

    log.info(`[aggregate] ${name}: ${pages.length}/${urls.length} sources scraped`);

    return {
      mode: 'url-list',
      urls,
      pages,
      combinedText: combinePages(pages),
      scrapedUrls: pages.map((page) => page.url),
      failedUrls,
    };
  };

  return { aggregateFromSite, aggregateFromUrlList };
}

export type Aggregator = ReturnType<typeof createAggregator>;
