import { createAggregator } from './agents/aggregator';
import { createLlmExtractor, type RecordExtractor } from './agents/extractor';
import { keywordExtractor } from './agents/keywordExtractor';
import { createOpenAIClient } from './ai';
import { RecordCache } from './cache';
import type { AppConfig } from './config';
import { createChatModel } from './llm';
import type { PipelineDeps } from './pipeline';
import { createFetcher } from './tools/fetchPage';
import { loadLinkRules, DEFAULT_LINK_RULES } from './tools/discoverLinks';

export type RuntimeOptions = {
  /** Summarize with the keyword banks instead of the model. */
  keywords?: boolean;
};

/** Wire the live fetcher, extractor and cache from configuration. */
export async function createPipelineDeps(
  config: AppConfig,
  { keywords = false }: RuntimeOptions = {}
): Promise<PipelineDeps> {
  const rules = config.linkRulesFile
    ? await loadLinkRules(config.linkRulesFile)
    : DEFAULT_LINK_RULES;

  const extractor: RecordExtractor = keywords
    ? keywordExtractor
    : createLlmExtractor({
        model: createChatModel(createOpenAIClient(config), config.openaiModel),
        retries: config.llmRetries,
      });

  return {
    aggregator: createAggregator({ fetcher: createFetcher(), rules, delayMs: config.pageDelayMs }),
    extractor,
    cache: await RecordCache.open(config.cacheDir, { maxAgeMs: config.cacheMaxAgeMs }),
  };
}
