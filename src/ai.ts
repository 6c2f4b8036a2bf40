import OpenAI from 'openai';

import { ConfigError, type AppConfig } from './config';

/**
 * Build the model client once per process. Missing credentials fail here,
 * not on the first extraction.
 */
export const createOpenAIClient = (config: Pick<AppConfig, 'openaiApiKey'>) => {
  if (!config.openaiApiKey) {
    throw new ConfigError('Missing OPENAI_API_KEY in environment.');
  }
  return new OpenAI({ apiKey: config.openaiApiKey });
};
