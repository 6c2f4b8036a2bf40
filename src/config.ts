import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  GOOGLE_MAPS_API_KEY: optionalText,
  CACHE_DIR: z.string().min(1).default('cache_json'),
  MAX_PAGES: z.coerce.number().int().positive().default(5),
  PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  LLM_RETRIES: z.coerce.number().int().positive().default(3),
  CACHE_MAX_AGE_DAYS: z.coerce.number().positive().optional(),
  LINK_RULES_FILE: optionalText,
});

export type AppConfig = {
  openaiApiKey?: string;
  openaiModel: string;
  googleMapsApiKey?: string;
  cacheDir: string;
  maxPages: number;
  pageDelayMs: number;
  llmRetries: number;
  cacheMaxAgeMs?: number;
  linkRulesFile?: string;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  const e = parsed.data;
  return {
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    googleMapsApiKey: e.GOOGLE_MAPS_API_KEY,
    cacheDir: e.CACHE_DIR,
    maxPages: e.MAX_PAGES,
    pageDelayMs: e.PAGE_DELAY_MS,
    llmRetries: e.LLM_RETRIES,
    cacheMaxAgeMs:
      e.CACHE_MAX_AGE_DAYS !== undefined ? e.CACHE_MAX_AGE_DAYS * 24 * 60 * 60 * 1000 : undefined,
    linkRulesFile: e.LINK_RULES_FILE,
  };
}
