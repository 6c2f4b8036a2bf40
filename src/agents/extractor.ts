import type { TextModel } from '../llm';
import { defaultRecord, ExtractedRecordSchema } from '../record';
import { buildSystemPrompt, buildUserPrompt } from '../systemPrompt';
import type { ExtractedRecord, ExtractionMode, Result } from '../types';
import { log } from '../ui';
import { errorMessage, fail, ok, sleep as defaultSleep, type Sleep } from '../utils';

export const CHAR_BUDGETS: Record<ExtractionMode, number> = {
  'single-page': 16_000,
  'multi-page': 30_000,
  'multi-source': 40_000,
};

export type ExtractionInput = {
  text: string;
  sourceUrls: string[];
  mode: ExtractionMode;
};

export type ExtractionOutcome = {
  record: ExtractedRecord;
  ok: boolean;
  attempts: number;
  error?: string;
};

export interface RecordExtractor {
  extract(input: ExtractionInput): Promise<ExtractionOutcome>;
}

/**
 * Decode the first `{` .. last `}` span of free-form model output. The span is
 * only ever handed to JSON.parse.
 */
export function parseModelJson(raw: string): Result<ExtractedRecord> {
  const first = raw.indexOf('{');
  const last = raw.lastIndexOf('}');
  if (first === -1 || last <= first) return fail('No JSON object in model output');

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw.slice(first, last + 1));
  } catch (e) {
    return fail(`Invalid JSON in model output: ${errorMessage(e)}`);
  }

  const parsed = ExtractedRecordSchema.safeParse(decoded);
  if (!parsed.success) return fail('Model output is not a JSON object');
  return ok(parsed.data);
}

export type LlmExtractorOptions = {
  model: TextModel;
  retries?: number;
  baseDelayMs?: number;
  sleep?: Sleep;
};

export function createLlmExtractor({
  model,
  retries = 3,
  baseDelayMs = 2_000,
  sleep = defaultSleep,
}: LlmExtractorOptions): RecordExtractor {
  const maxAttempts = Math.max(1, Math.floor(retries));

  return {
    async extract({ text, sourceUrls, mode }) {
      const system = buildSystemPrompt(mode);
      const user = buildUserPrompt(text.slice(0, CHAR_BUDGETS[mode]), sourceUrls);

      let lastError = '';
      for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
        const response = await model({ system, user });
        const parsed = response.ok ? parseModelJson(response.value) : response;
        if (parsed.ok) {
          return { record: parsed.value, ok: true, attempts: attempt };
        }

        lastError = parsed.error;
        if (attempt < maxAttempts) {
          const wait = baseDelayMs * 2 ** (attempt - 1);
          log.warn(`[extract] attempt ${attempt} failed: ${lastError}, waiting ${wait}ms`);
          await sleep(wait);
        }
      }

      log.error(`[extract] giving up after ${maxAttempts} attempts: ${lastError}`);
      return { record: defaultRecord(), ok: false, attempts: maxAttempts, error: lastError };
    },
  };
}
