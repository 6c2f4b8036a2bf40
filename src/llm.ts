import type OpenAI from 'openai';

import type { Result } from './types';
import { errorMessage, fail, ok } from './utils';

export type ModelRequest = {
  system: string;
  user: string;
};

/**
 * The only thing the extractor knows about a model: text in, text out.
 * Implementations report failures as results and never throw.
 */
export type TextModel = (req: ModelRequest) => Promise<Result<string>>;

export const createChatModel = (client: OpenAI, model: string): TextModel => {
  return async ({ system, user }) => {
    try {
      const res = await client.chat.completions.create({
        model,
        temperature: 0.1,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
      });

      const content = res.choices[0]?.message.content;
      if (!content) return fail('Model returned an empty response');
      return ok(content);
    } catch (e) {
      return fail(`Model call failed: ${errorMessage(e)}`);
    }
  };
};
