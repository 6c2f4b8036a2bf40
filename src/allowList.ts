import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { log } from './ui';
import { errorMessage } from './utils';

export const DEFAULT_ALLOW_LIST_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../data/providers_discount.json'
);

const AllowListSchema = z.array(z.string());

export type AllowList = {
  entries: string[];
  warning?: string;
};

/**
 * Discount partner names. A missing or unreadable file yields an empty list
 * and a warning, so every provider is simply not eligible.
 */
export async function loadAllowList(file: string = DEFAULT_ALLOW_LIST_PATH): Promise<AllowList> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (e) {
    const warning = `Discount allow-list not loaded from ${file} (${errorMessage(e)}); all providers marked "No".`;
    log.warn(warning);
    return { entries: [], warning };
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (e) {
    const warning = `Discount allow-list ${file} is not valid JSON (${errorMessage(e)}); all providers marked "No".`;
    log.warn(warning);
    return { entries: [], warning };
  }

  const parsed = AllowListSchema.safeParse(decoded);
  if (!parsed.success) {
    const warning = `Discount allow-list ${file} must be an array of names; all providers marked "No".`;
    log.warn(warning);
    return { entries: [], warning };
  }

  return { entries: parsed.data.map((s) => s.trim()).filter(Boolean) };
}
