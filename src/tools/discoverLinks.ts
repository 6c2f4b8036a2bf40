import { readFile } from 'node:fs/promises';

import { JSDOM, VirtualConsole } from 'jsdom';
import { z } from 'zod';

import defaultRulesJson from '../../data/link-rules.json';
import { log } from '../ui';
import type { PageFetcher } from './fetchPage';

const LinkRulesSchema = z.object({
  exclude: z.array(z.string().min(1)),
  priority: z.array(z.string().min(1)),
});

export type LinkRules = z.infer<typeof LinkRulesSchema>;

function parseRules(value: unknown): LinkRules {
  const rules = LinkRulesSchema.parse(value);
  return {
    exclude: rules.exclude.map((s) => s.toLowerCase()),
    priority: rules.priority.map((s) => s.toLowerCase()),
  };
}

export const DEFAULT_LINK_RULES = parseRules(defaultRulesJson);

export async function loadLinkRules(file: string): Promise<LinkRules> {
  const raw = await readFile(file, 'utf-8');
  return parseRules(JSON.parse(raw));
}

const SKIPPED_SCHEMES = [
  'mailto:',
  'tel:',
  'sms:',
  'fax:',
  'javascript:',
  'whatsapp:',
  'skype:',
  'data:',
];

function siteOf(url: URL): string {
  return url.hostname.toLowerCase().replace(/^www\./, '');
}

/**
 * Canonical form used for comparisons: no fragment, no trailing slash on the
 * path, query string kept.
 */
export function normalizeLink(url: URL): string {
  const path = url.pathname.replace(/\/+$/, '');
  return `${url.protocol}//${url.host}${path}${url.search}`;
}

// Identity of a page within a site: www and bare hosts compare equal.
function linkKey(url: URL): string {
  return `${siteOf(url)}${url.pathname.replace(/\/+$/, '')}${url.search}`;
}

function parseHrefs(html: string): string[] {
  const dom = new JSDOM(html, { virtualConsole: new VirtualConsole() });
  try {
    return Array.from(dom.window.document.querySelectorAll('a[href]'))
      .map((a) => (a.getAttribute('href') ?? '').trim())
      .filter(Boolean);
  } finally {
    dom.window.close();
  }
}

/**
 * Same-site links found in `html`, resolved against `baseUrl`, normalized and
 * deduplicated in encounter order, with `www.` and bare hosts treated as one
 * site. The base page itself and anything not strictly longer than it are
 * dropped.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  let base: URL;
  try {
    base = new URL(baseUrl);
  } catch {
    return [];
  }
  const baseKey = linkKey(base);
  const site = siteOf(base);

  const seen = new Map<string, string>();
  for (const href of parseHrefs(html)) {
    const lower = href.toLowerCase();
    if (SKIPPED_SCHEMES.some((scheme) => lower.startsWith(scheme))) continue;

    let url: URL;
    try {
      url = new URL(href, base);
    } catch {
      continue;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') continue;
    if (siteOf(url) !== site) continue;

    const key = linkKey(url);
    if (key.length <= baseKey.length || seen.has(key)) continue;
    seen.set(key, normalizeLink(url));
  }

  return Array.from(seen.values());
}

export async function discoverLinks(
  baseUrl: string,
  fetcher: PageFetcher,
  html?: string
): Promise<string[]> {
  let source = html;
  if (!source) {
    const page = await fetcher.fetchStatic(baseUrl);
    if (!page.ok) return [];
    source = page.value.html;
  }
  const links = extractLinks(source, baseUrl);
  log.debug(`[links] ${links.length} same-site links on ${baseUrl}`);
  return links;
}

function pathOf(link: string): string {
  try {
    const url = new URL(link);
    return `${url.pathname}${url.search}`.toLowerCase();
  } catch {
    return link.toLowerCase();
  }
}

/**
 * Drop excluded links, then order the rest: priority matches first, the
 * remainder after, each group in encounter order.
 */
export function filterRelevant(urls: string[], rules: LinkRules = DEFAULT_LINK_RULES): string[] {
  const priority: string[] = [];
  const regular: string[] = [];

  for (const url of urls) {
    const path = pathOf(url);
    if (rules.exclude.some((pattern) => path.includes(pattern))) continue;
    if (rules.priority.some((pattern) => path.includes(pattern))) priority.push(url);
    else regular.push(url);
  }

  return [...priority, ...regular];
}
