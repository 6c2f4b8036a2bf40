import { JSDOM, VirtualConsole } from 'jsdom';

import type { FetchMethod, Result } from '../types';
import { log } from '../ui';
import { errorMessage, fail, normalizeWhitespace, ok } from '../utils';
import { renderWithPlaywright, type RenderedPage, type Renderer } from './renderPage';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122 Safari/537.36';

const STATIC_TIMEOUT_MS = 10_000;
const RENDER_TIMEOUT_MS = 15_000;
const RENDER_SETTLE_MS = 3_000;

export const MIN_STATIC_TEXT = 200;

export const RENDERING_MARKERS = [
  'enable javascript',
  'javascript is required',
  'loading...',
  'redirecting',
  'please wait',
  'checking your browser',
];

// NodeFilter.SHOW_TEXT; the constant is not a Node global.
const SHOW_TEXT = 0x4;

/**
 * Visible text of an HTML document: script, style and similar blocks are
 * dropped and the remaining text nodes are joined with single spaces.
 */
export function htmlToText(html: string): string {
  const dom = new JSDOM(html, { virtualConsole: new VirtualConsole() });
  try {
    const { document } = dom.window;
    document
      .querySelectorAll('script, style, noscript, template, svg')
      .forEach((el) => el.remove());

    const parts: string[] = [];
    const walker = document.createTreeWalker(document.documentElement, SHOW_TEXT);
    for (let node = walker.nextNode(); node; node = walker.nextNode()) {
      const value = normalizeWhitespace(node.nodeValue ?? '');
      if (value) parts.push(value);
    }
    return parts.join(' ');
  } finally {
    dom.window.close();
  }
}

export function needsRendering(text: string): boolean {
  if (text.trim().length < MIN_STATIC_TEXT) return true;
  const lower = text.toLowerCase();
  return RENDERING_MARKERS.some((marker) => lower.includes(marker));
}

export type SmartFetchResult = {
  url: string;
  text: string;
  html: string;
  method: FetchMethod;
  error?: string;
};

export interface PageFetcher {
  fetchStatic(url: string): Promise<Result<RenderedPage>>;
  fetchRendered(url: string): Promise<Result<RenderedPage>>;
  fetchSmart(url: string): Promise<SmartFetchResult>;
}

export type FetcherOptions = {
  fetchImpl?: typeof fetch;
  renderer?: Renderer;
  timeoutMs?: number;
  renderTimeoutMs?: number;
  settleMs?: number;
  userAgent?: string;
};

export function createFetcher(options: FetcherOptions = {}): PageFetcher {
  const fetchImpl = options.fetchImpl ?? fetch;
  const renderer = options.renderer ?? renderWithPlaywright;
  const timeoutMs = options.timeoutMs ?? STATIC_TIMEOUT_MS;
  const userAgent = options.userAgent ?? BROWSER_USER_AGENT;
  const renderOptions = {
    timeoutMs: options.renderTimeoutMs ?? RENDER_TIMEOUT_MS,
    settleMs: options.settleMs ?? RENDER_SETTLE_MS,
    userAgent,
  };

  const getHtml = async (url: string): Promise<Result<RenderedPage>> => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetchImpl(url, {
        signal: controller.signal,
        redirect: 'follow',
        headers: {
          'user-agent': userAgent,
          accept: 'text/html,application/xhtml+xml',
        },
      });
      if (!res.ok) return fail(`HTTP ${res.status}`);

      const contentType = res.headers.get('content-type') ?? '';
      if (contentType && !/html|xml|text\/plain/i.test(contentType)) {
        return fail(`Non-HTML response (${contentType})`);
      }

      const html = await res.text();
      return ok({ html, text: htmlToText(html) });
    } catch (e) {
      return fail(errorMessage(e));
    } finally {
      clearTimeout(timer);
    }
  };

  const fetchStatic = async (url: string) => {
    const result = await getHtml(url);
    if (!result.ok) log.warn(`[fetch] static fetch failed for ${url}: ${result.error}`);
    return result;
  };

  const fetchRendered = async (url: string): Promise<Result<RenderedPage>> => {
    try {
      const page = await renderer(url, renderOptions);
      return ok(page);
    } catch (e) {
      const error = errorMessage(e);
      log.warn(`[fetch] rendering failed for ${url}: ${error}`);
      return fail(error);
    }
  };

  const fetchSmart = async (url: string): Promise<SmartFetchResult> => {
    const stat = await fetchStatic(url);
    const staticText = stat.ok ? stat.value.text : '';
    const staticHtml = stat.ok ? stat.value.html : '';

    if (staticText && !needsRendering(staticText)) {
      return { url, text: staticText, html: staticHtml, method: 'static' };
    }

    log.debug(`[fetch] escalating to browser rendering for ${url}`);
    const rendered = await fetchRendered(url);
    if (rendered.ok && rendered.value.text) {
      return { url, text: rendered.value.text, html: rendered.value.html, method: 'rendered' };
    }

    return {
      url,
      text: staticText,
      html: staticHtml,
      method: 'failed',
      error: rendered.ok ? 'Rendered page had no text' : rendered.error,
    };
  };

  return { fetchStatic, fetchRendered, fetchSmart };
}
