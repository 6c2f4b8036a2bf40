import { chromium } from 'playwright';

import { normalizeWhitespace } from '../utils';

export type RenderedPage = {
  text: string;
  html: string;
};

export type RenderOptions = {
  timeoutMs: number;
  settleMs: number;
  userAgent: string;
};

export type Renderer = (url: string, opts: RenderOptions) => Promise<RenderedPage>;

/**
 * Render a page in headless Chromium and return the body text plus the
 * rendered HTML. The browser is closed on every exit path; errors propagate
 * to the caller.
 */
export const renderWithPlaywright: Renderer = async (url, { timeoutMs, settleMs, userAgent }) => {
  const browser = await chromium.launch({ headless: true });
  try {
    const context = await browser.newContext({ locale: 'en-US', userAgent });
    const page = await context.newPage();

    // Block heavy resources to speed up page load
    await page.route('**/*', (route) => {
      const type = route.request().resourceType();
      if (['image', 'font', 'media'].includes(type)) return route.abort();
      return route.continue();
    });

    await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    await page.waitForSelector('body', { timeout: timeoutMs });
    await page.waitForTimeout(settleMs);

    const text = normalizeWhitespace(await page.locator('body').innerText());
    const html = await page.content();
    return { text, html };
  } finally {
    await browser.close();
  }
};
