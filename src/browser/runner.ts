import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';

import type { AutomationConfig } from '../schema/index.js';
import { SessionError, describeError } from '../core/errors.js';
import * as log from '../utils/logger.js';
import type { PageHandle } from './page.js';

// ── Public types ─────────────────────────────────────────────

export interface BrowserSession {
  readonly page: PageHandle;
  /** Close page, context and browser. Safe to call more than once. */
  close(): Promise<void>;
}

export type BrowserLauncher = (
  config: Readonly<AutomationConfig>,
) => Promise<BrowserSession>;

// ── Session launcher ─────────────────────────────────────────

/**
 * Launch Chromium, open a context and a page. If any stage fails,
 * whatever was already created is closed before the SessionError
 * propagates.
 */
export const launchBrowser: BrowserLauncher = async (config) => {
  let browser: Browser | undefined;
  let context: BrowserContext | undefined;
  let page: Page | undefined;

  try {
    browser = await chromium.launch({
      headless: config.headless,
      slowMo: config.slowMoMs,
      args: [
        `--window-size=${String(config.viewport.width)},${String(config.viewport.height)}`,
        '--no-sandbox',
        '--disable-dev-shm-usage',
      ],
    });

    context = await browser.newContext({
      viewport: { width: config.viewport.width, height: config.viewport.height },
      userAgent: config.userAgent,
      javaScriptEnabled: true,
      ignoreHTTPSErrors: true,
    });

    page = await context.newPage();
    page.setDefaultTimeout(config.navigationTimeoutMs);
  } catch (err) {
    await closeAll(page, context, browser);
    throw new SessionError(`Browser failed to start: ${describeError(err)}`, {
      cause: err,
    });
  }

  const livePage = page;
  const liveContext = context;
  const liveBrowser = browser;
  let closed: Promise<void> | undefined;

  log.browser('Browser initialized');

  return {
    page: livePage,
    close(): Promise<void> {
      closed ??= closeAll(livePage, liveContext, liveBrowser).then(() => {
        log.browser('Browser cleanup completed');
      });
      return closed;
    },
  };
};

// ── Teardown ─────────────────────────────────────────────────

async function closeAll(
  page: Page | undefined,
  context: BrowserContext | undefined,
  browser: Browser | undefined,
): Promise<void> {
  const closers: Array<[string, (() => Promise<void>) | undefined]> = [
    ['page', page ? () => page.close() : undefined],
    ['context', context ? () => context.close() : undefined],
    ['browser', browser ? () => browser.close() : undefined],
  ];

  for (const [name, close] of closers) {
    if (!close) continue;
    try {
      await close();
    } catch (err) {
      log.warn(`Closing ${name} failed: ${describeError(err)}`);
    }
  }
}
