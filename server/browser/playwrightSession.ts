import { chromium, errors, type Browser, type ElementHandle, type Page } from 'playwright-core';
import type { AppConfig } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import type { Logger } from '../obs/logger';
import { AbortedError } from '../utils/async';
import {
  NavigationError,
  type BrowserSession,
  type NavigateOptions,
  type PageElement,
  type RenderedPage,
  type SessionFactory,
} from './types';

const toElement = (handle: ElementHandle<SVGElement | HTMLElement>): PageElement => ({
  attribute: (name) => handle.getAttribute(name),
  text: async () => (await handle.textContent()) ?? '',
  within: (selector) => handle.evaluate((node, sel) => node.closest(sel) !== null, selector),
});

const toRenderedPage = (page: Page): RenderedPage => ({
  url: () => page.url(),
  title: () => page.title(),
  queryAll: async (selector) => (await page.$$(selector)).map(toElement),
  queryOne: async (selector) => {
    const handle = await page.$(selector);
    return handle ? toElement(handle) : null;
  },
  bodyText: () => page.evaluate(() => document.body?.innerText ?? ''),
});

export const createPlaywrightSessionFactory = (config: AppConfig, logger: Logger): SessionFactory => {
  let browserPromise: Promise<Browser> | null = null;

  const getBrowser = (): Promise<Browser> => {
    if (!browserPromise) {
      logger.info('Launching browser', { headless: config.browser.headless });
      browserPromise = chromium.launch({
        headless: config.browser.headless,
        executablePath: config.browser.executablePath,
        args: config.browser.launchArgs,
      });
    }
    return browserPromise;
  };

  const create = async (): Promise<BrowserSession> => {
    const browser = await getBrowser();
    const context = await browser.newContext({
      userAgent: config.browser.userAgent,
      viewport: config.browser.viewport,
      ignoreHTTPSErrors: true,
    });
    const page = await context.newPage();
    const id = randomId();
    let closed = false;

    const navigate = async (url: string, options: NavigateOptions): Promise<RenderedPage> => {
      if (options.signal?.aborted) {
        throw new AbortedError();
      }
      try {
        await page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
      } catch (error) {
        if (error instanceof errors.TimeoutError) {
          throw new NavigationError(`Navigation timed out after ${options.timeoutMs}ms`, url, true);
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new NavigationError(message, url, false);
      }
      if (options.settleMs > 0) {
        await page.waitForTimeout(options.settleMs);
      }
      return toRenderedPage(page);
    };

    const close = async () => {
      if (closed) return;
      closed = true;
      await context.close();
    };

    return { id, navigate, close };
  };

  const shutdown = async () => {
    if (!browserPromise) return;
    const browser = await browserPromise;
    browserPromise = null;
    await browser.close();
    logger.info('Browser closed');
  };

  return { engine: 'playwright-chromium', create, shutdown };
};
