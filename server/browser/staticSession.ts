import * as cheerio from 'cheerio';
import type { AppConfig } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import { AbortedError, deadlineSignal } from '../utils/async';
import { normalizeWhitespace } from '../utils/text';
import {
  NavigationError,
  type BrowserSession,
  type NavigateOptions,
  type PageElement,
  type RenderedPage,
  type SessionFactory,
} from './types';

/**
 * Builds a RenderedPage over already-fetched HTML. No scripts run, so client-side redirects and
 * lazily rendered content are invisible to it.
 */
export const createStaticPage = (html: string, url: string): RenderedPage => {
  const $ = cheerio.load(html);

  const select = (selector: string): PageElement[] => {
    const elements: PageElement[] = [];
    $(selector).each((_, node) => {
      const $el = $(node);
      elements.push({
        attribute: async (name) => $el.attr(name) ?? null,
        text: async () => $el.text(),
        within: async (sel) => $el.closest(sel).length > 0,
      });
    });
    return elements;
  };

  return {
    url: () => url,
    title: async () => normalizeWhitespace($('title').first().text()),
    queryAll: async (selector) => select(selector),
    queryOne: async (selector) => select(selector)[0] ?? null,
    bodyText: async () => {
      const $body = $('body').clone();
      $body.find('script, style, noscript, template').remove();
      return normalizeWhitespace($body.text());
    },
  };
};

const fetchWithTimeout = async (url: string, options: NavigateOptions & { userAgent: string }) => {
  if (options.signal?.aborted) {
    throw new AbortedError();
  }
  const deadline = deadlineSignal(options.timeoutMs, options.signal);
  try {
    return await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      redirect: 'follow',
      signal: deadline.signal,
    });
  } catch (error) {
    if (deadline.expired()) {
      throw new NavigationError(`Navigation timed out after ${options.timeoutMs}ms`, url, true);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new NavigationError(message, url, false);
  } finally {
    deadline.dispose();
  }
};

export const createStaticSessionFactory = (config: AppConfig): SessionFactory => {
  const create = async (): Promise<BrowserSession> => ({
    id: randomId(),
    navigate: async (url, options) => {
      const response = await fetchWithTimeout(url, { ...options, userAgent: config.browser.userAgent });
      if (!response.ok) {
        throw new NavigationError(`HTTP ${response.status} for ${url}`, url, false);
      }
      const html = await response.text();
      return createStaticPage(html, response.url || url);
    },
    close: async () => {},
  });

  return { engine: 'static-cheerio', create, shutdown: async () => {} };
};
