import { NavigationError, type BrowserSession, type NavigateOptions, type PageElement, type RenderedPage } from '../browser/types';
import type { Logger } from '../obs/logger';
import { decodeRedirectLink, isAggregatorRedirect, isAggregatorUrl } from './aggregatorLinks';
import { EnrichmentError, errorMessage } from './errors';
import { isValidArticleUrl } from './urlRules';

/** Checked in order; the first selector that yields a valid href wins. */
export const OUTBOUND_LINK_SELECTORS = [
  "article a[href*='http']:not([href*='google.com']):not([href*='youtube.com'])",
  "a[data-n-tid]:not([href*='google.com'])",
  "[role='article'] a[href*='http']:not([href*='google.com'])",
  "h3 a[href*='http']:not([href*='google.com'])",
  "h4 a[href*='http']:not([href*='google.com'])",
  "a[href*='http']:not([href*='google.com']):not([href*='youtube.com']):not([href*='facebook.com'])",
  "a[href^='http']:not([href*='google'])",
];

export interface ResolveOptions {
  navigationTimeoutMs: number;
  settleDelayMs: number;
  maxLinksPerSelector: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface RedirectResolution {
  page: RenderedPage;
  originalUrl: string;
  resolvedUrl: string;
  decodedUrl: string | null;
  followedOutbound: boolean;
}

const toEnrichmentError = (error: unknown, url: string): unknown => {
  if (error instanceof NavigationError) {
    const detail = error.timedOut ? error.message : `Navigation failed: ${error.message}`;
    return new EnrichmentError('NavigationTimeout', detail, url);
  }
  return error;
};

const navigateOptions = (options: ResolveOptions): NavigateOptions => ({
  timeoutMs: options.navigationTimeoutMs,
  settleMs: options.settleDelayMs,
  signal: options.signal,
});

const navigate = async (session: BrowserSession, url: string, options: ResolveOptions): Promise<RenderedPage> => {
  try {
    return await session.navigate(url, navigateOptions(options));
  } catch (error) {
    throw toEnrichmentError(error, url);
  }
};

export const findOutboundLink = async (
  page: RenderedPage,
  maxLinksPerSelector: number,
  logger?: Logger,
): Promise<string | null> => {
  for (const selector of OUTBOUND_LINK_SELECTORS) {
    let elements: PageElement[];
    try {
      elements = await page.queryAll(selector);
    } catch (error) {
      logger?.debug('Outbound selector failed', { selector, error: errorMessage(error) });
      continue;
    }
    for (const element of elements.slice(0, maxLinksPerSelector)) {
      const href = await element.attribute('href');
      if (href && isValidArticleUrl(href)) {
        logger?.debug('Outbound article link found', { selector, href });
        return href;
      }
    }
  }
  return null;
};

/**
 * Turns a feed link into a rendered publisher page. Aggregator tokens are decoded when they embed
 * the target URL; otherwise the host is left to redirect, and a page that stays on the aggregator
 * is scanned for an outbound article link.
 */
export const resolveRedirect = async (
  link: string,
  session: BrowserSession,
  options: ResolveOptions,
): Promise<RedirectResolution> => {
  const decodedUrl = isAggregatorRedirect(link) ? decodeRedirectLink(link) : null;
  if (decodedUrl) {
    options.logger?.debug('Decoded aggregator token', { link, decodedUrl });
  }

  let page: RenderedPage;
  if (decodedUrl) {
    try {
      page = await session.navigate(decodedUrl, navigateOptions(options));
    } catch (error) {
      if (!(error instanceof NavigationError) || error.timedOut) {
        throw toEnrichmentError(error, decodedUrl);
      }
      options.logger?.warn('Decoded URL failed to load; retrying original link', { decodedUrl, error: error.message });
      page = await navigate(session, link, options);
    }
  } else {
    page = await navigate(session, link, options);
  }

  if (!isAggregatorUrl(page.url())) {
    return { page, originalUrl: link, resolvedUrl: page.url(), decodedUrl, followedOutbound: false };
  }

  const outbound = await findOutboundLink(page, options.maxLinksPerSelector, options.logger);
  if (!outbound) {
    throw new EnrichmentError('RedirectUnresolved', 'No valid article link found on aggregator page', link);
  }

  const target = await navigate(session, outbound, options);
  if (isAggregatorUrl(target.url())) {
    throw new EnrichmentError('RedirectUnresolved', 'Outbound link led back to the aggregator', link);
  }
  return { page: target, originalUrl: link, resolvedUrl: target.url(), decodedUrl, followedOutbound: true };
};
