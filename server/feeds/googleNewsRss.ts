import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import { FeedFileSchema, RawFeedEntrySchema, type FeedFile, type RawFeedEntry } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { deadlineSignal } from '../utils/async';
import categoryQueryTable from './categoryQueries.json';

const GOOGLE_NEWS_RSS_BASE = 'https://news.google.com/rss';

const FeedQuerySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('top') }),
  z.object({ type: z.literal('topic'), value: z.string().min(1) }),
  z.object({ type: z.literal('search'), value: z.string().min(1) }),
  z.object({ type: z.literal('geo'), value: z.string().min(1) }),
]);

export type FeedQuery = z.infer<typeof FeedQuerySchema>;

const CATEGORY_QUERIES: Record<string, FeedQuery> = z.record(FeedQuerySchema).parse(categoryQueryTable);

export const feedQueryFor = (category: string): FeedQuery | null =>
  CATEGORY_QUERIES[category.trim().toLowerCase()] ?? null;

export const describeFeedQuery = (query: FeedQuery): string =>
  query.type === 'top' ? 'top news' : `${query.type}: ${query.value}`;

export const buildFeedUrl = (query: FeedQuery, locale: { language: string; country: string }): string => {
  const params = new URLSearchParams({
    hl: `${locale.language}-${locale.country}`,
    gl: locale.country,
    ceid: `${locale.country}:${locale.language}`,
  });

  switch (query.type) {
    case 'top':
      return `${GOOGLE_NEWS_RSS_BASE}?${params.toString()}`;
    case 'topic':
      return `${GOOGLE_NEWS_RSS_BASE}/headlines/section/topic/${encodeURIComponent(query.value.toUpperCase())}?${params.toString()}`;
    case 'geo':
      return `${GOOGLE_NEWS_RSS_BASE}/headlines/section/geo/${encodeURIComponent(query.value)}?${params.toString()}`;
    case 'search': {
      const search = new URLSearchParams({ q: query.value });
      return `${GOOGLE_NEWS_RSS_BASE}/search?${search.toString()}&${params.toString()}`;
    }
  }
};

export const decodeXmlEntities = (value: string): string =>
  value
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(Number.parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');

const stripTags = (value: string): string => value.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim();

const extractTag = (xml: string, tag: string): string | null => {
  const cdata = new RegExp(`<${tag}[^>]*>\\s*<!\\[CDATA\\[([\\s\\S]*?)\\]\\]>\\s*</${tag}>`, 'i');
  const m1 = xml.match(cdata);
  if (m1?.[1]) return m1[1].trim();
  const plain = new RegExp(`<${tag}[^>]*>([\\s\\S]*?)</${tag}>`, 'i');
  const m2 = xml.match(plain);
  if (m2?.[1]) return m2[1].trim();
  return null;
};

const extractSourceName = (itemXml: string): string | null => {
  const m = itemXml.match(/<source\b[^>]*>([\s\S]*?)<\/source>/i);
  if (!m?.[1]) return null;
  return stripTags(decodeXmlEntities(m[1].trim())) || null;
};

/**
 * Parses RSS `<item>` blocks into feed entries. Items without a usable title or an absolute link
 * are skipped.
 */
export const parseRssItems = (xml: string, logger?: Logger): RawFeedEntry[] => {
  const parts = xml.split(/<item\b[^>]*>/i);
  const entries: RawFeedEntry[] = [];
  let skipped = 0;

  for (let i = 1; i < parts.length; i += 1) {
    const chunk = parts[i];
    const end = chunk.search(/<\/item>/i);
    if (end < 0) continue;
    const itemXml = chunk.slice(0, end);

    const parsed = RawFeedEntrySchema.safeParse({
      title: stripTags(decodeXmlEntities(extractTag(itemXml, 'title') ?? '')),
      link: decodeXmlEntities(extractTag(itemXml, 'link') ?? ''),
      source: extractSourceName(itemXml) ?? undefined,
      published: extractTag(itemXml, 'pubDate') ?? undefined,
    });
    if (parsed.success) {
      entries.push(parsed.data);
    } else {
      skipped += 1;
    }
  }

  if (skipped > 0) {
    logger?.debug('Skipped unusable feed items', { skipped });
  }
  return entries;
};

export interface FetchFeedOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Fetches the feed configured for `category`. Returns null for a category with no feed query.
 * Network failures and non-2xx responses throw.
 */
export const fetchCategoryFeed = async (
  category: string,
  config: AppConfig,
  options: FetchFeedOptions = {},
): Promise<FeedFile | null> => {
  const query = feedQueryFor(category);
  if (!query) {
    options.logger?.warn('No feed query configured for category', { category });
    return null;
  }

  const { language, country, fetchTimeoutMs, maxResults } = config.feeds;
  const url = buildFeedUrl(query, { language, country });
  const deadline = deadlineSignal(fetchTimeoutMs, options.signal);

  let xml: string;
  try {
    const response = await fetch(url, {
      method: 'GET',
      signal: deadline.signal,
      headers: {
        Accept: 'application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.1',
        'User-Agent': config.browser.userAgent,
      },
    });
    if (!response.ok) {
      throw new Error(`Google News RSS request failed: ${response.status} ${response.statusText}`);
    }
    xml = await response.text();
  } catch (error) {
    if (deadline.expired()) {
      throw new Error(`Google News RSS request timed out after ${fetchTimeoutMs}ms`);
    }
    throw error;
  } finally {
    deadline.dispose();
  }

  const articles = parseRssItems(xml, options.logger).slice(0, maxResults);
  options.logger?.info('Fetched category feed', { category, query: describeFeedQuery(query), count: articles.length });

  return FeedFileSchema.parse({
    metadata: {
      category,
      query: describeFeedQuery(query),
      fetched_at: new Date().toISOString(),
      total_articles: articles.length,
      language,
      country,
    },
    articles,
  });
};
