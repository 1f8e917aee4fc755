import { describe, expect, it } from 'vitest';
import type { RawFeedEntry } from '../../../shared/types';
import { EXTRACTION_EMPTY_SENTINEL } from '../../enrichment/contentExtractor';
import { createFakeSession, encodeRedirectToken } from '../../enrichment/__tests__/fakeSession';
import { createSilentLogger } from '../../obs/logger';
import { enrichArticle } from '../enrichArticle';
import { articleHtml, testConfig } from './testConfig';

const logger = createSilentLogger();

const entry = (link: string, title = 'Metro line opens'): RawFeedEntry => ({
  title,
  link,
  source: 'Example Times',
  published: 'Mon, 04 Mar 2024 10:00:00 GMT',
});

describe('enrichArticle', () => {
  it('assembles a complete article from a decoded aggregator link', async () => {
    const target = 'https://www.ndtv.com/india-news/metro-opens-123';
    const link = `https://news.google.com/rss/articles/${encodeRedirectToken(target)}`;
    const session = createFakeSession({ [target]: { html: articleHtml('Metro line opens to commuters in Bengaluru') } });

    const { article, timedOut } = await enrichArticle(entry(link), { session, config: testConfig(), logger });

    expect(timedOut).toBe(false);
    expect(article.error).toBeUndefined();
    expect(article.url).toBe(target);
    expect(article.title).toBe('Metro line opens to commuters in Bengaluru');
    expect(article.imageUrl).toBe('https://cdn.example.com/lead.jpg');
    expect(article.published).toBe('Mon, 04 Mar 2024 10:00:00 GMT');
    expect(article.keyPoints).toEqual([
      'Metro line opens to commuters in Bengaluru The new metro line opened to commuters on Monday after a final safety inspection by officials.',
      'Officials expect more than three lakh daily riders once the line is fully operational.',
    ]);
    expect(article.qualityScore).toBeGreaterThan(0);
  });

  it('emits a degraded article when the redirect cannot be resolved', async () => {
    const link = 'https://news.google.com/articles/opaque-token';
    const session = createFakeSession({ [link]: { html: '<html><body><p>Nothing here</p></body></html>' } });
    const config = testConfig();

    const { article } = await enrichArticle(entry(link, 'Feed headline'), { session, config, logger });

    expect(article.error?.kind).toBe('RedirectUnresolved');
    expect(article.title).toBe('Feed headline');
    expect(article.url).toBe(link);
    expect(article.imageUrl).toBe(config.enrichment.placeholderImageUrl);
    expect(article.description).toBeNull();
  });

  it('tags empty pages with the sentinel description', async () => {
    const link = 'https://www.example.com/news/empty';
    const session = createFakeSession({ [link]: { html: '<html><body><h1>Short page with no body</h1></body></html>' } });

    const { article } = await enrichArticle(entry(link), { session, config: testConfig(), logger });

    expect(article.error?.kind).toBe('ExtractionEmpty');
    expect(article.description).toBe(EXTRACTION_EMPTY_SENTINEL);
    expect(article.keyPoints).toEqual([]);
    expect(article.url).toBe(link);
  });

  it('gives up when the article budget runs out', async () => {
    const link = 'https://www.example.com/news/slow';
    const session = createFakeSession({ [link]: { html: articleHtml('Slow page'), delayMs: 200 } });

    const outcome = await enrichArticle(entry(link), { session, config: testConfig({ articleTimeoutMs: 20 }), logger });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.article.error).toEqual({ kind: 'NavigationTimeout', message: 'Article processing exceeded 20ms' });
  });
});
