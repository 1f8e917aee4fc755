import type { PageElement, RenderedPage } from '../browser/types';
import type { Logger } from '../obs/logger';
import { countWords, normalizeWhitespace } from '../utils/text';
import { candidate, firstCandidate, type Candidate } from './candidates';
import { errorMessage } from './errors';
import { readArticleJsonLd, stringField } from './jsonLd';
import { selectorsForUrl } from './siteSelectors';

export interface TitleContext {
  page: RenderedPage;
  url: string;
  logger?: Logger;
}

const MIN_TITLE_LENGTH = 10;

const NOISE_KEYWORDS = [
  'menu',
  'navigation',
  'subscribe',
  'sign in',
  'log in',
  'login',
  'search',
  'advertisement',
  'newsletter',
  'cookie',
  'live tv',
  'latest news',
  'top stories',
  'most read',
  'most popular',
  'follow us',
  'share this',
  'related',
  'trending now',
  'download app',
];

const GENERIC_WORDS = new Set([
  'news',
  'home',
  'india',
  'world',
  'business',
  'sports',
  'sport',
  'entertainment',
  'latest',
  'trending',
  'video',
  'videos',
  'photos',
  'opinion',
  'live',
  'technology',
  'politics',
  'menu',
]);

const CONTENT_CONTAINER = 'article, main, [role="main"], [itemprop="articleBody"], .article, .story, .post, [class*="article"], [class*="story"]';
const CHROME_CONTAINER = 'nav, footer, aside, [role="navigation"], [role="banner"], .menu, .sidebar';

const GENERIC_HEADLINE_SELECTORS = [
  'article h1',
  '[itemprop="headline"]',
  '.article-title',
  '.story-title',
  '.entry-title',
  '.post-title',
  '.headline',
  'h1.title',
  '[class*="headline"]',
  'article h2',
];

const SUFFIX_RE = /^(.*\S)\s+(?:\||-|–|—|::|»)\s+(.+)$/;

export const isGenericWord = (value: string): boolean => {
  const normalized = normalizeWhitespace(value).toLowerCase();
  return countWords(normalized) <= 1 || GENERIC_WORDS.has(normalized);
};

export const isNoiseHeading = (text: string): boolean => {
  if (text.length < MIN_TITLE_LENGTH || isGenericWord(text)) return true;
  const lower = text.toLowerCase();
  return countWords(text) <= 5 && NOISE_KEYWORDS.some((keyword) => lower.includes(keyword));
};

/** Drops trailing site-name segments such as "Story title | Publisher" or "Story - Section - Site". */
export const stripSiteSuffix = (rawTitle: string): string => {
  let title = normalizeWhitespace(rawTitle);
  for (;;) {
    const match = title.match(SUFFIX_RE);
    if (!match) return title;
    const [, head, tail] = match;
    if (countWords(tail) > 4 || head.length < MIN_TITLE_LENGTH) return title;
    title = head;
  }
};

const firstSubstantive = async (elements: PageElement[]): Promise<string | null> => {
  for (const element of elements) {
    const text = normalizeWhitespace(await element.text());
    if (!isNoiseHeading(text)) return text;
  }
  return null;
};

const headingStrategy = async ({ page }: TitleContext): Promise<Candidate[]> => {
  const ranked: Array<{ text: string; inContent: boolean; words: number }> = [];
  for (const heading of await page.queryAll('h1')) {
    const text = normalizeWhitespace(await heading.text());
    if (isNoiseHeading(text)) continue;
    if (await heading.within(CHROME_CONTAINER)) continue;
    ranked.push({ text, inContent: await heading.within(CONTENT_CONTAINER), words: countWords(text) });
  }
  ranked.sort(
    (a, b) =>
      Number(b.inContent) - Number(a.inContent) || b.words - a.words || b.text.length - a.text.length,
  );
  return ranked.map((entry) => candidate(entry.text, 'h1', entry.inContent ? 0.9 : 0.7));
};

const selectorStrategy = async ({ page, url }: TitleContext): Promise<Candidate[]> => {
  const site = selectorsForUrl(url).title;
  for (const selector of [...site, ...GENERIC_HEADLINE_SELECTORS]) {
    const text = await firstSubstantive(await page.queryAll(selector));
    if (text) {
      const isSite = site.includes(selector);
      return [candidate(text, isSite ? `site:${selector}` : `selector:${selector}`, isSite ? 0.85 : 0.75)];
    }
  }
  return [];
};

const openGraphStrategy = async ({ page }: TitleContext): Promise<Candidate[]> => {
  const meta = await page.queryOne('meta[property="og:title"], meta[name="og:title"]');
  const content = normalizeWhitespace(meta ? await meta.attribute('content') : null);
  if (!content || isGenericWord(content)) return [];
  return [candidate(content, 'og:title', 0.7)];
};

const jsonLdStrategy = async ({ page, logger }: TitleContext): Promise<Candidate[]> => {
  const nodes = await readArticleJsonLd(page, (error) =>
    logger?.debug('Skipping invalid ld+json block', { error: errorMessage(error) }),
  );
  for (const node of nodes) {
    const headline = stringField(node, 'headline');
    if (headline && !isGenericWord(headline)) {
      return [candidate(normalizeWhitespace(headline), 'ld+json:headline', 0.65)];
    }
  }
  return [];
};

const documentTitleStrategy = async ({ page }: TitleContext): Promise<Candidate[]> => {
  const stripped = stripSiteSuffix(await page.title());
  if (!stripped || isGenericWord(stripped)) return [];
  return [candidate(stripped, 'document-title', 0.5)];
};

export const TITLE_STRATEGIES = [
  { name: 'h1', run: headingStrategy },
  { name: 'selectors', run: selectorStrategy },
  { name: 'og:title', run: openGraphStrategy },
  { name: 'ld+json', run: jsonLdStrategy },
  { name: 'document-title', run: documentTitleStrategy },
] as const;

/** Always returns a non-empty title; the feed title is the last resort. */
export const extractTitle = async (ctx: TitleContext, fallbackTitle: string): Promise<Candidate> => {
  const found = await firstCandidate(TITLE_STRATEGIES, ctx, (name, error) =>
    ctx.logger?.debug('Title strategy failed', { strategy: name, error: errorMessage(error) }),
  );
  if (found) return found;
  const fallback = normalizeWhitespace(fallbackTitle);
  return candidate(fallback || 'Untitled', 'feed', 0.1);
};
