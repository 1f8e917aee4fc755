import type { RenderedPage } from '../browser/types';
import type { Logger } from '../obs/logger';
import { countWords, escapeRegExp, meaningfulTokens, normalizeWhitespace, truncateAtBoundary } from '../utils/text';
import { candidate, collectCandidates, pickLongest, type Candidate } from './candidates';
import { errorMessage } from './errors';
import { selectorsForUrl } from './siteSelectors';

export const EXTRACTION_EMPTY_SENTINEL = 'Content could not be extracted for this article.';

export interface ContentOptions {
  minDescriptionLength: number;
  maxDescriptionLength: number;
  substantialContentLength: number;
  minParagraphWords: number;
  titleRelevanceRatio: number;
}

export interface ContentContext {
  page: RenderedPage;
  url: string;
  title: string;
  source: string;
  options: ContentOptions;
  logger?: Logger;
}

export interface ContentResult {
  description: string;
  source: string;
  relevant: boolean;
  empty: boolean;
  candidates: number;
}

const ARTICLE_CONTAINER_SELECTORS = [
  '[itemprop="articleBody"]',
  'article .article-body',
  'article .story-body',
  '.article-body',
  '.article-content',
  '.story-body',
  '.story-content',
  '.entry-content',
  '.post-content',
  'article',
  '[role="main"] article',
  'main',
];

const CONTENT_DIV_SELECTORS = [
  'div[class*="article"]',
  'div[class*="story"]',
  'div[class*="content"]',
  'div[class*="body"]',
  'div[id*="content"]',
  'div[id*="article"]',
];

const BOILERPLATE_KEYWORDS = [
  'skip to',
  'click here',
  'read more',
  'subscribe',
  'newsletter',
  'cookie',
  'privacy policy',
  'terms of service',
  'terms of use',
  'advertisement',
  'follow us',
  'share this',
  'related articles',
  'trending now',
  'live updates',
  'watch video',
  'photo gallery',
  'also read',
  'you may like',
  'recommended',
  'sponsored content',
  'sign up',
  'all rights reserved',
  'download the app',
];

const TIMESTAMP_RE =
  /^(?:(?:updated|published|posted|last updated)\s*:?\s*)?(?:[a-z]{3,9},?\s+)?(?:\d{1,2}\s+[a-z]{3,9},?\s+\d{4}|[a-z]{3,9}\s+\d{1,2},?\s+\d{4}|\d{4}-\d{2}-\d{2}|\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4})(?:[,\s]+\d{1,2}:\d{2}(?::\d{2})?\s*(?:am|pm)?(?:\s*[a-z]{2,4})?)?\.?$/i;

export const isTimestampLike = (text: string): boolean => TIMESTAMP_RE.test(normalizeWhitespace(text));

const isAllCaps = (text: string): boolean => /[A-Z]/.test(text) && text === text.toUpperCase();

export const isBoilerplate = (text: string): boolean => {
  const lower = text.toLowerCase();
  return BOILERPLATE_KEYWORDS.some((keyword) => lower.includes(keyword));
};

/** A paragraph worth keeping: not boilerplate, not shouting, not a bare date, long enough. */
export const isMeaningfulParagraph = (text: string, minWords: number): boolean => {
  const normalized = normalizeWhitespace(text);
  if (!normalized) return false;
  if (isBoilerplate(normalized)) return false;
  if (isAllCaps(normalized)) return false;
  if (isTimestampLike(normalized)) return false;
  return countWords(normalized) >= minWords;
};

/** Normalizes whitespace and drops trailing "| Source" and "Updated: ..." tails. */
export const cleanDescription = (raw: string, source?: string): string => {
  let text = normalizeWhitespace(raw);
  text = text.replace(/\s*(?:last\s+)?updated\s*:.*$/i, '');
  text = text.replace(/\s+\|\s+[^|]{1,60}$/, '');
  if (source) {
    text = text.replace(new RegExp(`\\s*[-|–—]\\s*${escapeRegExp(source)}\\s*$`, 'i'), '');
  }
  return text.trim();
};

export const isTitleRelevant = (text: string, title: string, ratio: number): boolean => {
  const titleTokens = meaningfulTokens(title);
  if (!titleTokens.size) return true;
  const textTokens = meaningfulTokens(text);
  let present = 0;
  for (const token of titleTokens) {
    if (textTokens.has(token)) present += 1;
  }
  return present / titleTokens.size >= ratio;
};

const containerStrategy = async ({ page, url, options, source }: ContentContext): Promise<Candidate[]> => {
  const site = selectorsForUrl(url).content;
  for (const selector of [...site, ...ARTICLE_CONTAINER_SELECTORS]) {
    const element = await page.queryOne(selector);
    if (!element) continue;
    const text = cleanDescription(await element.text(), source);
    if (text.length > options.substantialContentLength) {
      const isSite = site.includes(selector);
      return [candidate(text, isSite ? `site:${selector}` : `container:${selector}`, isSite ? 0.9 : 0.8)];
    }
  }
  return [];
};

const paragraphStrategy = async ({ page, options, source }: ContentContext): Promise<Candidate[]> => {
  const kept: string[] = [];
  let length = 0;
  for (const paragraph of await page.queryAll('p')) {
    const text = normalizeWhitespace(await paragraph.text());
    if (!isMeaningfulParagraph(text, options.minParagraphWords)) continue;
    kept.push(text);
    length += text.length + 1;
    if (length >= options.maxDescriptionLength) break;
  }
  if (!kept.length) return [];
  return [candidate(cleanDescription(kept.join(' '), source), 'paragraphs', 0.85)];
};

const contentDivStrategy = async ({ page, options, source }: ContentContext): Promise<Candidate[]> => {
  for (const selector of CONTENT_DIV_SELECTORS) {
    for (const element of await page.queryAll(selector)) {
      if (await element.within('nav, footer, aside, header')) continue;
      const text = cleanDescription(await element.text(), source);
      if (text.length > options.substantialContentLength && !isBoilerplate(text.slice(0, 200))) {
        return [candidate(text, `div:${selector}`, 0.6)];
      }
    }
  }
  return [];
};

const metaStrategy =
  (selector: string, label: string, confidence: number) =>
  async ({ page, source }: ContentContext): Promise<Candidate[]> => {
    const meta = await page.queryOne(selector);
    const content = cleanDescription((meta && (await meta.attribute('content'))) || '', source);
    return content ? [candidate(content, label, confidence)] : [];
  };

export const CONTENT_STRATEGIES = [
  { name: 'containers', run: containerStrategy },
  { name: 'paragraphs', run: paragraphStrategy },
  { name: 'content-divs', run: contentDivStrategy },
  { name: 'meta-description', run: metaStrategy('meta[name="description"]', 'meta:description', 0.4) },
  { name: 'og-description', run: metaStrategy('meta[property="og:description"]', 'og:description', 0.3) },
] as const;

/**
 * Picks the description: the longest title-relevant candidate, else the longest candidate, else
 * the sentinel. Candidates below the minimum length never qualify.
 */
export const selectDescription = (
  candidates: Candidate[],
  title: string,
  options: ContentOptions,
): Omit<ContentResult, 'candidates'> => {
  const substantial = candidates.filter((c) => c.value.length >= options.minDescriptionLength);
  const relevant = substantial.filter((c) => isTitleRelevant(c.value, title, options.titleRelevanceRatio));
  const best = pickLongest(relevant) ?? pickLongest(substantial);
  if (!best) {
    return { description: EXTRACTION_EMPTY_SENTINEL, source: 'none', relevant: false, empty: true };
  }
  const description = truncateAtBoundary(best.value, options.maxDescriptionLength);
  if (description.length < options.minDescriptionLength) {
    return { description: EXTRACTION_EMPTY_SENTINEL, source: 'none', relevant: false, empty: true };
  }
  return { description, source: best.source, relevant: relevant.includes(best), empty: false };
};

export const extractContent = async (ctx: ContentContext): Promise<ContentResult> => {
  const candidates = await collectCandidates(CONTENT_STRATEGIES, ctx, (name, error) =>
    ctx.logger?.debug('Content strategy failed', { strategy: name, error: errorMessage(error) }),
  );
  const selected = selectDescription(candidates, ctx.title, ctx.options);
  ctx.logger?.debug('Content selected', {
    url: ctx.url,
    source: selected.source,
    relevant: selected.relevant,
    candidates: candidates.length,
  });
  return { ...selected, candidates: candidates.length };
};
