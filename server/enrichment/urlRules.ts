import { isAggregatorUrl } from './aggregatorLinks';

const BLOCKED_URL_PATTERNS = [
  'google.com',
  'youtube.com',
  'facebook.com',
  'twitter.com',
  'instagram.com',
  'linkedin.com',
  'pinterest.com',
  'reddit.com',
  'tiktok.com',
  'whatsapp.com',
  'ads.',
  'doubleclick.',
  'googleadservices.',
  'googlesyndication.',
  'amazon.com/dp/',
  'amazon.com/gp/',
  'ebay.com',
];

const ARTICLE_PATH_INDICATORS = [
  '/article/',
  '/news/',
  '/story/',
  '/post/',
  '/blog/',
  '.html',
  '.htm',
  '/20',
  '/article-',
  '/news-',
];

const NEWS_DOMAINS = [
  'cnn.com',
  'bbc.',
  'reuters.com',
  'apnews.com',
  'ap.org',
  'npr.org',
  'nytimes.com',
  'washingtonpost.com',
  'wsj.com',
  'bloomberg.com',
  'theguardian.com',
  'independent.co.uk',
  'telegraph.co.uk',
  'timesofindia',
  'hindustantimes.com',
  'indianexpress.com',
  'ndtv.com',
  'news18.com',
  'zeenews',
  'deccanherald.com',
  'thehindu.com',
  'livemint.com',
  'economictimes',
  'business-standard.com',
];

/**
 * Decides whether an outbound href found on an aggregator page is worth navigating to: blocked
 * social/ad/marketplace hosts lose, known article shapes and news domains win, and anything else
 * needs a reasonably long path.
 */
export const isValidArticleUrl = (rawUrl: string | null | undefined): boolean => {
  if (!rawUrl) return false;
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return false;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
  if (isAggregatorUrl(rawUrl)) return false;

  const lower = rawUrl.toLowerCase();
  if (BLOCKED_URL_PATTERNS.some((pattern) => lower.includes(pattern))) return false;
  if (ARTICLE_PATH_INDICATORS.some((indicator) => lower.includes(indicator))) return true;
  if (NEWS_DOMAINS.some((domain) => parsed.hostname.toLowerCase().includes(domain))) return true;

  return lower.length > 20 && lower.indexOf('/', 10) > 0 && parsed.pathname.length > 1;
};
