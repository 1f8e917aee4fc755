import { createHash } from 'node:crypto';
import type { Article, ArticleError, RawFeedEntry } from '../../shared/types';
import { normalizeWhitespace } from '../utils/text';

/** Stable article identity: md5 over `url|title|source`. */
export const computeArticleId = (url: string, title: string, source: string): string =>
  createHash('md5').update(`${url}|${title}|${source}`).digest('hex');

export interface ExtractedParts {
  resolvedUrl: string;
  title: string;
  description: string | null;
  imageUrl: string;
  keyPoints: string[];
  qualityScore: number;
  error?: ArticleError;
}

export const assembleArticle = (entry: RawFeedEntry, parts: ExtractedParts): Article => {
  const title = normalizeWhitespace(parts.title) || normalizeWhitespace(entry.title);
  const article: Article = {
    id: computeArticleId(parts.resolvedUrl, title, entry.source),
    title,
    source: entry.source,
    url: parts.resolvedUrl,
    imageUrl: parts.imageUrl,
    description: parts.description,
    keyPoints: parts.keyPoints,
    published: entry.published,
    qualityScore: parts.qualityScore,
  };
  if (parts.error) article.error = parts.error;
  return article;
};

/** The record kept for an entry whose page could not be reached or resolved. */
export const assembleDegraded = (entry: RawFeedEntry, error: ArticleError, placeholderImageUrl: string): Article => ({
  id: computeArticleId(entry.link, entry.title, entry.source),
  title: entry.title,
  source: entry.source,
  url: entry.link,
  imageUrl: placeholderImageUrl,
  description: null,
  keyPoints: [],
  published: entry.published,
  error,
});
