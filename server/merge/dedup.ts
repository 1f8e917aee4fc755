import type { AppConfig } from '../../shared/config';
import type { Article } from '../../shared/types';
import { computeOverlap } from '../utils/text';

export type DedupOptions = AppConfig['dedup'];

export interface MergeResult {
  articles: Article[];
  duplicatesRemoved: number;
  duplicates: {
    article: Article;
    duplicateOf: string;
    reason: 'key' | 'similarity';
    score?: number;
  }[];
}

/**
 * URL part of the dedup key. Besides dropping the query string it also drops the fragment and
 * trailing slashes and lowercases the scheme and host, so `https://Example.com/a/#x` and
 * `https://example.com/a?utm=1` compare equal.
 */
export const normalizeArticleUrl = (raw: string): string => {
  try {
    const url = new URL(raw.trim());
    const path = url.pathname.replace(/\/+$/, '');
    return `${url.protocol}//${url.host.toLowerCase()}${path}`;
  } catch {
    return raw.trim().split(/[?#]/)[0].replace(/\/+$/, '').toLowerCase();
  }
};

export const titleKey = (title: string, prefixLength: number): string =>
  title.trim().toLowerCase().slice(0, prefixLength);

export const dedupKey = (article: Pick<Article, 'title' | 'url'>, prefixLength: number): string =>
  `${titleKey(article.title, prefixLength)}\u0000${normalizeArticleUrl(article.url)}`;

/**
 * Merges article sets in order; the first occurrence of a story wins. A later article is a duplicate
 * when its (title prefix, URL) pair was already accepted, or when its title overlaps an accepted
 * title above the threshold. Sharing only the title prefix or only the URL is not enough.
 */
export const mergeArticleSets = (sets: readonly Article[][], options: DedupOptions): MergeResult => {
  const articles: Article[] = [];
  const duplicates: MergeResult['duplicates'] = [];
  const byKey = new Map<string, Article>();

  for (const article of sets.flat()) {
    const key = dedupKey(article, options.titlePrefixLength);

    const sameKey = byKey.get(key);
    if (sameKey) {
      duplicates.push({ article, duplicateOf: sameKey.id, reason: 'key' });
      continue;
    }

    if (article.title.trim().length >= options.minTitleLengthForSimilarity) {
      const similar = articles
        .filter((accepted) => accepted.title.trim().length >= options.minTitleLengthForSimilarity)
        .map((accepted) => ({ accepted, score: computeOverlap(article.title, accepted.title) }))
        .find(({ score }) => score > options.similarityThreshold);
      if (similar) {
        duplicates.push({ article, duplicateOf: similar.accepted.id, reason: 'similarity', score: similar.score });
        continue;
      }
    }

    articles.push(article);
    byKey.set(key, article);
  }

  return { articles, duplicatesRemoved: duplicates.length, duplicates };
};
