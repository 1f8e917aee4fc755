import type { Article, StorageRecord } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { EnrichmentError } from '../enrichment/errors';
import { isPlaceholderImage } from '../enrichment/qualityScorer';

export type RejectionReason = 'missing_title' | 'placeholder_image' | 'degraded';

export interface GateRejection {
  articleId: string;
  title: string;
  reason: RejectionReason;
  error: EnrichmentError;
}

export interface GateResult {
  records: StorageRecord[];
  rejected: GateRejection[];
}

export const rejectionReason = (article: Article, placeholderImageUrl: string): RejectionReason | null => {
  if (!article.title.trim()) return 'missing_title';
  if (isPlaceholderImage(article.imageUrl, placeholderImageUrl)) return 'placeholder_image';
  if (article.error) return 'degraded';
  return null;
};

export const toStorageRecord = (article: Article, category: string): StorageRecord => ({
  title: article.title.trim(),
  link: article.url,
  published: article.published,
  source: article.source,
  category,
  description: article.description,
  image_url: article.imageUrl,
  article_id: article.id,
  quality_score: article.qualityScore ?? null,
});

/** Splits articles into insertable records and rejections. Rejections are never retried. */
export const gateForStorage = (
  articles: readonly Article[],
  category: string,
  placeholderImageUrl: string,
  logger?: Logger,
): GateResult => {
  const records: StorageRecord[] = [];
  const rejected: GateRejection[] = [];

  for (const article of articles) {
    const reason = rejectionReason(article, placeholderImageUrl);
    if (!reason) {
      records.push(toStorageRecord(article, category));
      continue;
    }
    const error = new EnrichmentError('ValidationRejected', `Rejected for storage: ${reason}`, article.url);
    rejected.push({ articleId: article.id, title: article.title, reason, error });
    logger?.warn('Article rejected by storage gate', { category, articleId: article.id, reason });
  }

  if (rejected.length) {
    logger?.info('Storage gate summary', { category, accepted: records.length, rejected: rejected.length });
  }
  return { records, rejected };
};
