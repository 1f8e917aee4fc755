import { z } from 'zod';

export type StageName = 'fetch' | 'enrich' | 'merge' | 'upload';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure' | 'skipped';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  category?: string;
  message?: string;
  data?: T;
  ts: string;
}

export const ENRICHMENT_ERROR_KINDS = [
  'RedirectUnresolved',
  'NavigationTimeout',
  'ExtractionEmpty',
  'ValidationRejected',
] as const;

export type EnrichmentErrorKind = (typeof ENRICHMENT_ERROR_KINDS)[number];

export const RawFeedEntrySchema = z.object({
  title: z.string().min(1),
  link: z.string().url(),
  source: z.string().default('Unknown Source'),
  published: z.string().default(''),
});

export type RawFeedEntry = z.infer<typeof RawFeedEntrySchema>;

export const FeedFileSchema = z.object({
  metadata: z
    .object({
      category: z.string().default('uncategorized'),
      query: z.string().optional(),
      fetched_at: z.string().default(''),
      total_articles: z.number().int().nonnegative().default(0),
      language: z.string().optional(),
      country: z.string().optional(),
    })
    .default({}),
  articles: z.array(RawFeedEntrySchema),
});

export type FeedFile = z.infer<typeof FeedFileSchema>;

export const ArticleErrorSchema = z.object({
  kind: z.enum(ENRICHMENT_ERROR_KINDS),
  message: z.string(),
});

export type ArticleError = z.infer<typeof ArticleErrorSchema>;

export const ArticleSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  source: z.string(),
  url: z.string(),
  imageUrl: z.string(),
  description: z.string().nullable(),
  keyPoints: z.array(z.string()),
  published: z.string(),
  qualityScore: z.number().min(0).max(1000).optional(),
  error: ArticleErrorSchema.optional(),
});

export type Article = z.infer<typeof ArticleSchema>;

export const EnrichedFileSchema = z.object({
  metadata: z.object({
    source_file: z.string(),
    generation_time: z.string(),
    total_articles: z.number().int().nonnegative(),
    browser_engine: z.string(),
    mode: z.string(),
    degraded: z.number().int().nonnegative(),
    errors_by_kind: z.record(z.number().int().nonnegative()),
    aborted: z.boolean().optional(),
  }),
  articles: z.array(ArticleSchema),
});

export type EnrichedFile = z.infer<typeof EnrichedFileSchema>;

export const MergedFileSchema = z.object({
  metadata: z.object({
    category: z.string(),
    source_files: z.array(z.string()),
    generation_time: z.string(),
    total_articles: z.number().int().nonnegative(),
    duplicates_removed: z.number().int().nonnegative(),
  }),
  articles: z.array(ArticleSchema),
});

export type MergedFile = z.infer<typeof MergedFileSchema>;

export interface StorageRecord {
  title: string;
  link: string;
  published: string;
  source: string;
  category: string;
  description: string | null;
  image_url: string;
  article_id: string;
  quality_score: number | null;
}
