import { z } from 'zod';

export const DEFAULT_CATEGORIES = [
  'top',
  'business',
  'technology',
  'entertainment',
  'sports',
  'health',
  'science',
  'world',
  'trending',
  'politics',
  'national',
  'india',
  'education',
  'crime',
  'celebrity',
];

export const PLACEHOLDER_IMAGE_URL = 'https://via.placeholder.com/300x150?text=No+Image';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  feeds: z.object({
    language: z.string().min(2),
    country: z.string().min(2),
    maxResults: z.number().int().positive(),
    fetchTimeoutMs: z.number().int().positive(),
    categories: z.array(z.string().min(1)).min(1),
  }),
  browser: z.object({
    engine: z.enum(['playwright', 'static']),
    headless: z.boolean(),
    executablePath: z.string().optional(),
    userAgent: z.string().min(1),
    viewport: z.object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    }),
    launchArgs: z.array(z.string()),
  }),
  enrichment: z.object({
    mode: z.enum(['sequential', 'pooled']),
    concurrency: z.number().int().positive().max(16),
    maxArticles: z.number().int().positive(),
    navigationTimeoutMs: z.number().int().positive(),
    articleTimeoutMs: z.number().int().positive(),
    settleDelayMs: z.number().int().nonnegative(),
    pacingDelayMs: z.number().int().nonnegative(),
    pooledPacingDelayMs: z.number().int().nonnegative(),
    minDescriptionLength: z.number().int().positive(),
    maxDescriptionLength: z.number().int().positive(),
    substantialContentLength: z.number().int().positive(),
    minParagraphWords: z.number().int().positive(),
    titleRelevanceRatio: z.number().min(0).max(1),
    maxImageScan: z.number().int().positive(),
    maxLinksPerSelector: z.number().int().positive(),
    maxKeyPoints: z.number().int().positive(),
    placeholderImageUrl: z.string().url(),
  }),
  scoring: z.object({
    breakingScore: z.number().nonnegative(),
    politicalScore: z.number().nonnegative(),
    socialScore: z.number().nonnegative(),
    regionalBoost: z.number().nonnegative(),
    trustedMultiplier: z.number().min(1),
    maxScore: z.number().positive(),
  }),
  dedup: z.object({
    titlePrefixLength: z.number().int().positive(),
    similarityThreshold: z.number().min(0).max(1),
    minTitleLengthForSimilarity: z.number().int().nonnegative(),
  }),
  persistence: z.object({
    mode: z.enum(['fs', 'none']),
    rootDir: z.string().min(1),
    feedsDir: z.string().min(1),
    enrichedDir: z.string().min(1),
    mergedDir: z.string().min(1),
  }),
  storage: z.object({
    enabled: z.boolean(),
    url: z.string().url().optional(),
    apiKey: z.string().optional(),
    table: z.string().min(1),
    batchSize: z.number().int().positive(),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type EnrichmentMode = AppConfig['enrichment']['mode'];
export type BrowserEngine = AppConfig['browser']['engine'];

export interface PublicConfig {
  categories: string[];
  browser: { engine: BrowserEngine; headless: boolean };
  enrichment: {
    mode: EnrichmentMode;
    concurrency: number;
    maxArticles: number;
    navigationTimeoutMs: number;
    articleTimeoutMs: number;
  };
  storage: { enabled: boolean; table: string };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  categories: config.feeds.categories,
  browser: {
    engine: config.browser.engine,
    headless: config.browser.headless,
  },
  enrichment: {
    mode: config.enrichment.mode,
    concurrency: config.enrichment.concurrency,
    maxArticles: config.enrichment.maxArticles,
    navigationTimeoutMs: config.enrichment.navigationTimeoutMs,
    articleTimeoutMs: config.enrichment.articleTimeoutMs,
  },
  storage: {
    enabled: config.storage.enabled,
    table: config.storage.table,
  },
});

export const parseMaxArticlesParam = (value: unknown, fallback: number): number | undefined => {
  if (value == null) {
    return undefined;
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    return undefined;
  }
  const clamped = Math.max(1, Math.min(100, Math.round(n)));
  return clamped === fallback ? undefined : clamped;
};

export const parseModeParam = (value: unknown): EnrichmentMode | undefined => {
  const normalized = String(value ?? '').trim().toLowerCase();
  if (normalized === 'sequential' || normalized === 'pooled') {
    return normalized;
  }
  return undefined;
};
