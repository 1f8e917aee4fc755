import path from 'node:path';
import {
  ConfigSchema,
  DEFAULT_CATEGORIES,
  PLACEHOLDER_IMAGE_URL,
  type AppConfig,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export const csvFromEnv = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

const DEFAULT_LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
];

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const rootDir = path.resolve(env.DATA_DIR || path.join(process.cwd(), 'data'));
  const categories = csvFromEnv(env.NEWS_CATEGORIES);
  const storageUrl = env.STORAGE_URL?.trim() || env.SUPABASE_URL?.trim() || undefined;
  const storageKey = env.STORAGE_API_KEY?.trim() || env.SUPABASE_KEY?.trim() || undefined;

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    feeds: {
      language: env.NEWS_LANGUAGE?.trim() || 'en',
      country: env.NEWS_COUNTRY?.trim() || 'US',
      maxResults: numberFromEnv(env.FEED_MAX_RESULTS, 40),
      fetchTimeoutMs: numberFromEnv(env.FEED_FETCH_TIMEOUT_MS, 15_000),
      categories: categories.length ? categories : DEFAULT_CATEGORIES,
    },
    browser: {
      engine: env.BROWSER_ENGINE?.trim().toLowerCase() === 'static' ? 'static' : 'playwright',
      headless: booleanFromEnv(env.BROWSER_HEADLESS, true),
      executablePath: env.BROWSER_EXECUTABLE_PATH?.trim() || undefined,
      userAgent:
        env.BROWSER_USER_AGENT?.trim() ||
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
      viewport: {
        width: numberFromEnv(env.BROWSER_VIEWPORT_WIDTH, 1280),
        height: numberFromEnv(env.BROWSER_VIEWPORT_HEIGHT, 720),
      },
      launchArgs: csvFromEnv(env.BROWSER_LAUNCH_ARGS).length ? csvFromEnv(env.BROWSER_LAUNCH_ARGS) : DEFAULT_LAUNCH_ARGS,
    },
    enrichment: {
      mode: env.ENRICH_MODE?.trim().toLowerCase() === 'pooled' ? 'pooled' : 'sequential',
      concurrency: numberFromEnv(env.ENRICH_CONCURRENCY, 3),
      maxArticles: numberFromEnv(env.ENRICH_MAX_ARTICLES, 5),
      navigationTimeoutMs: numberFromEnv(env.NAVIGATION_TIMEOUT_MS, 10_000),
      articleTimeoutMs: numberFromEnv(env.ARTICLE_TIMEOUT_MS, 45_000),
      settleDelayMs: numberFromEnv(env.SETTLE_DELAY_MS, 2_000),
      pacingDelayMs: numberFromEnv(env.PACING_DELAY_MS, 300),
      pooledPacingDelayMs: numberFromEnv(env.POOLED_PACING_DELAY_MS, 0),
      minDescriptionLength: numberFromEnv(env.MIN_DESCRIPTION_LENGTH, 50),
      maxDescriptionLength: numberFromEnv(env.MAX_DESCRIPTION_LENGTH, 500),
      substantialContentLength: numberFromEnv(env.SUBSTANTIAL_CONTENT_LENGTH, 200),
      minParagraphWords: numberFromEnv(env.MIN_PARAGRAPH_WORDS, 8),
      titleRelevanceRatio: numberFromEnv(env.TITLE_RELEVANCE_RATIO, 0.3),
      maxImageScan: numberFromEnv(env.MAX_IMAGE_SCAN, 30),
      maxLinksPerSelector: numberFromEnv(env.MAX_LINKS_PER_SELECTOR, 10),
      maxKeyPoints: numberFromEnv(env.MAX_KEY_POINTS, 5),
      placeholderImageUrl: env.PLACEHOLDER_IMAGE_URL?.trim() || PLACEHOLDER_IMAGE_URL,
    },
    scoring: {
      breakingScore: numberFromEnv(env.SCORE_BREAKING, 900),
      politicalScore: numberFromEnv(env.SCORE_POLITICAL, 700),
      socialScore: numberFromEnv(env.SCORE_SOCIAL, 500),
      regionalBoost: numberFromEnv(env.SCORE_REGIONAL_BOOST, 200),
      trustedMultiplier: numberFromEnv(env.SCORE_TRUSTED_MULTIPLIER, 1.5),
      maxScore: 1000,
    },
    dedup: {
      titlePrefixLength: numberFromEnv(env.DEDUP_TITLE_PREFIX_LENGTH, 50),
      similarityThreshold: numberFromEnv(env.DEDUP_SIMILARITY_THRESHOLD, 0.8),
      minTitleLengthForSimilarity: numberFromEnv(env.DEDUP_MIN_TITLE_LENGTH, 20),
    },
    persistence: {
      mode: booleanFromEnv(env.PERSISTENCE_DISABLED, false) ? 'none' : 'fs',
      rootDir,
      feedsDir: path.join(rootDir, 'feeds'),
      enrichedDir: path.join(rootDir, 'enriched'),
      mergedDir: path.join(rootDir, 'merged'),
    },
    storage: {
      enabled: booleanFromEnv(env.STORAGE_ENABLED, true) && Boolean(storageUrl && storageKey),
      url: storageUrl,
      apiKey: storageKey,
      table: env.STORAGE_TABLE?.trim() || 'news_articles',
      batchSize: numberFromEnv(env.STORAGE_BATCH_SIZE, 50),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};

export const withDataDir = (config: AppConfig, dataDir: string): AppConfig => {
  const rootDir = path.resolve(dataDir);
  return {
    ...config,
    persistence: {
      ...config.persistence,
      rootDir,
      feedsDir: path.join(rootDir, 'feeds'),
      enrichedDir: path.join(rootDir, 'enriched'),
      mergedDir: path.join(rootDir, 'merged'),
    },
  };
};
