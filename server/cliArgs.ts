import { ConfigSchema, parseModeParam, type AppConfig, type BrowserEngine, type EnrichmentMode } from '../shared/config';
import type { StageName } from '../shared/types';
import { csvFromEnv, withDataDir } from './config/config';

export interface CliArgs {
  categories: string[];
  maxArticles?: number;
  timeoutSeconds?: number;
  mode?: EnrichmentMode;
  concurrency?: number;
  engine?: BrowserEngine;
  dataDir?: string;
  language?: string;
  country?: string;
  skip: Partial<Record<StageName, boolean>>;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const CLI_USAGE = `
News enrichment workflow

Usage:
  npm run cli -- [options]

Options:
  --categories <a,b>     Raw categories to process (default: NEWS_CATEGORIES or the built-in list)
  --max-articles <n>     Articles enriched per category
  --timeout <seconds>    Page navigation timeout
  --mode <mode>          sequential or pooled
  --concurrency <n>      Sessions in pooled mode
  --engine <engine>      playwright or static
  --data-dir <path>      Directory holding feeds/, enriched/ and merged/
  --language <code>      Feed language, e.g. en
  --country <code>       Feed country, e.g. IN
  --skip-fetch           Reuse feed files on disk
  --skip-enrich          Reuse enriched files on disk
  --skip-merge           Reuse merged files on disk
  --skip-upload          Do not insert into storage
  -h, --help             Show this help message
`;

const positiveInt = (flag: string, raw: string | undefined): number => {
  const value = Number(raw);
  if (raw == null || !Number.isInteger(value) || value <= 0) {
    throw new CliUsageError(`${flag} expects a positive integer, got "${raw ?? ''}"`);
  }
  return value;
};

const requireValue = (flag: string, raw: string | undefined): string => {
  if (raw == null || raw.startsWith('--') || !raw.trim()) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return raw.trim();
};

export const parseCliArgs = (argv: readonly string[]): CliArgs => {
  const result: CliArgs = { categories: [], skip: {}, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--categories':
        result.categories = csvFromEnv(requireValue(arg, argv[++i]));
        break;
      case '--max-articles':
        result.maxArticles = positiveInt(arg, argv[++i]);
        break;
      case '--timeout':
        result.timeoutSeconds = positiveInt(arg, argv[++i]);
        break;
      case '--mode': {
        const raw = requireValue(arg, argv[++i]);
        const mode = parseModeParam(raw);
        if (!mode) throw new CliUsageError(`--mode expects sequential or pooled, got "${raw}"`);
        result.mode = mode;
        break;
      }
      case '--concurrency':
        result.concurrency = positiveInt(arg, argv[++i]);
        break;
      case '--engine': {
        const raw = requireValue(arg, argv[++i]).toLowerCase();
        if (raw !== 'playwright' && raw !== 'static') {
          throw new CliUsageError(`--engine expects playwright or static, got "${raw}"`);
        }
        result.engine = raw;
        break;
      }
      case '--data-dir':
        result.dataDir = requireValue(arg, argv[++i]);
        break;
      case '--language':
        result.language = requireValue(arg, argv[++i]);
        break;
      case '--country':
        result.country = requireValue(arg, argv[++i]);
        break;
      case '--skip-fetch':
        result.skip.fetch = true;
        break;
      case '--skip-enrich':
        result.skip.enrich = true;
        break;
      case '--skip-merge':
        result.skip.merge = true;
        break;
      case '--skip-upload':
        result.skip.upload = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown option "${arg}"`);
    }
  }

  return result;
};

/** Layers CLI flags over the environment config and validates the result. */
export const applyCliArgs = (base: AppConfig, args: CliArgs): AppConfig => {
  const config = args.dataDir ? withDataDir(base, args.dataDir) : base;
  return ConfigSchema.parse({
    ...config,
    feeds: {
      ...config.feeds,
      language: args.language ?? config.feeds.language,
      country: args.country ?? config.feeds.country,
      categories: args.categories.length ? args.categories : config.feeds.categories,
    },
    browser: { ...config.browser, engine: args.engine ?? config.browser.engine },
    enrichment: {
      ...config.enrichment,
      mode: args.mode ?? config.enrichment.mode,
      concurrency: args.concurrency ?? config.enrichment.concurrency,
      maxArticles: args.maxArticles ?? config.enrichment.maxArticles,
      navigationTimeoutMs:
        args.timeoutSeconds != null ? args.timeoutSeconds * 1000 : config.enrichment.navigationTimeoutMs,
    },
  });
};
