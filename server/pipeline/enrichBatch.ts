import type { AppConfig, EnrichmentMode } from '../../shared/config';
import { ENRICHMENT_ERROR_KINDS, type Article, type EnrichmentErrorKind, type RawFeedEntry } from '../../shared/types';
import { SessionPool } from '../browser/sessionPool';
import type { SessionFactory } from '../browser/types';
import { assembleDegraded } from '../enrichment/articleAssembler';
import { BatchFailedError, errorMessage } from '../enrichment/errors';
import type { Logger } from '../obs/logger';
import { isAborted, sleep } from '../utils/async';
import { enrichArticle } from './enrichArticle';

export interface EnrichBatchArgs {
  runId: string;
  entries: RawFeedEntry[];
  sessions: SessionFactory;
  config: AppConfig;
  logger: Logger;
  mode?: EnrichmentMode;
  signal?: AbortSignal;
  onArticle?: (article: Article, index: number, total: number) => void;
}

export interface EnrichBatchResult {
  articles: Article[];
  attempted: number;
  degraded: number;
  errorsByKind: Record<EnrichmentErrorKind, number>;
  aborted: boolean;
  mode: EnrichmentMode;
  engine: string;
  durationMs: number;
  sessionsCreated: number;
}

const emptyErrorCounts = (): Record<EnrichmentErrorKind, number> => ({
  RedirectUnresolved: 0,
  NavigationTimeout: 0,
  ExtractionEmpty: 0,
  ValidationRejected: 0,
});

export const countErrors = (articles: readonly Article[]) => {
  const errorsByKind = emptyErrorCounts();
  let degraded = 0;
  for (const article of articles) {
    if (!article.error) continue;
    degraded += 1;
    errorsByKind[article.error.kind] += 1;
  }
  return { degraded, errorsByKind };
};

/** Drops zero counts so run metadata only lists kinds that occurred. */
export const compactErrorCounts = (counts: Record<EnrichmentErrorKind, number>): Record<string, number> =>
  Object.fromEntries(ENRICHMENT_ERROR_KINDS.filter((kind) => counts[kind] > 0).map((kind) => [kind, counts[kind]]));

/**
 * Enriches up to `maxArticles` entries. Sequential mode walks them one by one in a single session
 * with a pacing delay; pooled mode runs `concurrency` workers, each borrowing a session per
 * article. Results keep feed order. Throws BatchFailedError when nothing succeeded.
 */
export const enrichBatch = async ({
  runId,
  entries,
  sessions,
  config,
  logger,
  mode = config.enrichment.mode,
  signal,
  onArticle,
}: EnrichBatchArgs): Promise<EnrichBatchResult> => {
  const startedAt = Date.now();
  const options = config.enrichment;
  const selected = entries.slice(0, options.maxArticles);
  const poolSize = mode === 'pooled' ? options.concurrency : 1;
  const pacingMs = mode === 'pooled' ? options.pooledPacingDelayMs : options.pacingDelayMs;
  const pool = new SessionPool(sessions, poolSize, logger);

  const results: Array<Article | undefined> = new Array(selected.length);
  let nextIndex = 0;
  let completed = 0;
  let aborted = false;

  const runOne = async (index: number) => {
    const entry = selected[index];
    try {
      await pool.withSession(async (session) => {
        const outcome = await enrichArticle(entry, { session, config, logger, signal });
        if (outcome.timedOut) {
          await pool.recycle(session);
        }
        results[index] = outcome.article;
      }, signal);
    } catch (error) {
      if (isAborted(error)) throw error;
      logger.error('Session failure while enriching article', { runId, link: entry.link, error: errorMessage(error) });
      results[index] ??= assembleDegraded(
        entry,
        { kind: 'NavigationTimeout', message: `Page failed to load: ${errorMessage(error)}` },
        options.placeholderImageUrl,
      );
    }
    completed += 1;
    const article = results[index];
    if (article) onArticle?.(article, completed, selected.length);
  };

  const worker = async () => {
    for (;;) {
      if (signal?.aborted) {
        aborted = true;
        return;
      }
      const index = nextIndex;
      nextIndex += 1;
      if (index >= selected.length) return;

      try {
        await runOne(index);
        if (pacingMs > 0 && nextIndex < selected.length) {
          await sleep(pacingMs, signal);
        }
      } catch (error) {
        if (!isAborted(error)) throw error;
        aborted = true;
        return;
      }
    }
  };

  const workerCount = Math.min(selected.length, poolSize);
  try {
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    await pool.close();
  }

  const articles = results.filter((article): article is Article => article !== undefined);
  const { degraded, errorsByKind } = countErrors(articles);
  const result: EnrichBatchResult = {
    articles,
    attempted: articles.length,
    degraded,
    errorsByKind,
    aborted,
    mode,
    engine: pool.engine,
    durationMs: Date.now() - startedAt,
    sessionsCreated: pool.stats().created,
  };

  logger.info('Batch enrichment complete', {
    runId,
    mode,
    requested: selected.length,
    attempted: result.attempted,
    degraded,
    aborted,
    durationMs: result.durationMs,
  });

  if (!aborted && selected.length > 0 && degraded === articles.length) {
    throw new BatchFailedError(
      `No article in the batch was enriched successfully (${degraded}/${articles.length} degraded)`,
      articles.length,
      degraded,
      articles,
    );
  }
  return result;
};
