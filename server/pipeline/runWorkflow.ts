import type { AppConfig, EnrichmentMode } from '../../shared/config';
import { artifactFileName, type ArtifactStore } from '../../shared/artifacts';
import { randomId } from '../../shared/crypto';
import type { Article, MergedFile, StageName } from '../../shared/types';
import type { SessionFactory } from '../browser/types';
import { groupByCanonical } from '../categories/categoryMapper';
import { BatchFailedError, errorMessage } from '../enrichment/errors';
import { fetchCategoryFeed } from '../feeds/googleNewsRss';
import { gateForStorage } from '../merge/storageGate';
import type { Logger } from '../obs/logger';
import type { StorageSink } from '../storage/restSink';
import { compactErrorCounts, countErrors, enrichBatch } from './enrichBatch';
import { mergeCategories } from './mergeCategories';
import { makeStageEmitter, noopStageSender, type StageEventSender } from './stageEmitter';

export interface WorkflowDeps {
  config: AppConfig;
  logger: Logger;
  store: ArtifactStore;
  sessions: SessionFactory;
  sink: StorageSink;
  fetchFeed?: typeof fetchCategoryFeed;
}

export interface WorkflowOptions {
  runId?: string;
  categories?: string[];
  skip?: Partial<Record<StageName, boolean>>;
  mode?: EnrichmentMode;
  signal?: AbortSignal;
  send?: StageEventSender;
}

export interface CategoryFailure {
  category: string;
  error: string;
}

export interface CategoryEnrichSummary {
  category: string;
  attempted: number;
  degraded: number;
  errorsByKind: Record<string, number>;
  aborted: boolean;
}

export interface WorkflowReport {
  runId: string;
  categories: string[];
  startedAt: string;
  durationMs: number;
  aborted: boolean;
  fetch: { skipped: boolean; succeeded: string[]; failed: CategoryFailure[] };
  enrich: { skipped: boolean; succeeded: string[]; failed: CategoryFailure[]; summaries: CategoryEnrichSummary[] };
  merge: { skipped: boolean; merged: { category: string; sources: string[]; total: number; duplicatesRemoved: number }[] };
  upload: {
    skipped: boolean;
    disabled: boolean;
    stored: number;
    rejected: number;
    rejectedByReason: Record<string, number>;
    failed: CategoryFailure[];
  };
}

/** Non-zero when a step that ran produced nothing: no feed fetched or no category enriched. */
export const workflowExitCode = (report: WorkflowReport): number => {
  if (!report.fetch.skipped && report.fetch.succeeded.length === 0) return 1;
  if (!report.enrich.skipped && report.enrich.succeeded.length === 0) return 1;
  return 0;
};

const emptyReport = (runId: string, categories: string[], skip: Partial<Record<StageName, boolean>>): WorkflowReport => ({
  runId,
  categories,
  startedAt: new Date().toISOString(),
  durationMs: 0,
  aborted: false,
  fetch: { skipped: Boolean(skip.fetch), succeeded: [], failed: [] },
  enrich: { skipped: Boolean(skip.enrich), succeeded: [], failed: [], summaries: [] },
  merge: { skipped: Boolean(skip.merge), merged: [] },
  upload: {
    skipped: Boolean(skip.upload),
    disabled: false,
    stored: 0,
    rejected: 0,
    rejectedByReason: {},
    failed: [],
  },
});

/**
 * Runs fetch, enrich, merge and upload over the requested raw categories. Each step reads the
 * artifacts the previous one wrote, so any step can be skipped and resumed from files on disk.
 * Failures are isolated per category and recorded in the report.
 */
export const runWorkflow = async (deps: WorkflowDeps, options: WorkflowOptions = {}): Promise<WorkflowReport> => {
  const { config, store, sessions, sink } = deps;
  const fetchFeed = deps.fetchFeed ?? fetchCategoryFeed;
  const runId = options.runId ?? randomId('run');
  const categories = options.categories?.length ? options.categories : config.feeds.categories;
  const skip = options.skip ?? {};
  const send = options.send ?? noopStageSender;
  const signal = options.signal;
  const logger = deps.logger.child({ runId });
  const startedAt = Date.now();
  const report = emptyReport(runId, categories, skip);

  await store.ensureLayout();
  logger.info('Workflow started', { categories, skip, mode: options.mode ?? config.enrichment.mode });

  const stopped = () => {
    if (signal?.aborted) report.aborted = true;
    return report.aborted;
  };

  // fetch
  if (skip.fetch) {
    makeStageEmitter(runId, 'fetch', send).skipped('Fetch step skipped');
  } else {
    for (const category of categories) {
      if (stopped()) break;
      const stage = makeStageEmitter(runId, 'fetch', send, category);
      stage.start({ message: `Fetching ${category} feed` });
      try {
        const feed = await fetchFeed(category, config, { signal, logger: logger.child({ category }) });
        if (!feed) {
          throw new Error(`No feed query configured for category "${category}"`);
        }
        await store.saveFeedFile(category, feed);
        report.fetch.succeeded.push(category);
        stage.success({ message: `Fetched ${feed.articles.length} entries`, data: { count: feed.articles.length } });
      } catch (error) {
        logger.error('Feed fetch failed', { category, error: errorMessage(error) });
        report.fetch.failed.push({ category, error: errorMessage(error) });
        stage.failure(error);
      }
    }
  }

  // enrich
  if (skip.enrich) {
    makeStageEmitter(runId, 'enrich', send).skipped('Enrich step skipped');
  } else {
    for (const category of categories) {
      if (stopped()) break;
      const stage = makeStageEmitter(runId, 'enrich', send, category);
      const categoryLogger = logger.child({ category });
      const feed = await store.loadFeedFile(category);
      if (!feed) {
        report.enrich.failed.push({ category, error: 'Feed file not found' });
        stage.failure(new Error(`Feed file not found: ${artifactFileName('news', category)}`));
        continue;
      }

      stage.start({ message: `Enriching ${Math.min(feed.articles.length, config.enrichment.maxArticles)} articles` });
      const saveEnriched = async (articles: Article[], mode: EnrichmentMode, aborted: boolean) => {
        const { degraded, errorsByKind } = countErrors(articles);
        await store.saveEnrichedFile(category, {
          metadata: {
            source_file: artifactFileName('news', category),
            generation_time: new Date().toISOString(),
            total_articles: articles.length,
            browser_engine: sessions.engine,
            mode,
            degraded,
            errors_by_kind: compactErrorCounts(errorsByKind),
            aborted,
          },
          articles,
        });
        const summary = { category, attempted: articles.length, degraded, errorsByKind: compactErrorCounts(errorsByKind), aborted };
        report.enrich.summaries.push(summary);
        return summary;
      };

      try {
        const result = await enrichBatch({
          runId,
          entries: feed.articles,
          sessions,
          config,
          logger: categoryLogger,
          mode: options.mode,
          signal,
          onArticle: (article, completed, total) =>
            stage.progress({
              message: `${completed}/${total}`,
              data: { id: article.id, title: article.title, error: article.error?.kind },
            }),
        });
        const summary = await saveEnriched(result.articles, result.mode, result.aborted);
        if (result.attempted > result.degraded) {
          report.enrich.succeeded.push(category);
        } else {
          report.enrich.failed.push({
            category,
            error: result.aborted ? 'Aborted before any article was enriched' : 'Feed had no entries',
          });
        }
        if (result.aborted) report.aborted = true;
        stage.success({ message: `Enriched ${summary.attempted - summary.degraded}/${summary.attempted}`, data: summary });
      } catch (error) {
        if (error instanceof BatchFailedError) {
          await saveEnriched(error.articles, options.mode ?? config.enrichment.mode, false);
        }
        categoryLogger.error('Enrichment failed', { error: errorMessage(error) });
        report.enrich.failed.push({ category, error: errorMessage(error) });
        stage.failure(error);
      }
    }
  }

  // merge
  let mergedFiles: MergedFile[] = [];
  if (skip.merge) {
    makeStageEmitter(runId, 'merge', send).skipped('Merge step skipped');
  } else if (!stopped()) {
    const stage = makeStageEmitter(runId, 'merge', send);
    stage.start({ message: `Merging ${categories.length} raw categories` });
    try {
      const merged = await mergeCategories(categories, store, config, logger);
      mergedFiles = merged.map((entry) => entry.file);
      report.merge.merged = merged.map((entry) => ({
        category: entry.category,
        sources: entry.rawCategories,
        total: entry.file.metadata.total_articles,
        duplicatesRemoved: entry.file.metadata.duplicates_removed,
      }));
      stage.success({ message: `Merged into ${merged.length} categories`, data: report.merge.merged });
    } catch (error) {
      logger.error('Merge failed', { error: errorMessage(error) });
      stage.failure(error);
    }
  }

  // upload
  if (skip.upload) {
    makeStageEmitter(runId, 'upload', send).skipped('Upload step skipped');
  } else if (!stopped()) {
    if (skip.merge) {
      for (const category of Object.keys(groupByCanonical(categories))) {
        const file = await store.loadMergedFile(category);
        if (file) mergedFiles.push(file);
      }
    }
    report.upload.disabled = !sink.enabled;

    for (const file of mergedFiles) {
      const category = file.metadata.category;
      const stage = makeStageEmitter(runId, 'upload', send, category);
      const { records, rejected } = gateForStorage(
        file.articles,
        category,
        config.enrichment.placeholderImageUrl,
        logger.child({ category }),
      );
      report.upload.rejected += rejected.length;
      for (const rejection of rejected) {
        report.upload.rejectedByReason[rejection.reason] = (report.upload.rejectedByReason[rejection.reason] ?? 0) + 1;
      }

      stage.start({ message: `Uploading ${records.length} records`, data: { rejected: rejected.length } });
      try {
        const result = await sink.insert(records, { signal });
        report.upload.stored += result.stored;
        stage.success({ message: result.skipped ? 'Storage disabled' : `Stored ${result.stored}`, data: result });
      } catch (error) {
        logger.error('Upload failed', { category, error: errorMessage(error) });
        report.upload.failed.push({ category, error: errorMessage(error) });
        stage.failure(error);
      }
    }
  }

  report.durationMs = Date.now() - startedAt;
  logger.info('Workflow finished', {
    durationMs: report.durationMs,
    aborted: report.aborted,
    fetched: report.fetch.succeeded.length,
    enriched: report.enrich.succeeded.length,
    merged: report.merge.merged.length,
    stored: report.upload.stored,
    rejected: report.upload.rejected,
  });
  return report;
};
