import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { parseMaxArticlesParam, parseModeParam, type AppConfig } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import { RawFeedEntrySchema } from '../../shared/types';
import { mapCategory } from '../categories/categoryMapper';
import { getPublicConfig } from '../config/config';
import { BatchFailedError, errorMessage } from '../enrichment/errors';
import { mergeArticleSets } from '../merge/dedup';
import { gateForStorage } from '../merge/storageGate';
import { enrichArticle } from '../pipeline/enrichArticle';
import { enrichBatch, compactErrorCounts } from '../pipeline/enrichBatch';
import { runWorkflow, type WorkflowDeps } from '../pipeline/runWorkflow';
import { createSseStream } from './sse';

const EnrichRequestSchema = z.object({ entry: RawFeedEntrySchema });

const EnrichBatchRequestSchema = z.object({
  category: z.string().trim().min(1),
  entries: z.array(RawFeedEntrySchema).min(1),
  mode: z.enum(['sequential', 'pooled']).optional(),
  maxArticles: z.number().int().positive().max(100).optional(),
});

const ARTIFACT_KINDS = ['news', 'inshorts', 'final'] as const;

const withEnrichmentOverrides = (
  config: AppConfig,
  overrides: { maxArticles?: number },
): AppConfig =>
  overrides.maxArticles == null
    ? config
    : { ...config, enrichment: { ...config.enrichment, maxArticles: overrides.maxArticles } };

export const createApp = (deps: WorkflowDeps) => {
  const { config, logger, store, sessions } = deps;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  const route =
    (handler: (req: Request, res: Response) => Promise<void>) =>
    (req: Request, res: Response): void => {
      handler(req, res).catch((error: unknown) => {
        logger.error('Request failed', { method: req.method, path: req.originalUrl, error: errorMessage(error) });
        if (!res.headersSent) {
          res.status(500).json({ error: errorMessage(error) });
        }
      });
    };

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get('/api/categories/map', (req: Request, res: Response) => {
    const label = String(req.query.label ?? '').trim();
    if (!label) {
      res.status(400).json({ error: 'Missing label query' });
      return;
    }
    res.json({ label, category: mapCategory(label, logger) });
  });

  app.post(
    '/api/enrich',
    route(async (req, res) => {
      const parsed = EnrichRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid feed entry', issues: parsed.error.issues });
        return;
      }
      const session = await sessions.create();
      try {
        const outcome = await enrichArticle(parsed.data.entry, { session, config, logger });
        res.json(outcome);
      } finally {
        await session.close();
      }
    }),
  );

  app.post(
    '/api/enrich/batch',
    route(async (req, res) => {
      const parsed = EnrichBatchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid batch request', issues: parsed.error.issues });
        return;
      }
      const { category, entries, mode, maxArticles } = parsed.data;
      const requestConfig = withEnrichmentOverrides(config, { maxArticles });
      const canonical = mapCategory(category, logger);

      try {
        const result = await enrichBatch({
          runId: randomId('req'),
          entries,
          sessions,
          config: requestConfig,
          logger: logger.child({ category }),
          mode,
        });
        const merged = mergeArticleSets([result.articles], config.dedup);
        const gate = gateForStorage(merged.articles, canonical, config.enrichment.placeholderImageUrl, logger);
        res.json({
          category,
          canonicalCategory: canonical,
          enrichment: {
            attempted: result.attempted,
            degraded: result.degraded,
            errorsByKind: compactErrorCounts(result.errorsByKind),
            mode: result.mode,
            engine: result.engine,
            durationMs: result.durationMs,
          },
          articles: merged.articles,
          duplicatesRemoved: merged.duplicatesRemoved,
          records: gate.records,
          rejected: gate.rejected.map(({ articleId, title, reason }) => ({ articleId, title, reason })),
        });
      } catch (error) {
        if (error instanceof BatchFailedError) {
          res.status(500).json({
            error: error.message,
            attempted: error.attempted,
            degraded: error.degraded,
            articles: error.articles,
          });
          return;
        }
        throw error;
      }
    }),
  );

  app.get(
    '/api/enrich-stream',
    route(async (req, res) => {
      const category = String(req.query.category ?? '').trim();
      const stream = createSseStream(res, {
        heartbeatMs: config.server.heartbeatIntervalMs,
        label: 'enrich',
      });

      if (!category) {
        stream.sendJson('fatal', { error: 'Missing category query' });
        stream.close();
        return;
      }

      const requestConfig = withEnrichmentOverrides(config, {
        maxArticles: parseMaxArticlesParam(req.query.maxArticles, config.enrichment.maxArticles),
      });

      try {
        const report = await runWorkflow(
          { ...deps, config: requestConfig },
          {
            categories: [category],
            mode: parseModeParam(req.query.mode),
            skip: { upload: req.query.upload !== '1' },
            signal: stream.controller.signal,
            send: stream.send,
          },
        );
        stream.sendJson('report', report);
      } catch (error) {
        logger.error('Enrich stream failed', { category, error: errorMessage(error) });
        stream.sendJson('fatal', { error: errorMessage(error) });
      } finally {
        stream.close();
      }
    }),
  );

  app.get(
    '/api/files/:kind/:category',
    route(async (req, res) => {
      const kind = ARTIFACT_KINDS.find((candidate) => candidate === req.params.kind);
      const category = String(req.params.category || '').trim();
      if (!kind || !category) {
        res.status(400).json({ error: `Unknown artifact kind: ${req.params.kind}` });
        return;
      }
      const file =
        kind === 'news'
          ? await store.loadFeedFile(category)
          : kind === 'inshorts'
            ? await store.loadEnrichedFile(category)
            : await store.loadMergedFile(category);
      if (!file) {
        res.status(404).json({ error: 'Not found' });
        return;
      }
      res.json(file);
    }),
  );

  return app;
};
