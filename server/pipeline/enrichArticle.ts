import type { AppConfig } from '../../shared/config';
import type { Article, ArticleError, RawFeedEntry } from '../../shared/types';
import type { BrowserSession } from '../browser/types';
import { assembleArticle, assembleDegraded } from '../enrichment/articleAssembler';
import { extractContent } from '../enrichment/contentExtractor';
import { EnrichmentError, errorMessage, isEnrichmentError } from '../enrichment/errors';
import { selectImage } from '../enrichment/imageSelector';
import { generateKeyPoints } from '../enrichment/keyPoints';
import { scoreArticle } from '../enrichment/qualityScorer';
import { resolveRedirect } from '../enrichment/redirectResolver';
import { extractTitle } from '../enrichment/titleExtractor';
import type { Logger } from '../obs/logger';
import { withTimeout } from '../utils/async';

export interface EnrichArticleContext {
  session: BrowserSession;
  config: AppConfig;
  logger: Logger;
  signal?: AbortSignal;
}

export interface EnrichArticleOutcome {
  article: Article;
  /** The article budget ran out; the session may still be mid-navigation. */
  timedOut: boolean;
  durationMs: number;
}

const extractArticle = async (entry: RawFeedEntry, { session, config, logger, signal }: EnrichArticleContext) => {
  const options = config.enrichment;
  const resolution = await resolveRedirect(entry.link, session, {
    navigationTimeoutMs: options.navigationTimeoutMs,
    settleDelayMs: options.settleDelayMs,
    maxLinksPerSelector: options.maxLinksPerSelector,
    signal,
    logger,
  });
  const { page, resolvedUrl } = resolution;

  const title = await extractTitle({ page, url: resolvedUrl, logger }, entry.title);
  const content = await extractContent({ page, url: resolvedUrl, title: title.value, source: entry.source, options, logger });
  const image = await selectImage(page, options, logger);

  const error: ArticleError | undefined = content.empty
    ? { kind: 'ExtractionEmpty', message: `No content strategy produced ${options.minDescriptionLength}+ characters` }
    : undefined;
  const qualityScore = scoreArticle(
    { title: title.value, description: content.description, imageUrl: image.imageUrl, source: entry.source },
    config.scoring,
    options.placeholderImageUrl,
  );

  logger.debug('Article extracted', {
    url: resolvedUrl,
    decoded: resolution.decodedUrl !== null,
    followedOutbound: resolution.followedOutbound,
    titleSource: title.source,
    contentSource: content.source,
    imageSource: image.source,
    qualityScore,
  });

  return assembleArticle(entry, {
    resolvedUrl,
    title: title.value,
    description: content.description,
    imageUrl: image.imageUrl,
    keyPoints: content.empty ? [] : generateKeyPoints(content.description, options),
    qualityScore,
    error,
  });
};

/**
 * Enriches one feed entry inside an already borrowed session. Never throws: failures come back as
 * an error-tagged article so a batch always has one record per entry.
 */
export const enrichArticle = async (entry: RawFeedEntry, ctx: EnrichArticleContext): Promise<EnrichArticleOutcome> => {
  const startedAt = Date.now();
  const budgetMs = ctx.config.enrichment.articleTimeoutMs;
  let timedOut = false;

  try {
    const article = await withTimeout(extractArticle(entry, ctx), budgetMs, () => {
      timedOut = true;
      return new EnrichmentError('NavigationTimeout', `Article processing exceeded ${budgetMs}ms`, entry.link);
    });
    return { article, timedOut, durationMs: Date.now() - startedAt };
  } catch (error) {
    const tagged = isEnrichmentError(error)
      ? error
      : new EnrichmentError('NavigationTimeout', `Page failed to load: ${errorMessage(error)}`, entry.link);
    ctx.logger.warn('Article degraded', { link: entry.link, kind: tagged.kind, error: tagged.message });
    const article = assembleDegraded(
      entry,
      { kind: tagged.kind, message: tagged.message },
      ctx.config.enrichment.placeholderImageUrl,
    );
    return { article, timedOut, durationMs: Date.now() - startedAt };
  }
};
