import type { AppConfig } from '../../shared/config';
import { artifactFileName, type ArtifactStore } from '../../shared/artifacts';
import type { Article, MergedFile } from '../../shared/types';
import { groupByCanonical } from '../categories/categoryMapper';
import { mergeArticleSets } from '../merge/dedup';
import type { Logger } from '../obs/logger';

export interface MergedCategory {
  category: string;
  rawCategories: string[];
  file: MergedFile;
}

export const buildMergedFile = (
  category: string,
  sets: { rawCategory: string; articles: Article[] }[],
  config: AppConfig,
): MergedFile => {
  const merged = mergeArticleSets(
    sets.map((set) => set.articles),
    config.dedup,
  );
  return {
    metadata: {
      category,
      source_files: sets.map((set) => artifactFileName('inshorts', set.rawCategory)),
      generation_time: new Date().toISOString(),
      total_articles: merged.articles.length,
      duplicates_removed: merged.duplicatesRemoved,
    },
    articles: merged.articles,
  };
};

/**
 * Loads the enriched file of each raw category, groups them under canonical categories and writes
 * one deduplicated merged file per canonical category. Raw categories without an enriched file are
 * skipped.
 */
export const mergeCategories = async (
  rawCategories: readonly string[],
  store: ArtifactStore,
  config: AppConfig,
  logger: Logger,
): Promise<MergedCategory[]> => {
  const available: { rawCategory: string; articles: Article[] }[] = [];
  for (const rawCategory of rawCategories) {
    const enriched = await store.loadEnrichedFile(rawCategory);
    if (!enriched) {
      logger.warn('No enriched file for category; skipping merge input', { category: rawCategory });
      continue;
    }
    available.push({ rawCategory, articles: enriched.articles });
  }

  const groups = groupByCanonical(
    available.map((set) => set.rawCategory),
    logger,
  );

  const results: MergedCategory[] = [];
  for (const [category, members] of Object.entries(groups)) {
    const sets = available.filter((set) => members.includes(set.rawCategory));
    const file = buildMergedFile(category, sets, config);
    await store.saveMergedFile(category, file);
    logger.info('Merged category', {
      category,
      sources: members,
      total: file.metadata.total_articles,
      duplicatesRemoved: file.metadata.duplicates_removed,
    });
    results.push({ category, rawCategories: members, file });
  }
  return results;
};
