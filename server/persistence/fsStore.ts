import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import { artifactFileName, createNoopArtifactStore, type ArtifactKind, type ArtifactStore } from '../../shared/artifacts';
import { EnrichedFileSchema, FeedFileSchema, MergedFileSchema } from '../../shared/types';

export const sanitizeSegment = (value: string): string =>
  value.trim().toLowerCase().replace(/[^a-z0-9_\-]/gi, '_').slice(0, 80) || 'artifact';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to access outside of persistence root: ${target}`);
  }
};

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const createFsArtifactStore = (config: AppConfig): ArtifactStore => {
  if (config.persistence.mode === 'none') {
    return createNoopArtifactStore();
  }

  const { rootDir } = config.persistence;
  const dirFor = (kind: ArtifactKind): string => {
    if (kind === 'news') return config.persistence.feedsDir;
    if (kind === 'inshorts') return config.persistence.enrichedDir;
    return config.persistence.mergedDir;
  };

  const targetFor = (kind: ArtifactKind, category: string): string => {
    const target = path.join(dirFor(kind), artifactFileName(kind, sanitizeSegment(category)));
    guardPath(rootDir, target);
    return target;
  };

  const ensureLayout = async () => {
    await ensureDir(rootDir);
    await ensureDir(config.persistence.feedsDir);
    await ensureDir(config.persistence.enrichedDir);
    await ensureDir(config.persistence.mergedDir);
  };

  const write = async (kind: ArtifactKind, category: string, data: unknown): Promise<string> => {
    await ensureDir(dirFor(kind));
    const target = targetFor(kind, category);
    await fs.writeFile(target, JSON.stringify(data, null, 2), 'utf-8');
    return target;
  };

  const read = async (kind: ArtifactKind, category: string): Promise<unknown> => {
    try {
      const content = await fs.readFile(targetFor(kind, category), 'utf-8');
      return JSON.parse(content);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  };

  const listCategories = async (kind: ArtifactKind): Promise<string[]> => {
    let entries: string[];
    try {
      entries = await fs.readdir(dirFor(kind));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    const prefix = `${kind}_`;
    return entries
      .filter((name) => name.startsWith(prefix) && name.endsWith('.json'))
      .map((name) => name.slice(prefix.length, -'.json'.length))
      .sort();
  };

  return {
    ensureLayout,
    saveFeedFile: (category, data) => write('news', category, data),
    loadFeedFile: async (category) => {
      const parsed = await read('news', category);
      return parsed == null ? null : FeedFileSchema.parse(parsed);
    },
    saveEnrichedFile: (category, data) => write('inshorts', category, data),
    loadEnrichedFile: async (category) => {
      const parsed = await read('inshorts', category);
      return parsed == null ? null : EnrichedFileSchema.parse(parsed);
    },
    saveMergedFile: (category, data) => write('final', category, data),
    loadMergedFile: async (category) => {
      const parsed = await read('final', category);
      return parsed == null ? null : MergedFileSchema.parse(parsed);
    },
    listCategories,
  };
};
