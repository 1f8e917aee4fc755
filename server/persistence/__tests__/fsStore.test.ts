import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { FeedFile, MergedFile } from '../../../shared/types';
import { buildConfig, withDataDir } from '../../config/config';
import { createFsArtifactStore, sanitizeSegment } from '../fsStore';

const feed: FeedFile = {
  metadata: { category: 'india', fetched_at: '2026-10-12T08:00:00.000Z', total_articles: 1 },
  articles: [{ title: 'Budget session begins', link: 'https://www.example.com/budget', source: 'Example Times', published: '' }],
};

describe('createFsArtifactStore', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'news-store-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('writes and reads feed files under the feeds directory', async () => {
    const store = createFsArtifactStore(withDataDir(buildConfig({ NODE_ENV: 'test' }), dataDir));

    const target = await store.saveFeedFile('india', feed);

    expect(target).toBe(path.join(dataDir, 'feeds', 'news_india.json'));
    await expect(store.loadFeedFile('india')).resolves.toEqual(feed);
    await expect(store.loadFeedFile('world')).resolves.toBeNull();
  });

  it('lists categories present for a kind', async () => {
    const store = createFsArtifactStore(withDataDir(buildConfig({ NODE_ENV: 'test' }), dataDir));
    const merged: MergedFile = {
      metadata: {
        category: 'india',
        source_files: ['inshorts_india.json'],
        generation_time: '2026-10-12T08:00:00.000Z',
        total_articles: 0,
        duplicates_removed: 0,
      },
      articles: [],
    };

    await store.saveFeedFile('world', feed);
    await store.saveFeedFile('India', feed);
    await store.saveMergedFile('india', merged);

    await expect(store.listCategories('news')).resolves.toEqual(['india', 'world']);
    await expect(store.listCategories('final')).resolves.toEqual(['india']);
    await expect(store.listCategories('inshorts')).resolves.toEqual([]);
  });

  it('sanitizes category names into file-safe segments', () => {
    expect(sanitizeSegment('Political Scandal')).toBe('political_scandal');
    expect(sanitizeSegment('../etc/passwd')).toBe('___etc_passwd');
    expect(sanitizeSegment('   ')).toBe('artifact');
  });

  it('does nothing when persistence is disabled', async () => {
    const config = buildConfig({ NODE_ENV: 'test', PERSISTENCE_DISABLED: 'true', DATA_DIR: dataDir });
    const store = createFsArtifactStore(config);

    await expect(store.saveFeedFile('india', feed)).resolves.toBe('');
    await expect(fs.readdir(dataDir)).resolves.toEqual([]);
  });
});
