import { afterEach, describe, expect, it, vi } from 'vitest';
import type { StorageRecord } from '../../../shared/types';
import { buildConfig } from '../../config/config';
import { createSilentLogger } from '../../obs/logger';
import { StorageError, chunk, createRestSink } from '../restSink';

const logger = createSilentLogger();

const record = (n: number): StorageRecord => ({
  title: `Story ${n}`,
  link: `https://www.example.com/story-${n}`,
  published: '',
  source: 'Example Times',
  category: 'india',
  description: 'Officials confirmed the new schedule on Monday.',
  image_url: 'https://cdn.example.com/lead.jpg',
  article_id: `id-${n}`,
  quality_score: 500,
});

const enabledConfig = () =>
  buildConfig({
    NODE_ENV: 'test',
    STORAGE_URL: 'https://storage.example.test/',
    STORAGE_API_KEY: 'test-secret',
    STORAGE_BATCH_SIZE: '2',
  });

describe('restSink', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('chunks records into fixed-size batches', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('is disabled without a URL and key', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const sink = createRestSink(buildConfig({ NODE_ENV: 'test' }), logger);

    expect(sink.enabled).toBe(false);
    await expect(sink.insert([record(1)])).resolves.toEqual({ stored: 0, batches: 0, skipped: true });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts batches with key headers', async () => {
    const fetchMock = vi.fn().mockImplementation(async () => new Response(null, { status: 201 }));
    vi.stubGlobal('fetch', fetchMock);
    const sink = createRestSink(enabledConfig(), logger);

    const result = await sink.insert([record(1), record(2), record(3)]);

    expect(result).toEqual({ stored: 3, batches: 2, skipped: false });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://storage.example.test/rest/v1/news_articles');
    expect(init.method).toBe('POST');
    expect(init.headers).toMatchObject({ apikey: 'test-secret', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(init.body)).toHaveLength(2);
    expect(JSON.parse(fetchMock.mock.calls[1][1].body)).toEqual([record(3)]);
  });

  it('throws a StorageError naming the failed batch', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response(null, { status: 201 }))
      .mockResolvedValueOnce(new Response('duplicate key', { status: 409, statusText: 'Conflict' }));
    vi.stubGlobal('fetch', fetchMock);
    const sink = createRestSink(enabledConfig(), logger);

    const failure = sink.insert([record(1), record(2), record(3)]);
    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toMatchObject({ status: 409, batch: 1 });
  });
});
