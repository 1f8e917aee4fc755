import type { AppConfig } from '../../shared/config';
import type { StorageRecord } from '../../shared/types';
import type { Logger } from '../obs/logger';

export interface InsertResult {
  stored: number;
  batches: number;
  skipped: boolean;
}

export interface StorageSink {
  readonly enabled: boolean;
  insert: (records: readonly StorageRecord[], options?: { signal?: AbortSignal }) => Promise<InsertResult>;
}

export class StorageError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly batch: number,
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

export const createDisabledSink = (): StorageSink => ({
  enabled: false,
  insert: async () => ({ stored: 0, batches: 0, skipped: true }),
});

/**
 * Inserts records through a PostgREST-style endpoint (`{url}/rest/v1/{table}`) in batches of
 * `storage.batchSize`. A failed batch throws; earlier batches stay inserted.
 */
export const createRestSink = (config: AppConfig, logger: Logger): StorageSink => {
  const { enabled, url, apiKey, table, batchSize } = config.storage;
  if (!enabled || !url || !apiKey) {
    logger.info('Storage sink disabled', { hasUrl: Boolean(url), hasApiKey: Boolean(apiKey) });
    return createDisabledSink();
  }

  const endpoint = `${url.replace(/\/+$/, '')}/rest/v1/${encodeURIComponent(table)}`;

  const insert: StorageSink['insert'] = async (records, options = {}) => {
    if (!records.length) {
      return { stored: 0, batches: 0, skipped: false };
    }

    const batches = chunk(records, batchSize);
    let stored = 0;
    for (const [index, batch] of batches.entries()) {
      const response = await fetch(endpoint, {
        method: 'POST',
        signal: options.signal,
        headers: {
          'Content-Type': 'application/json',
          apikey: apiKey,
          Authorization: `Bearer ${apiKey}`,
          Prefer: 'return=minimal',
        },
        body: JSON.stringify(batch),
      });
      if (!response.ok) {
        const text = await response.text().catch(() => '');
        throw new StorageError(
          `Storage insert failed: ${response.status} ${response.statusText} ${text}`.trim(),
          response.status,
          index,
        );
      }
      stored += batch.length;
      logger.debug('Stored batch', { table, batch: index, size: batch.length });
    }

    logger.info('Stored records', { table, stored, batches: batches.length });
    return { stored, batches: batches.length, skipped: false };
  };

  return { enabled: true, insert };
};
