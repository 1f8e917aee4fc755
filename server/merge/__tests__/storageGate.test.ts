import { describe, expect, it } from 'vitest';
import type { Article } from '../../../shared/types';
import { gateForStorage } from '../storageGate';

const placeholder = 'https://via.placeholder.com/300x150?text=No+Image';

const base: Article = {
  id: 'id-1',
  title: 'Metro line opens in Bengaluru',
  source: 'NDTV',
  url: 'https://www.ndtv.com/news/metro',
  imageUrl: 'https://c.ndtvimg.com/metro.jpg',
  description: 'The new metro line opened to the public on Monday morning after inspection.',
  keyPoints: [],
  published: '2024-03-04',
  qualityScore: 640,
};

describe('gateForStorage', () => {
  it('maps accepted articles to storage records', () => {
    const { records, rejected } = gateForStorage([base], 'bengaluru', placeholder);

    expect(rejected).toEqual([]);
    expect(records).toEqual([
      {
        title: 'Metro line opens in Bengaluru',
        link: 'https://www.ndtv.com/news/metro',
        published: '2024-03-04',
        source: 'NDTV',
        category: 'bengaluru',
        description: 'The new metro line opened to the public on Monday morning after inspection.',
        image_url: 'https://c.ndtvimg.com/metro.jpg',
        article_id: 'id-1',
        quality_score: 640,
      },
    ]);
  });

  it('rejects blank titles, placeholder images and degraded articles', () => {
    const { records, rejected } = gateForStorage(
      [
        { ...base, id: 'blank', title: '   ' },
        { ...base, id: 'placeholder', imageUrl: placeholder },
        { ...base, id: 'degraded', error: { kind: 'NavigationTimeout', message: 'timed out' } },
      ],
      'bengaluru',
      placeholder,
    );

    expect(records).toEqual([]);
    expect(rejected.map((r) => [r.articleId, r.reason])).toEqual([
      ['blank', 'missing_title'],
      ['placeholder', 'placeholder_image'],
      ['degraded', 'degraded'],
    ]);
    expect(rejected.every((r) => r.error.kind === 'ValidationRejected')).toBe(true);
  });
});
