import { describe, expect, it } from 'vitest';
import { decodeRedirectLink, extractRedirectToken, isAggregatorRedirect } from '../aggregatorLinks';
import { encodeRedirectToken } from './fakeSession';

describe('extractRedirectToken', () => {
  it('reads tokens from the known wrapper paths', () => {
    expect(extractRedirectToken('https://news.google.com/rss/articles/abc123?oc=5')).toBe('abc123');
    expect(extractRedirectToken('https://news.google.com/articles/xyz')).toBe('xyz');
    expect(extractRedirectToken('https://news.google.com/read/tok')).toBe('tok');
  });

  it('ignores other hosts and paths', () => {
    expect(extractRedirectToken('https://example.com/articles/abc')).toBeNull();
    expect(extractRedirectToken('https://news.google.com/topics/abc')).toBeNull();
    expect(extractRedirectToken('not a url')).toBeNull();
    expect(isAggregatorRedirect('https://www.ndtv.com/india-news/story-123')).toBe(false);
  });
});

describe('decodeRedirectLink', () => {
  it('decodes a length-prefixed token to the publisher url', () => {
    const target = 'https://www.ndtv.com/india-news/modi-inaugurates-project-123';
    const link = `https://news.google.com/rss/articles/${encodeRedirectToken(target)}?oc=5`;
    expect(decodeRedirectLink(link)).toBe(target);
  });

  it('skips embedded aggregator urls and keeps scanning', () => {
    const payload = 'xx https://news.google.com/x "https://www.bbc.co.uk/news/world-1"';
    const link = `https://news.google.com/articles/${Buffer.from(payload, 'latin1').toString('base64url')}`;
    expect(decodeRedirectLink(link)).toBe('https://www.bbc.co.uk/news/world-1');
  });

  it('returns null for opaque tokens', () => {
    const link = `https://news.google.com/articles/${Buffer.from('\x08\x13\x22\x05AU_yq', 'latin1').toString('base64url')}`;
    expect(decodeRedirectLink(link)).toBeNull();
  });
});
