import { describe, expect, it } from 'vitest';
import { computeOverlap, countWords, hasToken, keywordMatcher, normalizeWhitespace, truncateAtBoundary } from '../text';

describe('truncateAtBoundary', () => {
  it('returns short text unchanged apart from whitespace', () => {
    expect(truncateAtBoundary('  Short   text. ', 40)).toBe('Short text.');
  });

  it('prefers the last sentence end inside the limit', () => {
    const text = 'First sentence here. Second sentence is much longer than the limit allows.';
    expect(truncateAtBoundary(text, 40)).toBe('First sentence here.');
  });

  it('falls back to a word boundary with an ellipsis', () => {
    const text = 'One two three four five six seven eight nine ten.';
    expect(truncateAtBoundary(text, 20)).toBe('One two three...');
  });
});

describe('computeOverlap', () => {
  it('measures shared tokens against the smaller title', () => {
    expect(computeOverlap('Bengaluru techie wins award', 'Bengaluru Techie Wins Major Award')).toBe(1);
  });

  it('ignores stopwords and punctuation', () => {
    expect(computeOverlap('The rain in Chennai', 'Chennai: rain!')).toBe(1);
    expect(computeOverlap('Budget session opens', 'Cricket final tonight')).toBe(0);
  });
});

describe('whitespace helpers', () => {
  it('collapses runs and counts words', () => {
    expect(normalizeWhitespace('a\n\tb   c')).toBe('a b c');
    expect(countWords('  one two\nthree ')).toBe(3);
    expect(countWords('')).toBe(0);
  });
});

describe('keywordMatcher', () => {
  it('matches whole words and plural endings only', () => {
    const matches = keywordMatcher(['war', 'attack']);
    expect(matches('Border attacks continue')).toBe(true);
    expect(matches('War, again')).toBe(true);
    expect(matches('Actor wins award')).toBe(false);
  });

  it('never matches with an empty keyword list', () => {
    expect(keywordMatcher([])('anything')).toBe(false);
  });
});

describe('hasToken', () => {
  it('finds words as URL or class tokens', () => {
    expect(hasToken('https://cdn.example.com/img/site-logo.png', ['logo'])).toBe(true);
    expect(hasToken('ad-banner728 sidebar', ['banner'])).toBe(true);
    expect(hasToken('https://cdn.example.com/uploads/photo.jpg', ['ad'])).toBe(false);
  });
});
