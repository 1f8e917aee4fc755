import { describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '../../obs/logger';
import { groupByCanonical, mapCategory } from '../categoryMapper';

describe('mapCategory', () => {
  it('uses the exact table before any substring rule', () => {
    expect(mapCategory('Indian Cinema and Bollywood')).toBe('entertainment');
    expect(mapCategory('trending in bengaluru and india')).toBe('trending');
    expect(mapCategory('international')).toBe('world');
  });

  it('keeps Bengaluru separate and folds other regions into india', () => {
    expect(mapCategory('bangalore_traffic')).toBe('bengaluru');
    expect(mapCategory('Mumbai Rains')).toBe('india');
    expect(mapCategory('tamil-nadu')).toBe('india');
  });

  it('applies the priority list in order', () => {
    expect(mapCategory('sports business')).toBe('sports');
    expect(mapCategory('technology')).toBe('technology');
    expect(mapCategory('indian_politics')).toBe('politics');
  });

  it('falls back to india, then to the label itself', () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');

    expect(mapCategory('indian startups', logger)).toBe('india');
    expect(mapCategory('Gardening', logger)).toBe('gardening');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('is deterministic', () => {
    const labels = ['top', 'indian politics', 'bengaluru', 'cricket world cup'];
    expect(labels.map((label) => mapCategory(label))).toEqual(labels.map((label) => mapCategory(label)));
  });
});

describe('groupByCanonical', () => {
  it('groups raw labels under their canonical category', () => {
    expect(groupByCanonical(['indian_politics', 'politics', 'bangalore', 'bengaluru', 'politics', 'top'])).toEqual({
      politics: ['indian_politics', 'politics'],
      bengaluru: ['bangalore', 'bengaluru'],
      top: ['top'],
    });
  });
});
