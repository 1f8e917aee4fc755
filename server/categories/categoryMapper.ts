import type { Logger } from '../obs/logger';
import { keywordMatcher } from '../utils/text';
import regions from './data/regions.json';

const EXACT_MAPPINGS: Record<string, string> = {
  'indian cinema and bollywood': 'entertainment',
  'indian celebrity': 'entertainment',
  'indian sports': 'sports',
  'indian politics': 'politics',
  'indian education': 'education',
  'indian scandal and crime': 'crime',
  'trending in bengaluru and india': 'trending',
  international: 'world',
  india: 'india',
};

const isBengaluru = keywordMatcher(regions.bengaluru);
const isOtherRegion = keywordMatcher(regions.india);

// More specific categories come first.
const PRIORITY = [
  'trending',
  'politics',
  'education',
  'sports',
  'entertainment',
  'celebrity',
  'cinema',
  'crime',
  'scandal',
  'technology',
  'world',
  'business',
  'health',
  'science',
];

/** Lowercases and turns file-name separators back into spaces: "indian_politics" -> "indian politics". */
export const normalizeLabel = (label: string): string =>
  label
    .toLowerCase()
    .replace(/[_-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

/**
 * Maps a raw source category onto the canonical taxonomy. Deterministic; unknown labels map to
 * themselves and are reported through `logger`.
 */
export const mapCategory = (label: string, logger?: Logger): string => {
  const normalized = normalizeLabel(label);

  const exact = EXACT_MAPPINGS[normalized];
  if (exact) return exact;

  if (isBengaluru(normalized)) return 'bengaluru';
  if (isOtherRegion(normalized)) return 'india';

  const prioritized = PRIORITY.find((category) => normalized.includes(category));
  if (prioritized) return prioritized;

  if (normalized.includes('india')) return 'india';

  logger?.warn('No category mapping found; using label as-is', { label: normalized });
  return normalized;
};

/** Raw labels grouped under their canonical category, both in first-seen order. */
export const groupByCanonical = (labels: readonly string[], logger?: Logger): Record<string, string[]> => {
  const groups: Record<string, string[]> = {};
  for (const label of labels) {
    const canonical = mapCategory(label, logger);
    const members = groups[canonical] ?? [];
    if (!members.includes(label)) members.push(label);
    groups[canonical] = members;
  }
  return groups;
};
