import { countWords, normalizeWhitespace } from '../utils/text';
import { EXTRACTION_EMPTY_SENTINEL, isBoilerplate, isTimestampLike } from './contentExtractor';

export interface KeyPointOptions {
  minDescriptionLength: number;
  maxKeyPoints: number;
}

const MIN_POINT_WORDS = 4;
const SENTENCE_SPLIT = /(?<=[.!?])\s+(?=["'“‘(\p{Lu}\p{N}])/u;
const BREADCRUMB = /\s[>›»|]\s/;
const FOOTER = /©|\bcopyright\b|\bwhatsapp\b|\bshare on\b/i;

export const splitSentences = (text: string): string[] =>
  text
    .split(/\n+/)
    .flatMap((block) => normalizeWhitespace(block).split(SENTENCE_SPLIT))
    .map((sentence) => sentence.trim())
    .filter(Boolean);

const normalizePoint = (sentence: string): string => {
  const trimmed = normalizeWhitespace(sentence)
    .replace(/^[-–—•*·\s]+/, '')
    .replace(/\s+([,.;:!?])/g, '$1');
  return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed.replace(/[,;:]+$/, '')}.`;
};

const isUsablePoint = (sentence: string): boolean =>
  countWords(sentence) >= MIN_POINT_WORDS &&
  !sentence.endsWith('...') &&
  !isBoilerplate(sentence) &&
  !isTimestampLike(sentence) &&
  !BREADCRUMB.test(sentence) &&
  !FOOTER.test(sentence);

/** Up to `maxKeyPoints` sentences from the description, in their original order. */
export const generateKeyPoints = (description: string | null, options: KeyPointOptions): string[] => {
  if (!description || description === EXTRACTION_EMPTY_SENTINEL) return [];
  if (normalizeWhitespace(description).length < options.minDescriptionLength) return [];

  const points: string[] = [];
  for (const sentence of splitSentences(description)) {
    if (!isUsablePoint(sentence)) continue;
    points.push(normalizePoint(sentence));
    if (points.length >= options.maxKeyPoints) break;
  }
  return points;
};
