import type { AppConfig } from '../../shared/config';
import { countWords, keywordMatcher } from '../utils/text';
import { EXTRACTION_EMPTY_SENTINEL } from './contentExtractor';
import keywordTable from './data/scoringKeywords.json';

export type ScoringWeights = AppConfig['scoring'];

export interface ScoreInput {
  title: string;
  description: string | null;
  imageUrl: string | null;
  source: string;
}

export interface ScoreBreakdown {
  importance: number;
  base: number;
  regional: number;
  multiplier: number;
  total: number;
}

const isBreaking = keywordMatcher(keywordTable.breaking);
const isPolitical = keywordMatcher(keywordTable.political);
const isSocial = keywordMatcher(keywordTable.social);
const isRegional = keywordMatcher(keywordTable.regional);
const isTrusted = keywordMatcher(keywordTable.trustedSources);

const importanceTier = (text: string, weights: ScoringWeights): number => {
  if (isBreaking(text)) return weights.breakingScore;
  if (isPolitical(text)) return weights.politicalScore;
  if (isSocial(text)) return weights.socialScore;
  return 0;
};

// Every band is non-decreasing in length so that adding words never lowers the score.
const titlePoints = (title: string): number => {
  if (title.trim().length <= 10) return 0;
  const words = countWords(title);
  if (words >= 5) return 80;
  if (words > 3) return 60;
  return 20;
};

const descriptionPoints = (description: string): number => {
  if (!description) return 0;
  const words = countWords(description);
  if (words >= 30) return 120;
  if (words >= 15) return 80;
  return 40;
};

const availabilityPoints = (description: string): number => {
  if (description.length > 20) return 40;
  return description ? 20 : 0;
};

export const isPlaceholderImage = (imageUrl: string | null, placeholderImageUrl: string): boolean =>
  !imageUrl || imageUrl === placeholderImageUrl || imageUrl.toLowerCase().includes('placeholder');

const imagePoints = (imageUrl: string | null, placeholderImageUrl: string): number => {
  if (!imageUrl || isPlaceholderImage(imageUrl, placeholderImageUrl)) return 0;
  const lower = imageUrl.toLowerCase();
  return keywordTable.imageHostingHints.some((hint) => lower.includes(hint)) ? 60 : 40;
};

export const trustMultiplier = (source: string, weights: ScoringWeights): number =>
  isTrusted(source) ? weights.trustedMultiplier : 1;

export const explainScore = (
  input: ScoreInput,
  weights: ScoringWeights,
  placeholderImageUrl: string,
): ScoreBreakdown => {
  const description =
    input.description && input.description !== EXTRACTION_EMPTY_SENTINEL ? input.description.trim() : '';
  const text = `${input.title} ${description}`;

  const importance = importanceTier(text, weights);
  const base =
    titlePoints(input.title) +
    descriptionPoints(description) +
    imagePoints(input.imageUrl, placeholderImageUrl) +
    availabilityPoints(description);
  const regional = isRegional(text) ? weights.regionalBoost : 0;
  const multiplier = trustMultiplier(input.source, weights);
  const total = Math.min(weights.maxScore, Math.round((importance + base + regional) * multiplier));

  return { importance, base, regional, multiplier, total };
};

/** Importance estimate in [0, maxScore]. */
export const scoreArticle = (input: ScoreInput, weights: ScoringWeights, placeholderImageUrl: string): number =>
  explainScore(input, weights, placeholderImageUrl).total;
