import type { RenderedPage } from '../browser/types';
import type { Logger } from '../obs/logger';
import { hasToken } from '../utils/text';
import { errorMessage } from './errors';

export interface ImageOptions {
  maxImageScan: number;
  placeholderImageUrl: string;
}

export interface ImageCandidate {
  src: string;
  alt: string;
  className: string;
  width: number;
  height: number;
  score: number;
  area: number;
}

export interface ImageSelection {
  imageUrl: string;
  source: 'og:image' | 'twitter:image' | 'content' | 'placeholder';
  scanned: number;
}

const ALT_KEYWORDS = ['news', 'article', 'story', 'report', 'photo', 'image'];
const HOSTING_HINTS = ['cdn', 'static', 'images', 'img', 'media'];
const PENALTY_TOKENS = ['ad', 'banner', 'sponsor', 'placeholder', 'logo', 'icon', 'avatar'];
const CONTENT_CLASS_HINTS = ['article', 'content', 'main', 'hero', 'featured'];
const REJECT_TOKENS = [
  'logo',
  'icon',
  'avatar',
  'profile',
  'thumbnail',
  'ad',
  'banner',
  'sponsor',
  'widget',
  'button',
  'social',
  'facebook',
  'twitter',
  'instagram',
  'placeholder',
  'default',
  'blank',
  'spacer',
];

const parseDimension = (value: string | null): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
};

const isAbsoluteHttp = (value: string) => /^https?:\/\//i.test(value);

export const scoreImage = (image: Pick<ImageCandidate, 'src' | 'alt' | 'className' | 'width' | 'height'>): number => {
  const src = image.src.toLowerCase();
  const alt = image.alt.toLowerCase();
  const className = image.className.toLowerCase();
  let score = 0;

  if (ALT_KEYWORDS.some((keyword) => alt.includes(keyword))) score += 20;
  if (HOSTING_HINTS.some((hint) => src.includes(hint))) score += 30;
  if (hasToken(src, PENALTY_TOKENS) || hasToken(className, PENALTY_TOKENS)) score -= 50;

  // Size bands apply only when the markup declares both dimensions.
  if (image.width && image.height) {
    if (image.width >= 300 && image.height >= 200) score += 40;
    else if (image.width >= 200 && image.height >= 150) score += 20;
    else if (image.width < 100 || image.height < 100) score -= 30;
  }

  if (CONTENT_CLASS_HINTS.some((hint) => className.includes(hint))) score += 15;
  return Math.max(0, score);
};

export const isValidImage = (image: ImageCandidate): boolean => {
  if (hasToken(image.src, REJECT_TOKENS) || hasToken(image.alt, REJECT_TOKENS)) return false;
  if (image.width && image.height) {
    if (image.width < 200 || image.height < 150) return false;
    const ratio = image.width / image.height;
    if (ratio > 4 || ratio < 0.25) return false;
  }
  return image.score >= 10;
};

/** Highest score first, larger declared area breaking ties. */
export const rankImages = (candidates: ImageCandidate[]): ImageCandidate[] =>
  [...candidates].sort((a, b) => b.score - a.score || b.area - a.area);

export const collectImageCandidates = async (page: RenderedPage, maxScan: number): Promise<ImageCandidate[]> => {
  const images = (await page.queryAll('img')).slice(0, maxScan);
  const candidates: ImageCandidate[] = [];
  for (const img of images) {
    const src = (await img.attribute('src'))?.trim() ?? '';
    if (!isAbsoluteHttp(src)) continue;
    const width = parseDimension(await img.attribute('width'));
    const height = parseDimension(await img.attribute('height'));
    const base = {
      src,
      alt: (await img.attribute('alt')) ?? '',
      className: (await img.attribute('class')) ?? '',
      width,
      height,
    };
    candidates.push({ ...base, score: scoreImage(base), area: width * height });
  }
  return candidates;
};

const metaImage = async (page: RenderedPage, selector: string): Promise<string | null> => {
  const meta = await page.queryOne(selector);
  const content = meta ? (await meta.attribute('content'))?.trim() : null;
  if (!content) return null;
  try {
    const resolved = new URL(content, page.url()).toString();
    return isAbsoluteHttp(resolved) ? resolved : null;
  } catch {
    return null;
  }
};

/** og:image, then twitter:image, then the best valid inline image, then the placeholder. Never empty. */
export const selectImage = async (
  page: RenderedPage,
  options: ImageOptions,
  logger?: Logger,
): Promise<ImageSelection> => {
  try {
    const og = await metaImage(page, 'meta[property="og:image"]');
    if (og) return { imageUrl: og, source: 'og:image', scanned: 0 };

    const twitter = await metaImage(page, 'meta[name="twitter:image"], meta[property="twitter:image"]');
    if (twitter) return { imageUrl: twitter, source: 'twitter:image', scanned: 0 };

    const candidates = await collectImageCandidates(page, options.maxImageScan);
    const best = rankImages(candidates).find(isValidImage);
    if (best) {
      logger?.debug('Selected inline image', { score: best.score, src: best.src });
      return { imageUrl: best.src, source: 'content', scanned: candidates.length };
    }
    return { imageUrl: options.placeholderImageUrl, source: 'placeholder', scanned: candidates.length };
  } catch (error) {
    logger?.warn('Image selection failed', { error: errorMessage(error) });
    return { imageUrl: options.placeholderImageUrl, source: 'placeholder', scanned: 0 };
  }
};
