export const normalizeWhitespace = (value: string | null | undefined): string =>
  String(value ?? '').replace(/\s+/g, ' ').trim();

export const countWords = (value: string): number => {
  const normalized = normalizeWhitespace(value);
  return normalized ? normalized.split(' ').length : 0;
};

/**
 * Cuts `value` to at most `maxLength` characters, preferring the last sentence end inside the
 * limit and otherwise the last word boundary. Never splits a word.
 */
export const truncateAtBoundary = (value: string, maxLength: number): string => {
  const normalized = normalizeWhitespace(value);
  if (normalized.length <= maxLength) return normalized;
  const window = normalized.slice(0, maxLength);
  const sentenceEnd = Math.max(window.lastIndexOf('. '), window.lastIndexOf('! '), window.lastIndexOf('? '));
  if (sentenceEnd >= Math.floor(maxLength / 3)) {
    return window.slice(0, sentenceEnd + 1);
  }
  if (/[.!?]$/.test(window) && normalized[maxLength] === ' ') {
    return window;
  }
  const limit = Math.max(0, maxLength - 3);
  const head = normalized.slice(0, limit);
  const wordEnd = normalized[limit] === ' ' ? limit : head.lastIndexOf(' ');
  if (wordEnd <= 0) return '';
  return `${head.slice(0, wordEnd).replace(/[\s,;:-]+$/, '')}...`;
};

export const STOPWORDS = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
  'is', 'are', 'was', 'were', 'be', 'as', 'from', 'that', 'this', 'it', 'its', 'after', 'over',
]);

export const meaningfulTokens = (text: string): Set<string> =>
  new Set(
    text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, ' ')
      .split(/\s+/)
      .filter((t) => t.length > 1 && !STOPWORDS.has(t)),
  );

/** Shared tokens divided by the token count of the smaller set. */
export const computeOverlap = (text1: string, text2: string): number => {
  const t1 = meaningfulTokens(text1);
  const t2 = meaningfulTokens(text2);
  if (!t1.size || !t2.size) return 0;

  let intersection = 0;
  for (const token of t1) {
    if (t2.has(token)) intersection++;
  }
  return intersection / Math.min(t1.size, t2.size);
};

export const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Compiles a keyword list into a whole-word matcher. Plural `s`/`es` endings match too, so
 * "attack" finds "attacks" but "war" does not find "award".
 */
export const keywordMatcher = (keywords: readonly string[]): ((text: string) => boolean) => {
  if (!keywords.length) return () => false;
  const alternation = keywords.map((keyword) => escapeRegExp(keyword.toLowerCase())).join('|');
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternation})(?:s|es)?(?![\\p{L}\\p{N}])`, 'u');
  return (text) => pattern.test(text.toLowerCase());
};

/** True when a URL or class list contains one of `words` as a token ("logo", "icons", "banner728"). */
export const hasToken = (text: string, words: readonly string[]): boolean => {
  const tokens = text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
  return words.some((word) =>
    tokens.some((token) => token === word || (token.startsWith(word) && /^(?:s|es|\d+)$/.test(token.slice(word.length)))),
  );
};
