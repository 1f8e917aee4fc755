const AGGREGATOR_HOSTS = ['news.google.com'];

export const isAggregatorHost = (hostname: string): boolean => {
  const host = hostname.toLowerCase();
  return AGGREGATOR_HOSTS.some((candidate) => host === candidate || host.endsWith(`.${candidate}`));
};

export const isAggregatorUrl = (rawUrl: string): boolean => {
  try {
    return isAggregatorHost(new URL(rawUrl).hostname);
  } catch {
    return false;
  }
};

const base64UrlDecodeBinary = (value: string): string | null => {
  try {
    const normalized = value.replace(/-/g, '+').replace(/_/g, '/');
    const padding = '='.repeat((4 - (normalized.length % 4)) % 4);
    return atob(normalized + padding);
  } catch {
    return null;
  }
};

/** Token from `/articles/<t>`, `/rss/articles/<t>` or `/read/<t>` on an aggregator host. */
export const extractRedirectToken = (rawUrl: string): string | null => {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return null;
  }
  if (!isAggregatorHost(parsed.hostname)) return null;
  const parts = parsed.pathname.split('/').filter(Boolean);
  if (parts.length < 2) return null;
  const marker = parts[parts.length - 2];
  if (marker === 'articles' || marker === 'read') {
    return parts[parts.length - 1];
  }
  return null;
};

export const isAggregatorRedirect = (rawUrl: string): boolean => Boolean(extractRedirectToken(rawUrl));

const TOKEN_PREFIX = '\x08\x13\x22';

const readVarint = (payload: string, offset: number): { value: number; next: number } | null => {
  let value = 0;
  let shift = 0;
  for (let i = offset; i < payload.length && shift <= 21; i += 1) {
    const byte = payload.charCodeAt(i);
    value |= (byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) {
      return { value, next: i + 1 };
    }
    shift += 7;
  }
  return null;
};

/** Older tokens are a small protobuf: fixed prefix, length varint, then the URL bytes. */
const decodeLengthPrefixed = (decoded: string): string | null => {
  if (!decoded.startsWith(TOKEN_PREFIX)) return null;
  const length = readVarint(decoded, TOKEN_PREFIX.length);
  if (!length || length.value <= 0) return null;
  const candidate = decoded.slice(length.next, length.next + length.value);
  return /^https?:\/\//i.test(candidate) ? candidate : null;
};

const EMBEDDED_URL_RE = /https?:\/\/[\x21-\x7e]+/g;

const trimEmbedded = (candidate: string): string => candidate.replace(/["'<>\\^`{|}].*$/s, '').replace(/[).,;]+$/, '');

const toExternalUrl = (candidate: string): string | null => {
  try {
    const parsed = new URL(candidate);
    return isAggregatorHost(parsed.hostname) ? null : parsed.toString();
  } catch {
    return null;
  }
};

/**
 * Decodes the token and returns the first absolute URL inside it that does not point back at an
 * aggregator. Newer opaque tokens carry no URL and yield null.
 */
export const decodeRedirectLink = (rawUrl: string): string | null => {
  const token = extractRedirectToken(rawUrl);
  if (!token) return null;
  const decoded = base64UrlDecodeBinary(token);
  if (!decoded) return null;

  const direct = decodeLengthPrefixed(decoded);
  const directUrl = direct ? toExternalUrl(direct) : null;
  if (directUrl) return directUrl;

  for (const match of decoded.matchAll(EMBEDDED_URL_RE)) {
    const external = toExternalUrl(trimEmbedded(match[0]));
    if (external) return external;
  }
  return null;
};
