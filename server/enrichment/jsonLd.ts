import type { RenderedPage } from '../browser/types';

export const ARTICLE_TYPES = new Set(['Article', 'NewsArticle', 'ReportageNewsArticle', 'AnalysisNewsArticle', 'BlogPosting']);

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const hasArticleType = (node: JsonObject): boolean => {
  const type = node['@type'];
  if (typeof type === 'string') return ARTICLE_TYPES.has(type);
  if (Array.isArray(type)) return type.some((t) => typeof t === 'string' && ARTICLE_TYPES.has(t));
  return false;
};

const collectArticleNodes = (value: unknown, out: JsonObject[]) => {
  if (Array.isArray(value)) {
    for (const item of value) collectArticleNodes(item, out);
    return;
  }
  if (!isObject(value)) return;
  if (hasArticleType(value)) out.push(value);
  if (value['@graph']) collectArticleNodes(value['@graph'], out);
};

/** Article-typed nodes from every ld+json block; blocks that fail to parse are skipped. */
export const readArticleJsonLd = async (
  page: RenderedPage,
  onInvalid?: (error: unknown) => void,
): Promise<JsonObject[]> => {
  const scripts = await page.queryAll('script[type="application/ld+json"]');
  const nodes: JsonObject[] = [];
  for (const script of scripts) {
    const raw = (await script.text()).trim();
    if (!raw) continue;
    try {
      collectArticleNodes(JSON.parse(raw), nodes);
    } catch (error) {
      onInvalid?.(error);
    }
  }
  return nodes;
};

export const stringField = (node: JsonObject, key: string): string | null => {
  const value = node[key];
  return typeof value === 'string' && value.trim() ? value.trim() : null;
};
