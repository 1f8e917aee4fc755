import siteSelectorTable from './data/siteSelectors.json';

export interface SiteSelectors {
  title: string[];
  content: string[];
}

const EMPTY: SiteSelectors = { title: [], content: [] };

const entries: Array<[string, SiteSelectors]> = Object.entries(siteSelectorTable).map(([domain, selectors]) => [
  domain,
  { title: [...selectors.title], content: [...selectors.content] },
]);

/** Publisher override for a resolved URL, matched on the host or any parent domain. */
export const selectorsForUrl = (url: string): SiteSelectors => {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return EMPTY;
  }
  for (const [domain, selectors] of entries) {
    if (host === domain || host.endsWith(`.${domain}`)) {
      return selectors;
    }
  }
  return EMPTY;
};
