import { describe, expect, it } from 'vitest';
import { createStaticPage } from '../../browser/staticSession';
import { extractTitle, isNoiseHeading, stripSiteSuffix } from '../titleExtractor';

const url = 'https://www.example.com/news/story-1';
const page = (body: string, head = '') => createStaticPage(`<html><head>${head}</head><body>${body}</body></html>`, url);

describe('stripSiteSuffix', () => {
  it('drops chained publisher segments', () => {
    expect(stripSiteSuffix('Modi inaugurates key project - Latest News - NDTV')).toBe('Modi inaugurates key project');
    expect(stripSiteSuffix('Monsoon rains lash Mumbai streets | Example Times')).toBe('Monsoon rains lash Mumbai streets');
  });

  it('keeps long tails and short heads', () => {
    const long = 'India vs Pakistan - a rivalry that has defined cricket for decades';
    expect(stripSiteSuffix(long)).toBe(long);
    expect(stripSiteSuffix('Live - Updates from Parliament')).toBe('Live - Updates from Parliament');
  });
});

describe('isNoiseHeading', () => {
  it('flags navigation chrome', () => {
    expect(isNoiseHeading('Menu')).toBe(true);
    expect(isNoiseHeading('Subscribe now')).toBe(true);
    expect(isNoiseHeading('Modi inaugurates new metro line')).toBe(false);
  });
});

describe('extractTitle', () => {
  it('prefers the h1 inside the article over chrome and stray headings', async () => {
    const result = await extractTitle(
      {
        page: page(`
          <nav><h1>Breaking news and top stories today</h1></nav>
          <h1>Short heading in sidebar area</h1>
          <article><h1>Modi inaugurates new metro line in Bengaluru</h1></article>`),
        url,
      },
      'Feed title',
    );

    expect(result).toEqual({ value: 'Modi inaugurates new metro line in Bengaluru', source: 'h1', confidence: 0.9 });
  });

  it('falls through noisy headings to headline selectors', async () => {
    const result = await extractTitle(
      { page: page('<h1>Menu</h1><div class="headline">Flood alert issued for coastal districts</div>'), url },
      'Feed title',
    );

    expect(result.value).toBe('Flood alert issued for coastal districts');
    expect(result.source).toBe('selector:.headline');
  });

  it('uses og:title when no heading qualifies', async () => {
    const result = await extractTitle(
      {
        page: page('<h1>Subscribe now</h1>', '<meta property="og:title" content="Monsoon rains lash Mumbai streets">'),
        url,
      },
      'Feed title',
    );

    expect(result.value).toBe('Monsoon rains lash Mumbai streets');
    expect(result.source).toBe('og:title');
  });

  it('rejects a generic og:title and reads the ld+json headline', async () => {
    const ld = JSON.stringify({ '@graph': [{ '@type': 'NewsArticle', headline: 'Parliament passes the new data bill' }] });
    const result = await extractTitle(
      {
        page: page('', `<meta property="og:title" content="News"><script type="application/ld+json">${ld}</script>`),
        url,
      },
      'Feed title',
    );

    expect(result.value).toBe('Parliament passes the new data bill');
    expect(result.source).toBe('ld+json:headline');
  });

  it('strips the site suffix from the document title', async () => {
    const result = await extractTitle(
      { page: page('', '<title>Monsoon rains lash Mumbai streets | Example Times</title>'), url },
      'Feed title',
    );

    expect(result.value).toBe('Monsoon rains lash Mumbai streets');
    expect(result.source).toBe('document-title');
  });

  it('falls back to the feed title, then to Untitled', async () => {
    const empty = page('', '<title>Home</title>');

    expect((await extractTitle({ page: empty, url }, '  Feed   title  ')).value).toBe('Feed title');
    expect((await extractTitle({ page: empty, url }, '')).value).toBe('Untitled');
  });
});
