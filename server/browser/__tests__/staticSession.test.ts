import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../../config/config';
import { createStaticPage, createStaticSessionFactory } from '../staticSession';

const html = `
  <html>
    <head><title> Example Story </title></head>
    <body>
      <nav><a href="/home">Home</a></nav>
      <article class="story"><h1 id="headline">Rains lash the coast</h1>
        <p>Body text.</p>
      </article>
      <script>var hidden = 1;</script>
    </body>
  </html>
`;

describe('createStaticPage', () => {
  it('answers selector queries with attribute and text accessors', async () => {
    const page = createStaticPage(html, 'https://example.com/a');
    const heading = await page.queryOne('h1');

    expect(page.url()).toBe('https://example.com/a');
    expect(await page.title()).toBe('Example Story');
    expect(await heading?.attribute('id')).toBe('headline');
    expect(await heading?.text()).toBe('Rains lash the coast');
    expect(await heading?.within('article')).toBe(true);
    expect(await heading?.within('nav')).toBe(false);
    expect(await page.queryAll('a')).toHaveLength(1);
  });

  it('leaves script contents out of the body text', async () => {
    const page = createStaticPage(html, 'https://example.com/a');
    expect(await page.bodyText()).toBe('Home Rains lash the coast Body text.');
  });
});

describe('createStaticSessionFactory', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches the document and falls back to the requested url', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(html, { status: 200, headers: { 'content-type': 'text/html' } })),
    );
    const session = await createStaticSessionFactory(buildConfig({})).create();
    const page = await session.navigate('https://example.com/a', { timeoutMs: 1_000, settleMs: 0 });
    expect(page.url()).toBe('https://example.com/a');
    expect(await page.title()).toBe('Example Story');
  });

  it('turns HTTP failures into navigation errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 503 })));
    const session = await createStaticSessionFactory(buildConfig({})).create();
    await expect(session.navigate('https://example.com/a', { timeoutMs: 1_000, settleMs: 0 })).rejects.toMatchObject({
      name: 'NavigationError',
      timedOut: false,
    });
  });
});
