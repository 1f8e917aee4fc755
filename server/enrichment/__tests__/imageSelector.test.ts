import { describe, expect, it } from 'vitest';
import { createStaticPage } from '../../browser/staticSession';
import { isValidImage, scoreImage, selectImage, type ImageOptions } from '../imageSelector';

const options: ImageOptions = {
  maxImageScan: 30,
  placeholderImageUrl: 'https://via.placeholder.com/300x150?text=No+Image',
};

const page = (body: string, head = '') =>
  createStaticPage(`<html><head>${head}</head><body>${body}</body></html>`, 'https://www.example.com/news/story-1');

const inlineImages = `
  <img src="https://cdn.example.com/assets/logo.png" width="300" height="200" class="site-logo">
  <img src="/img/local.jpg" width="800" height="600">
  <img src="https://www.example.com/a/pixel.gif" width="1" height="1">
  <img src="https://www.example.com/uploads/street.jpg" width="640" height="480">
  <img src="https://cdn.example.com/photos/metro.jpg" width="800" height="450" alt="Metro photo" class="hero-image">`;

describe('scoreImage', () => {
  it('rewards hosting, alt text, size and content classes', () => {
    expect(
      scoreImage({
        src: 'https://cdn.example.com/photos/metro.jpg',
        alt: 'Metro photo',
        className: 'hero-image',
        width: 800,
        height: 450,
      }),
    ).toBe(105);
  });

  it('penalizes ad tokens without matching inside words', () => {
    const base = { alt: '', className: '', width: 640, height: 480 };
    expect(scoreImage({ ...base, src: 'https://www.example.com/uploads/street.jpg' })).toBe(40);
    expect(scoreImage({ ...base, src: 'https://www.example.com/ads/street.jpg' })).toBe(0);
  });
});

describe('isValidImage', () => {
  it('rejects extreme aspect ratios', () => {
    const banner = { src: 'https://cdn.example.com/wide.jpg', alt: '', className: '', width: 1000, height: 200, score: 70, area: 200000 };
    expect(isValidImage(banner)).toBe(false);
    expect(isValidImage({ ...banner, height: 500 })).toBe(true);
  });
});

describe('selectImage', () => {
  it('prefers og:image and resolves it against the page', async () => {
    const result = await selectImage(
      page(inlineImages, '<meta property="og:image" content="/images/lead.jpg"><meta name="twitter:image" content="https://cdn.example.com/tw.jpg">'),
      options,
    );

    expect(result).toEqual({ imageUrl: 'https://www.example.com/images/lead.jpg', source: 'og:image', scanned: 0 });
  });

  it('uses twitter:image when og:image is absent', async () => {
    const result = await selectImage(page('', '<meta name="twitter:image" content="https://cdn.example.com/tw.jpg">'), options);

    expect(result.imageUrl).toBe('https://cdn.example.com/tw.jpg');
    expect(result.source).toBe('twitter:image');
  });

  it('ranks inline images and skips logos, pixels and relative sources', async () => {
    const result = await selectImage(page(inlineImages), options);

    expect(result).toEqual({ imageUrl: 'https://cdn.example.com/photos/metro.jpg', source: 'content', scanned: 4 });
  });

  it('falls back to the placeholder', async () => {
    const result = await selectImage(page(inlineImages), { ...options, maxImageScan: 1 });

    expect(result).toEqual({ imageUrl: options.placeholderImageUrl, source: 'placeholder', scanned: 1 });
  });
});
