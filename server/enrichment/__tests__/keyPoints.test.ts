import { describe, expect, it } from 'vitest';
import { EXTRACTION_EMPTY_SENTINEL } from '../contentExtractor';
import { generateKeyPoints, splitSentences } from '../keyPoints';

const options = { minDescriptionLength: 50, maxKeyPoints: 5 };

describe('splitSentences', () => {
  it('splits on sentence ends followed by a capital or digit', () => {
    expect(splitSentences('Rates rose 0.5 points. 12 banks followed.\nMarkets fell!')).toEqual([
      'Rates rose 0.5 points.',
      '12 banks followed.',
      'Markets fell!',
    ]);
  });
});

describe('generateKeyPoints', () => {
  it('keeps factual sentences and drops page furniture', () => {
    const description = [
      'Prime Minister Narendra Modi inaugurated the metro line on Monday.',
      "The line links the city's tech hub to the south.",
      ' Share this story on WhatsApp!',
      'Updated: March 4, 2024.',
      'Officials expect three lakh daily riders once the line is fully operational.',
      'Home > News > India.',
      'Fares will start at ten rupees',
    ].join(' ');

    expect(generateKeyPoints(description, options)).toEqual([
      'Prime Minister Narendra Modi inaugurated the metro line on Monday.',
      "The line links the city's tech hub to the south.",
      'Officials expect three lakh daily riders once the line is fully operational.',
      'Fares will start at ten rupees.',
    ]);
  });

  it('caps the number of points and keeps order', () => {
    const description = ['One', 'Two', 'Three', 'Four', 'Five', 'Six', 'Seven']
      .map((n) => `${n} councils approved the new budget.`)
      .join(' ');

    const points = generateKeyPoints(description, options);

    expect(points).toHaveLength(5);
    expect(points[0]).toBe('One councils approved the new budget.');
    expect(points[4]).toBe('Five councils approved the new budget.');
  });

  it('returns nothing for short or missing descriptions', () => {
    expect(generateKeyPoints('Too short to use.', options)).toEqual([]);
    expect(generateKeyPoints(EXTRACTION_EMPTY_SENTINEL, options)).toEqual([]);
    expect(generateKeyPoints(null, options)).toEqual([]);
  });
});
