import { describe, expect, it } from 'vitest';
import { buildCorpus, buildSearchText, coerceClaps } from '../corpus';

describe('coerceClaps', () => {
  it('keeps non-negative integers and truncates fractions', () => {
    expect(coerceClaps(120)).toBe(120);
    expect(coerceClaps(12.9)).toBe(12);
    expect(coerceClaps('42')).toBe(42);
    expect(coerceClaps(' 7 ')).toBe(7);
    expect(coerceClaps('1e3')).toBe(1000);
  });

  it('turns malformed, missing and negative values into zero', () => {
    expect(coerceClaps('lots of claps')).toBe(0);
    expect(coerceClaps('12k')).toBe(0);
    expect(coerceClaps('')).toBe(0);
    expect(coerceClaps(null)).toBe(0);
    expect(coerceClaps(undefined)).toBe(0);
    expect(coerceClaps(Number.NaN)).toBe(0);
    expect(coerceClaps(Number.POSITIVE_INFINITY)).toBe(0);
    expect(coerceClaps(-5)).toBe(0);
    expect(coerceClaps({ claps: 3 })).toBe(0);
  });
});

describe('buildSearchText', () => {
  it('joins title, subtitle, text and keywords with single spaces', () => {
    expect(
      buildSearchText({
        url: 'https://example.com/a',
        title: 'Title',
        subtitle: 'Sub',
        text: 'Body',
        keywords: ['rust', 'async'],
      }),
    ).toBe('Title Sub Body rust, async');
  });

  it('keeps every position when fields are missing', () => {
    expect(buildSearchText({ url: 'https://example.com/a', title: 'Title', subtitle: null, text: 'Body' })).toBe(
      'Title  Body ',
    );
  });

  it('uses serialized keywords as they are', () => {
    expect(buildSearchText({ url: 'https://example.com/a', title: '', subtitle: '', text: '', keywords: 'a, b' })).toBe(
      '   a, b',
    );
  });
});

describe('buildCorpus', () => {
  it('assigns row ids in input order and coerces claps', () => {
    const corpus = buildCorpus([
      { url: 'https://example.com/a', title: 'First', claps: '10' },
      { url: 'https://example.com/b', title: 'Second', claps: 'n/a' },
    ]);

    expect(corpus).toEqual([
      { row: 0, url: 'https://example.com/a', title: 'First', claps: 10, searchText: 'First   ' },
      { row: 1, url: 'https://example.com/b', title: 'Second', claps: 0, searchText: 'Second   ' },
    ]);
    expect(Object.isFrozen(corpus[0])).toBe(true);
  });
});
