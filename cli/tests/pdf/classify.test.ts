import { describe, it, expect } from 'vitest';
import {
  DEFAULT_BLANK_CONFIG,
  classifyPage,
  countAlnum,
  isBlankPage,
  measureText,
} from '../../src/core/pdf/classify.js';
import type { BlankPageConfig, PageMetrics } from '../../src/core/pdf/types.js';

const EMPTY_PAGE: Omit<PageMetrics, 'pageIndex'> = {
  textLength: 0,
  alnumCount: 0,
  alnumRatio: 0,
  contentBytes: 0,
  hasImage: false,
};

function page(overrides: Partial<Omit<PageMetrics, 'pageIndex'>>): Omit<PageMetrics, 'pageIndex'> {
  return { ...EMPTY_PAGE, ...overrides };
}

describe('measureText', () => {
  it('trims whitespace before measuring', () => {
    expect(measureText('  ab1  \n')).toEqual({ textLength: 3, alnumCount: 3, alnumRatio: 1 });
  });

  it('counts German umlauts and ß as alphanumeric', () => {
    expect(countAlnum('Größe: Ä-Ö-Ü')).toBe(8);
  });

  it('floors the ratio denominator at 1 for empty text', () => {
    expect(measureText('')).toEqual({ textLength: 0, alnumCount: 0, alnumRatio: 0 });
  });

  it('computes the ratio over trimmed length', () => {
    // "a . ." → 5 chars, 1 alnum
    expect(measureText(' a . . ').alnumRatio).toBeCloseTo(0.2, 10);
  });
});

describe('classifyPage', () => {
  it('treats a page with no text, no content and no image as blank', () => {
    expect(classifyPage(EMPTY_PAGE)).toEqual({ blank: true, reason: 'below-thresholds' });
  });

  it('keeps a page with an image whatever its other signals', () => {
    expect(classifyPage(page({ hasImage: true }))).toEqual({ blank: false, reason: 'image' });
  });

  it('judges image pages by the other criteria when imageNonblank is off', () => {
    const config: BlankPageConfig = { ...DEFAULT_BLANK_CONFIG, imageNonblank: false };
    expect(isBlankPage(page({ hasImage: true }), config)).toBe(true);
    expect(isBlankPage(page({ hasImage: true, contentBytes: 500 }), config)).toBe(false);
  });

  it('keeps a page whose text exceeds the length threshold', () => {
    // Stray dots: two chars of text, no alnum, tiny stream
    expect(classifyPage(page({ textLength: 2, contentBytes: 10 }))).toEqual({ blank: false, reason: 'text-length' });
  });

  it('allows a single stray character at the default threshold', () => {
    expect(isBlankPage(page({ textLength: 1, alnumCount: 0, contentBytes: 20 }))).toBe(true);
  });

  it('keeps a page once any single criterion is met', () => {
    const loose: BlankPageConfig = { ...DEFAULT_BLANK_CONFIG, textLengthThreshold: 100 };
    expect(classifyPage(page({ textLength: 8, alnumCount: 5, alnumRatio: 0.1 }), loose).reason).toBe('alnum-count');
    expect(classifyPage(page({ textLength: 8, alnumCount: 2, alnumRatio: 0.25 }), loose).reason).toBe('alnum-ratio');
    expect(classifyPage(page({ contentBytes: 40 }), loose).reason).toBe('content-bytes');
  });

  it('marks a page blank only when all criteria hold', () => {
    const loose: BlankPageConfig = { ...DEFAULT_BLANK_CONFIG, textLengthThreshold: 100 };
    expect(isBlankPage(page({ textLength: 8, alnumCount: 1, alnumRatio: 0.125, contentBytes: 39 }), loose)).toBe(true);
  });

  it('shifts sensitivity with each threshold', () => {
    const bytes = page({ contentBytes: 60 });
    expect(isBlankPage(bytes)).toBe(false);
    expect(isBlankPage(bytes, { ...DEFAULT_BLANK_CONFIG, minBytes: 100 })).toBe(true);
  });

  it('is deterministic for identical inputs', () => {
    const p = page({ textLength: 1, alnumCount: 1, alnumRatio: 1, contentBytes: 12 });
    expect(classifyPage(p)).toEqual(classifyPage({ ...p }));
  });
});
