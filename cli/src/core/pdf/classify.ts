/**
 * Blank-page classifier — decides per page whether a scanned page carries content.
 *
 * Pure computation over already-measured attributes (see probe.ts).
 * A page is blank only when ALL of these hold:
 *   text length   <= textLengthThreshold
 *   alnum count   <  minAlnum
 *   alnum ratio   <  minAlnumRatio
 *   content bytes <  minBytes
 * An image overrides the conjunction when imageNonblank is set.
 */

import type {
  BlankPageConfig,
  DecisionReason,
  PageDecision,
  PageMetrics,
  TextMetrics,
} from './types.js';

export const DEFAULT_BLANK_CONFIG: BlankPageConfig = Object.freeze({
  minAlnum: 5,
  minAlnumRatio: 0.2,
  minBytes: 40,
  imageNonblank: true,
  textLengthThreshold: 1,
});

const ALNUM_PATTERN = /[0-9A-Za-zÄÖÜäöüß]/g;

export function countAlnum(text: string): number {
  return text.match(ALNUM_PATTERN)?.length ?? 0;
}

/** Derive the text attributes of a page from its extracted text. */
export function measureText(text: string): TextMetrics {
  const trimmed = text.trim();
  const alnumCount = countAlnum(trimmed);
  return {
    textLength: trimmed.length,
    alnumCount,
    alnumRatio: alnumCount / Math.max(1, trimmed.length),
  };
}

/**
 * Classify a page. `reason` names the first criterion that kept the page,
 * in the order image → text length → alnum count → alnum ratio → bytes.
 */
export function classifyPage(
  page: Omit<PageMetrics, 'pageIndex'>,
  config: BlankPageConfig = DEFAULT_BLANK_CONFIG,
): PageDecision {
  if (config.imageNonblank && page.hasImage) {
    return keep('image');
  }
  if (page.textLength > config.textLengthThreshold) return keep('text-length');
  if (page.alnumCount >= config.minAlnum) return keep('alnum-count');
  if (page.alnumRatio >= config.minAlnumRatio) return keep('alnum-ratio');
  if (page.contentBytes >= config.minBytes) return keep('content-bytes');

  return { blank: true, reason: 'below-thresholds' };
}

export function isBlankPage(
  page: Omit<PageMetrics, 'pageIndex'>,
  config: BlankPageConfig = DEFAULT_BLANK_CONFIG,
): boolean {
  return classifyPage(page, config).blank;
}

function keep(reason: DecisionReason): PageDecision {
  return { blank: false, reason };
}
