/**
 * Blank-page removal.
 *
 * Every page is measured (probe.ts) and classified (classify.ts); only
 * non-blank pages are kept, in their original order. When nothing survives,
 * the fallback policy decides between the untouched original and an empty
 * document.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import type { Logger } from 'pino';
import { classifyPage } from './classify.js';
import { extractPageTexts, loadPdf, probePages } from './probe.js';
import { stripStructure, writePdf } from './sanitize.js';
import type {
  BlankPageConfig,
  CleanOptions,
  CleanPlan,
  CleanResult,
  CleanedFile,
  FallbackPolicy,
  PageMetrics,
  TextExtractor,
} from './types.js';

export interface CleanDeps {
  logger: Logger;
  extractText?: TextExtractor;
}

/** Decide which pages survive. No I/O. */
export function planClean(
  metrics: PageMetrics[],
  config: BlankPageConfig,
  fallback: FallbackPolicy,
): CleanPlan {
  const decisions = metrics.map((m) => classifyPage(m, config));
  const keep = metrics.filter((_, i) => !decisions[i].blank).map((m) => m.pageIndex);
  const removed = metrics.length - keep.length;

  if (keep.length > 0) {
    return { keep, removed, outcome: 'filtered', decisions };
  }
  // Includes the zero-page document: emitting it unchanged is the same as emitting it empty
  return {
    keep,
    removed,
    outcome: fallback === 'emit-original' ? 'original' : 'empty',
    decisions,
  };
}

/** Remove blank pages from PDF bytes. */
export async function cleanPdf(
  bytes: Uint8Array,
  options: CleanOptions,
  deps: CleanDeps,
): Promise<CleanResult> {
  const { logger } = deps;
  const label = options.label ?? 'document';

  const source = await loadPdf(bytes);
  const metrics = await probePages(source, bytes, deps.extractText ?? extractPageTexts);
  const plan = planClean(metrics, options.blank, options.fallback);

  if (options.debugPages) {
    for (const m of metrics) {
      const decision = plan.decisions[m.pageIndex];
      logger.debug({
        part: label,
        page: m.pageIndex + 1,
        textLength: m.textLength,
        alnumCount: m.alnumCount,
        alnumRatio: Number(m.alnumRatio.toFixed(3)),
        contentBytes: m.contentBytes,
        hasImage: m.hasImage,
        decision: decision.blank ? 'drop' : 'keep',
        reason: decision.reason,
      }, `${label} p${m.pageIndex + 1}: ${decision.blank ? 'BLANK' : 'NON-BLANK'} (${decision.reason})`);
    }
  }

  const base = { outcome: plan.outcome, removed: plan.removed, metrics, decisions: plan.decisions };

  switch (plan.outcome) {
    case 'original':
      logger.debug({ part: label, pages: metrics.length }, 'All pages blank, keeping original');
      return { ...base, bytes, kept: metrics.length, removed: 0 };
    case 'empty': {
      logger.debug({ part: label, pages: metrics.length }, 'All pages blank, writing empty document');
      const empty = await PDFDocument.create();
      return { ...base, bytes: await writePdf(empty), kept: 0 };
    }
    case 'filtered': {
      const out = await PDFDocument.create();
      const copied = await out.copyPages(source, plan.keep);
      for (const page of copied) out.addPage(page);
      stripStructure(out);
      return { ...base, bytes: await writePdf(out), kept: plan.keep.length };
    }
  }
}

/** Clean `sourcePath` into `destPath`, creating the destination directory. */
export async function cleanPdfFile(
  sourcePath: string,
  destPath: string,
  options: CleanOptions,
  deps: CleanDeps,
): Promise<CleanedFile> {
  const bytes = new Uint8Array(readFileSync(sourcePath));
  const result = await cleanPdf(bytes, options, deps);

  mkdirSync(dirname(destPath), { recursive: true });
  writeFileSync(destPath, result.bytes);

  return {
    source: sourcePath,
    path: destPath,
    outcome: result.outcome,
    kept: result.kept,
    removed: result.removed,
  };
}
