/**
 * Blank-page removal, chunk splitting and batch runs for scanned PDFs.
 *
 * Usage:
 *   import { runBatch, resolveBatchConfig, cleanPdf, splitPdf } from '../core/pdf/index.js';
 */

export { DEFAULT_BLANK_CONFIG, classifyPage, countAlnum, isBlankPage, measureText } from './classify.js';
export { collectPageTexts, contentStreamBytes, extractPageTexts, loadPdf, pageHasImage, probePages, resourcesHaveImage } from './probe.js';
export { stripStructure, writePdf } from './sanitize.js';
export { chunkCount, chunkFileName, chunkRanges, splitPdf, splitPdfFile } from './split.js';
export { cleanPdf, cleanPdfFile, planClean } from './clean.js';
export type { CleanDeps } from './clean.js';
export { formatTimestamp, moveToArchive, resolveArchiveTarget } from './archive.js';
export type { ArchiveOptions } from './archive.js';
export { isEncryptedPdf } from './encrypted.js';
export { BatchConfigError, resolveBatchConfig, resolveBlankConfig } from './validate.js';
export type { BatchInput } from './validate.js';
export { BatchSetupError, listPdfFiles, prepareDirectories, processDocument, runBatch, summarize } from './batch.js';
export type { BatchDeps } from './batch.js';
export type {
  TextMetrics,
  PageMetrics,
  TextExtractor,
  BlankPageConfig,
  DecisionReason,
  PageDecision,
  FallbackPolicy,
  CollisionPolicy,
  PageRange,
  PdfChunk,
  SplitFile,
  CleanOutcome,
  CleanPlan,
  CleanOptions,
  CleanResult,
  CleanedFile,
  BatchConfig,
  DocumentStatus,
  DocumentReport,
  BatchSummary,
} from './types.js';
