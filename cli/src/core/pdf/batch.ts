/**
 * Batch orchestration: split → clean → archive for every PDF in a directory.
 *
 * Documents are processed one at a time in name order. A failure inside one
 * document is logged and reported; the batch moves on. Directory problems
 * are detected up front and abort the run before any document is touched.
 */

import { copyFileSync, mkdirSync, readFileSync, readdirSync, statSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { Logger } from 'pino';
import { moveToArchive } from './archive.js';
import { cleanPdfFile } from './clean.js';
import { isEncryptedPdf } from './encrypted.js';
import { splitPdfFile } from './split.js';
import type {
  BatchConfig,
  BatchSummary,
  CleanedFile,
  DocumentReport,
  SplitFile,
  TextExtractor,
} from './types.js';

export class BatchSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BatchSetupError';
  }
}

export interface BatchDeps {
  logger: Logger;
  extractText?: TextExtractor;
  /** Clock for archive collision suffixes. */
  now?: () => Date;
}

/**
 * Check the input directory and create every output directory.
 * @throws BatchSetupError
 */
export function prepareDirectories(config: BatchConfig): void {
  let isDir = false;
  try {
    isDir = statSync(config.inDir).isDirectory();
  } catch (err) {
    throw new BatchSetupError(`Input directory not accessible: ${config.inDir} (${errorMessage(err)})`);
  }
  if (!isDir) {
    throw new BatchSetupError(`Input path is not a directory: ${config.inDir}`);
  }

  const outputs = [config.splitDir, config.cleanDir, config.archiveDir];
  for (const dir of outputs) {
    if (!dir) continue;
    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      throw new BatchSetupError(`Cannot create directory ${dir}: ${errorMessage(err)}`);
    }
  }
}

/** PDFs directly inside `dir` (no recursion), sorted by name. */
export function listPdfFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.pdf')
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Run the whole batch.
 * @throws BatchSetupError if directories cannot be prepared; nothing else escapes.
 */
export async function runBatch(config: BatchConfig, deps: BatchDeps): Promise<BatchSummary> {
  const { logger } = deps;
  prepareDirectories(config);

  const files = listPdfFiles(config.inDir);
  if (files.length === 0) {
    logger.warn({ inDir: config.inDir }, `No PDF files found in ${config.inDir}`);
  }

  const documents: DocumentReport[] = [];
  for (let i = 0; i < files.length; i++) {
    const log = logger.child({ file: basename(files[i]) });
    log.info(
      { every: config.every, position: `${i + 1}/${files.length}` },
      config.every > 0
        ? `[${i + 1}/${files.length}] Splitting ${basename(files[i])} every ${config.every} pages`
        : `[${i + 1}/${files.length}] Copying ${basename(files[i])} without split`,
    );
    documents.push(await processDocument(files[i], config, { ...deps, logger: log }));
  }

  const summary = summarize(documents);
  logger.info(summary.totals, `Batch done: ${summary.totals.processed} processed, `
    + `${summary.totals.skipped} skipped, ${summary.totals.failed} failed, `
    + `${summary.totals.pagesRemoved} blank pages removed`);
  return summary;
}

/** Process one source file. Never throws: failures land in the report. */
export async function processDocument(
  sourcePath: string,
  config: BatchConfig,
  deps: BatchDeps,
): Promise<DocumentReport> {
  const { logger } = deps;
  const report: DocumentReport = { file: basename(sourcePath), status: 'processed', chunks: [], cleaned: [] };

  try {
    if (await isEncryptedPdf(new Uint8Array(readFileSync(sourcePath)))) {
      logger.warn('Encrypted PDF, skipped');
      return { ...report, status: 'skipped', error: 'encrypted' };
    }

    report.chunks = await splitPdfFile(sourcePath, config.splitDir, config.every);
    report.pageCount = report.chunks.reduce((sum, c) => sum + c.pageCount, 0);
    logger.info({ chunks: report.chunks.length, pages: report.pageCount }, `Wrote ${report.chunks.length} part(s)`);

    if (config.cleanDir) {
      for (const chunk of report.chunks) {
        const cleaned = await cleanChunk(chunk, config.cleanDir, config, deps);
        report.cleaned.push(cleaned);
        logger.info(
          { part: chunk.fileName, kept: cleaned.kept, removed: cleaned.removed, outcome: cleaned.outcome },
          `${chunk.fileName}: kept ${cleaned.kept}, removed ${cleaned.removed}`,
        );
      }
    }

    if (config.archiveDir) {
      report.archivedTo = moveToArchive(sourcePath, config.archiveDir, {
        collision: config.collision,
        now: deps.now,
      });
      logger.info({ archivedTo: report.archivedTo }, `Archived to ${report.archivedTo}`);
    }
    return report;
  } catch (err) {
    logger.error({ err }, `Failed to process ${report.file}`);
    return { ...report, status: 'failed', error: errorMessage(err) };
  }
}

/**
 * Clean one part into `cleanDir`. A part that cannot be cleaned is copied
 * over unchanged so the document still completes and gets archived.
 */
async function cleanChunk(
  chunk: SplitFile,
  cleanDir: string,
  config: BatchConfig,
  deps: BatchDeps,
): Promise<CleanedFile> {
  const target = join(cleanDir, chunk.fileName);
  try {
    return await cleanPdfFile(chunk.path, target, {
      blank: config.blank,
      fallback: config.fallback,
      debugPages: config.debugPages,
      label: chunk.fileName,
    }, deps);
  } catch (err) {
    deps.logger.error({ err, part: chunk.fileName }, `Cleaning ${chunk.fileName} failed, copying it unchanged`);
    copyFileSync(chunk.path, target);
    return { source: chunk.path, path: target, outcome: 'original', kept: chunk.pageCount, removed: 0 };
  }
}

export function summarize(documents: DocumentReport[]): BatchSummary {
  const totals = {
    documents: documents.length,
    processed: 0,
    skipped: 0,
    failed: 0,
    chunks: 0,
    cleaned: 0,
    pagesKept: 0,
    pagesRemoved: 0,
  };
  for (const doc of documents) {
    totals[doc.status]++;
    totals.chunks += doc.chunks.length;
    totals.cleaned += doc.cleaned.length;
    for (const c of doc.cleaned) {
      totals.pagesKept += c.kept;
      totals.pagesRemoved += c.removed;
    }
  }
  return { documents, totals };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
