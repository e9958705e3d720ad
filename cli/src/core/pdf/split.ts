/**
 * Fixed-size PDF splitting via pdf-lib.
 *
 * Chunks are produced lazily, in page order: chunk k holds pages
 * [k*N, min((k+1)*N, pageCount)). With N <= 0 splitting is disabled and the
 * source passes through as a single chunk, byte for byte.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { loadPdf } from './probe.js';
import { stripStructure, writePdf } from './sanitize.js';
import type { PageRange, PdfChunk, SplitFile } from './types.js';

/** Minimum digits in a chunk index, e.g. "_part_001". */
const INDEX_PAD = 3;

/** Page ranges for splitting `pageCount` pages every `every` pages. */
export function* chunkRanges(pageCount: number, every: number): Generator<PageRange> {
  if (every <= 0) {
    yield { start: 0, end: pageCount };
    return;
  }
  for (let start = 0; start < pageCount; start += every) {
    yield { start, end: Math.min(start + every, pageCount) };
  }
}

/** Number of chunks `chunkRanges` yields for a non-empty split. */
export function chunkCount(pageCount: number, every: number): number {
  return every <= 0 ? 1 : Math.ceil(pageCount / every);
}

/**
 * Output name for a chunk. The index is zero-padded to the width of the
 * total so the parts sort correctly when listed alphabetically.
 */
export function chunkFileName(stem: string, index: number, total: number): string {
  const width = Math.max(INDEX_PAD, String(total).length);
  return `${stem}_part_${String(index).padStart(width, '0')}.pdf`;
}

/**
 * Split PDF bytes into chunks of `every` pages.
 * Each chunk is a new, structure-stripped document.
 */
export async function* splitPdf(bytes: Uint8Array, every: number): AsyncGenerator<PdfChunk> {
  const source = await loadPdf(bytes);
  const pageCount = source.getPageCount();

  if (every <= 0) {
    yield {
      index: 1,
      total: 1,
      pageIndices: Array.from({ length: pageCount }, (_, i) => i),
      bytes,
      passThrough: true,
    };
    return;
  }

  const total = chunkCount(pageCount, every);
  let index = 0;
  for (const range of chunkRanges(pageCount, every)) {
    index++;
    const pageIndices = Array.from({ length: range.end - range.start }, (_, i) => range.start + i);

    const chunk = await PDFDocument.create();
    const copied = await chunk.copyPages(source, pageIndices);
    for (const page of copied) chunk.addPage(page);
    stripStructure(chunk);

    yield {
      index,
      total,
      pageIndices,
      bytes: await writePdf(chunk),
      passThrough: false,
    };
  }
}

/**
 * Split a PDF file into `outDir`.
 *
 * Parts are named `<stem>_part_NNN.pdf`. When splitting is disabled the
 * source is copied as-is under its own name.
 */
export async function splitPdfFile(sourcePath: string, outDir: string, every: number): Promise<SplitFile[]> {
  mkdirSync(outDir, { recursive: true });

  const bytes = new Uint8Array(readFileSync(sourcePath));
  const stem = basename(sourcePath, extname(sourcePath));
  const files: SplitFile[] = [];

  for await (const chunk of splitPdf(bytes, every)) {
    const fileName = chunk.passThrough
      ? basename(sourcePath)
      : chunkFileName(stem, chunk.index, chunk.total);
    const path = join(outDir, fileName);
    writeFileSync(path, chunk.bytes);
    files.push({ index: chunk.index, pageCount: chunk.pageIndices.length, path, fileName });
  }

  return files;
}
