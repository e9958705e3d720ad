import { describe, it, expect, afterEach } from 'vitest';
import { readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { PDFDocument, PDFName } from 'pdf-lib';
import {
  chunkCount,
  chunkFileName,
  chunkRanges,
  splitPdf,
  splitPdfFile,
} from '../../src/core/pdf/split.js';
import type { PdfChunk } from '../../src/core/pdf/types.js';
import { buildPdf, pageWidths, pdfHeader, tempDir, widths } from '../helpers/pdf.js';
import type { PageSpec } from '../helpers/pdf.js';

async function collect(bytes: Uint8Array, every: number): Promise<PdfChunk[]> {
  const chunks: PdfChunk[] = [];
  for await (const chunk of splitPdf(bytes, every)) chunks.push(chunk);
  return chunks;
}

describe('chunkRanges', () => {
  it('reconstructs the page sequence for every page count and chunk size', () => {
    for (let pages = 0; pages <= 9; pages++) {
      for (let every = 1; every <= 5; every++) {
        const ranges = [...chunkRanges(pages, every)];
        const flat = ranges.flatMap((r) => Array.from({ length: r.end - r.start }, (_, i) => r.start + i));
        expect(flat).toEqual(Array.from({ length: pages }, (_, i) => i));
        expect(ranges.every((r) => r.end - r.start <= every && r.end > r.start)).toBe(true);
        expect(ranges).toHaveLength(pages === 0 ? 0 : chunkCount(pages, every));
      }
    }
  });

  it('yields one full range when splitting is disabled', () => {
    expect([...chunkRanges(7, 0)]).toEqual([{ start: 0, end: 7 }]);
    expect([...chunkRanges(7, -3)]).toEqual([{ start: 0, end: 7 }]);
  });
});

describe('chunkFileName', () => {
  it('pads the index to three digits', () => {
    expect(chunkFileName('scan', 1, 5)).toBe('scan_part_001.pdf');
    expect(chunkFileName('scan', 42, 120)).toBe('scan_part_042.pdf');
  });

  it('widens the padding for more than 999 parts', () => {
    expect(chunkFileName('scan', 7, 1200)).toBe('scan_part_0007.pdf');
  });
});

describe('splitPdf', () => {
  it('splits 10 pages every 2 into 5 chunks of 2 pages', async () => {
    const source = await buildPdf(new Array<PageSpec>(10).fill('blank'));
    const chunks = await collect(source, 2);

    expect(chunks.map((c) => c.index)).toEqual([1, 2, 3, 4, 5]);
    expect(chunks.map((c) => c.pageIndices.length)).toEqual([2, 2, 2, 2, 2]);
    expect(chunks.map((c) => pdfHeader(c.bytes))).toEqual(new Array(5).fill('%PDF-1.4'));

    const all: number[] = [];
    for (const c of chunks) all.push(...(await pageWidths(c.bytes)));
    expect(all).toEqual(widths(10));
  });

  it('puts the remainder of 9 pages every 2 into a final 1-page chunk', async () => {
    const source = await buildPdf(new Array<PageSpec>(9).fill('blank'));
    const chunks = await collect(source, 2);

    expect(chunks.map((c) => c.pageIndices.length)).toEqual([2, 2, 2, 2, 1]);
    expect(await pageWidths(chunks[4].bytes)).toEqual([108]);
  });

  it('passes the document through unchanged when every <= 0', async () => {
    const source = await buildPdf(['blank', 'blank', 'blank']);
    for (const every of [0, -1]) {
      const chunks = await collect(source, every);
      expect(chunks).toHaveLength(1);
      expect(chunks[0].passThrough).toBe(true);
      expect(chunks[0].bytes).toBe(source);
      expect(chunks[0].pageIndices).toEqual([0, 1, 2]);
    }
  });

  it('strips tagging structure from every chunk', async () => {
    const source = await buildPdf(['blank', 'blank', 'blank'], { tagged: true });
    const chunks = await collect(source, 2);

    for (const c of chunks) {
      const doc = await PDFDocument.load(c.bytes);
      expect(doc.catalog.get(PDFName.of('StructTreeRoot'))).toBeUndefined();
      expect(doc.catalog.get(PDFName.of('MarkInfo'))).toBeUndefined();
      for (const p of doc.getPages()) {
        expect(p.node.get(PDFName.of('StructParents'))).toBeUndefined();
        expect(p.node.get(PDFName.of('Tabs'))).toBeUndefined();
      }
    }
  });
});

describe('splitPdfFile', () => {
  let dir: ReturnType<typeof tempDir>;
  afterEach(() => dir.cleanup());

  it('writes zero-padded parts next to each other', async () => {
    dir = tempDir();
    const src = join(dir.path, 'doc.pdf');
    writeFileSync(src, await buildPdf(new Array<PageSpec>(10).fill('blank')));

    const files = await splitPdfFile(src, join(dir.path, 'out'), 2);

    expect(files.map((f) => f.fileName)).toEqual([
      'doc_part_001.pdf',
      'doc_part_002.pdf',
      'doc_part_003.pdf',
      'doc_part_004.pdf',
      'doc_part_005.pdf',
    ]);
    expect(readdirSync(join(dir.path, 'out')).sort()).toEqual(files.map((f) => f.fileName));
    expect(files.every((f) => f.pageCount === 2)).toBe(true);
  });

  it('copies the source under its own name when splitting is disabled', async () => {
    dir = tempDir();
    const src = join(dir.path, 'Scan.PDF');
    const bytes = await buildPdf(['blank', 'blank']);
    writeFileSync(src, bytes);

    const files = await splitPdfFile(src, join(dir.path, 'out'), 0);

    expect(files).toEqual([{ index: 1, pageCount: 2, path: join(dir.path, 'out', 'Scan.PDF'), fileName: 'Scan.PDF' }]);
    expect(new Uint8Array(readFileSync(files[0].path))).toEqual(bytes);
  });
});
