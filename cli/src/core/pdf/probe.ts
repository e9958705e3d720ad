/**
 * Page probing: measures the attributes the blank-page classifier needs.
 *
 * Text comes from pdfjs-dist (pure JS, no canvas). Content-stream sizes and
 * image references come from pdf-lib's object model, which exposes the raw
 * page dictionaries pdfjs keeps internal.
 */

// pdfjs-dist — legacy build for Node.js (no canvas requirement)
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFName,
  PDFRawStream,
  PDFStream,
  decodePDFRawStream,
} from 'pdf-lib';
import type { PDFObject, PDFPage } from 'pdf-lib';
import { measureText } from './classify.js';
import type { PageMetrics, TextExtractor } from './types.js';

/** Form XObjects nest; stop descending past this depth. */
const MAX_FORM_DEPTH = 8;

const XOBJECT = PDFName.of('XObject');
const SUBTYPE = PDFName.of('Subtype');
const RESOURCES = PDFName.of('Resources');
const IMAGE = PDFName.of('Image');
const FORM = PDFName.of('Form');

// ── Text ─────────────────────────────────────────────────────

/**
 * Read the text of pages 1..pageCount in order. A page whose text cannot be
 * read yields '' and is judged by its content stream and images alone.
 */
export async function collectPageTexts(
  pageCount: number,
  readPage: (pageNumber: number) => Promise<string>,
): Promise<string[]> {
  const texts: string[] = [];
  for (let n = 1; n <= pageCount; n++) {
    try {
      texts.push(await readPage(n));
    } catch {
      // Unreadable text layer counts as no text
      texts.push('');
    }
  }
  return texts;
}

/**
 * Extract the text of every page with pdfjs-dist.
 * The input is copied: pdfjs may detach the buffer it is given.
 */
export const extractPageTexts: TextExtractor = async (bytes) => {
  const doc = await getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    disableFontFace: true,
    verbosity: 0,
  }).promise;

  try {
    return await collectPageTexts(doc.numPages, async (pageNumber) => {
      const page = await doc.getPage(pageNumber);
      try {
        const content = await page.getTextContent();
        let text = '';
        for (const item of content.items) {
          if (!('str' in item)) continue;
          text += item.str;
          if (item.hasEOL) text += '\n';
        }
        return text;
      } finally {
        page.cleanup();
      }
    });
  } finally {
    await doc.destroy();
  }
};

// ── Structure ────────────────────────────────────────────────

/** Decoded byte length of a page's content stream(s). */
export function contentStreamBytes(page: PDFPage): number {
  const contents = page.node.Contents();
  if (!contents) return 0;

  if (contents instanceof PDFArray) {
    let total = 0;
    for (let i = 0; i < contents.size(); i++) {
      total += streamLength(contents.lookup(i));
    }
    return total;
  }
  return streamLength(contents);
}

function streamLength(obj: PDFObject | undefined): number {
  if (obj instanceof PDFRawStream) {
    try {
      return decodePDFRawStream(obj).decode().length;
    } catch {
      // Unsupported filter: the encoded size is the closest measure left
      return obj.getContentsSize();
    }
  }
  if (obj instanceof PDFStream) return obj.getContentsSize();
  return 0;
}

/**
 * True if the resource dictionary references an image XObject, directly or
 * through form XObjects. Resources that cannot be walked count as images so
 * an unreadable page is never dropped as blank.
 */
export function resourcesHaveImage(resources: PDFDict | undefined): boolean {
  try {
    return walkResources(resources, 0, new Set());
  } catch {
    return true;
  }
}

function walkResources(resources: PDFDict | undefined, depth: number, seen: Set<PDFDict>): boolean {
  if (!resources || depth > MAX_FORM_DEPTH || seen.has(resources)) return false;
  seen.add(resources);

  const xobjects = resources.lookupMaybe(XOBJECT, PDFDict);
  if (!xobjects) return false;

  for (const name of xobjects.keys()) {
    const xobject = xobjects.lookup(name);
    if (!(xobject instanceof PDFStream)) continue;

    const subtype = xobject.dict.get(SUBTYPE);
    if (subtype === IMAGE) return true;
    if (subtype === FORM) {
      const nested = xobject.dict.lookupMaybe(RESOURCES, PDFDict);
      if (walkResources(nested, depth + 1, seen)) return true;
    }
  }
  return false;
}

export function pageHasImage(page: PDFPage): boolean {
  // Resources() resolves the attribute through the /Parent chain
  return resourcesHaveImage(page.node.Resources());
}

// ── Combined ─────────────────────────────────────────────────

/**
 * Measure every page of a loaded document.
 *
 * @param doc     The document as loaded by pdf-lib.
 * @param bytes   The same document's bytes, for text extraction.
 * @param extractText  Text source (defaults to pdfjs-dist).
 */
export async function probePages(
  doc: PDFDocument,
  bytes: Uint8Array,
  extractText: TextExtractor = extractPageTexts,
): Promise<PageMetrics[]> {
  const pages = doc.getPages();
  const texts = await extractText(bytes);

  return pages.map((page, pageIndex) => ({
    pageIndex,
    ...measureText(texts[pageIndex] ?? ''),
    contentBytes: contentStreamBytes(page),
    hasImage: pageHasImage(page),
  }));
}

/** Load a PDF with pdf-lib without touching its metadata. */
export function loadPdf(bytes: Uint8Array): Promise<PDFDocument> {
  return PDFDocument.load(bytes, { updateMetadata: false });
}
