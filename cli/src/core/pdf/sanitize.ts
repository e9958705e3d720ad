/**
 * Strip tagged-PDF structure from a document before it is written.
 *
 * Chunks copied out of a tagged source keep their /StructParents pointers
 * while the structure tree itself stays behind; several readers reject such
 * files. Removing the tagging keys leaves page content untouched.
 */

import { PDFHeader, PDFName } from 'pdf-lib';
import type { PDFDocument } from 'pdf-lib';

const CATALOG_KEYS = ['StructTreeRoot', 'MarkInfo', 'RoleMap'].map((k) => PDFName.of(k));
const PAGE_KEYS = ['Tabs', 'StructParents'].map((k) => PDFName.of(k));

export function stripStructure(doc: PDFDocument): void {
  for (const key of CATALOG_KEYS) {
    doc.catalog.delete(key);
  }
  for (const page of doc.getPages()) {
    for (const key of PAGE_KEYS) {
      page.node.delete(key);
    }
  }
}

/**
 * Save options shared by every writer: classic xref table, no object streams,
 * and no page added to a document that has none.
 */
const SAVE_OPTIONS = { useObjectStreams: false, addDefaultPage: false } as const;

/** Serialize `doc` with a %PDF-1.4 header for older archive readers. */
export function writePdf(doc: PDFDocument): Promise<Uint8Array> {
  doc.context.header = PDFHeader.forVersion(1, 4);
  return doc.save(SAVE_OPTIONS);
}
