/**
 * Encrypted-PDF detection.
 *
 * pdf-lib refuses to copy pages out of an encrypted document, so the batch
 * checks the trailer's /Encrypt entry first and skips such files.
 */

import { PDFDocument } from 'pdf-lib';

/**
 * True if the document carries an /Encrypt dictionary.
 * Throws like `PDFDocument.load` for bytes that are not a PDF.
 */
export async function isEncryptedPdf(bytes: Uint8Array): Promise<boolean> {
  const doc = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
  return doc.isEncrypted;
}
