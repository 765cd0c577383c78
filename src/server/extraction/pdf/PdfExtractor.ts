/**
 * PdfExtractor - Extract text from PDF documents
 *
 * Text layer only; scanned (image-only) PDFs come back with little or no text.
 */

import { logger } from '../../utils/logger.js';

/** Pages averaging less text than this are treated as scanned images */
const MIN_TEXT_PER_PAGE = 50;

export interface PdfExtractionResult {
  fullText: string;
  pageCount: number;
  isScanned: boolean;
}

export class PdfExtractor {
  /**
   * Extract text from PDF buffer
   *
   * @throws Error if the buffer cannot be parsed as a PDF
   */
  async extract(pdfBuffer: Buffer): Promise<PdfExtractionResult> {
    // Loaded on first use; the package entry point runs a self-test when imported as ESM
    const { default: pdfParse } = await import('pdf-parse/lib/pdf-parse.js');

    try {
      const data = await pdfParse(pdfBuffer, { max: 0 });

      const fullText = (data.text || '').trim();
      const pageCount = data.numpages || 0;
      const textPerPage = pageCount > 0 ? fullText.length / pageCount : 0;
      const isScanned = textPerPage < MIN_TEXT_PER_PAGE && pageCount > 0;

      logger.debug({ pageCount, textLength: fullText.length, isScanned }, 'PDF extraction completed');

      return { fullText, pageCount, isScanned };
    } catch (error) {
      logger.error({ error }, 'PDF extraction failed');
      throw new Error(`PDF extraction failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
