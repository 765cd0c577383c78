import { PdfExtractor } from './pdf/PdfExtractor.js';
import type { PdfExtractionResult } from './pdf/PdfExtractor.js';
import { EmptyInputError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export interface UploadedDocument {
  buffer: Buffer;
  originalname: string;
  mimetype?: string;
}

export interface TextExtractor {
  extract(buffer: Buffer): Promise<PdfExtractionResult>;
}

export function isPdfUpload(file: Pick<UploadedDocument, 'originalname' | 'mimetype'>): boolean {
  return file.originalname.toLowerCase().endsWith('.pdf') || file.mimetype === 'application/pdf';
}

/**
 * Turns an uploaded file into raw document text.
 *
 * PDFs go through the PDF text layer; anything else is decoded as UTF-8 with
 * invalid sequences replaced. An unreadable PDF yields empty text, which the
 * normalizer then rejects. A PDF with pages but no text layer is rejected here
 * so the client learns it needs OCR.
 */
export class DocumentTextExtractor {
  constructor(private readonly pdfExtractor: TextExtractor = new PdfExtractor()) {}

  async extract(file: UploadedDocument): Promise<string> {
    if (isPdfUpload(file)) {
      let result: PdfExtractionResult;
      try {
        result = await this.pdfExtractor.extract(file.buffer);
      } catch (error) {
        logger.warn(
          { filename: file.originalname, error: error instanceof Error ? error.message : String(error) },
          'Could not extract text from PDF upload'
        );
        return '';
      }

      if (result.isScanned) {
        logger.warn(
          { filename: file.originalname, pageCount: result.pageCount, textLength: result.fullText.length },
          'PDF upload has little or no text layer'
        );
        if (result.fullText.length === 0) {
          throw new EmptyInputError(
            'file',
            `The PDF has ${result.pageCount} page(s) but no text layer; it may be a scanned image`
          );
        }
      }
      return result.fullText;
    }

    return new TextDecoder('utf-8', { fatal: false }).decode(file.buffer);
  }
}
