import { MissingContextError, NotFoundError } from '../../types/errors.js';
import type { DocumentRegistry } from './DocumentRegistry.js';
import { normalizeText } from './TextNormalizer.js';

export interface QuestionContext {
  documentId?: string;
  documentText?: string;
}

/**
 * Resolves the text a follow-up question is grounded in.
 *
 * A document id always wins: when it is given but unknown, resolution fails
 * even if text was sent too, so an answer is never grounded in the wrong
 * document. Raw text is normalized but not stored.
 */
export class ContextResolver {
  constructor(private readonly registry: DocumentRegistry) {}

  resolve(context: QuestionContext): string {
    const documentId = context.documentId?.trim();
    if (documentId) {
      try {
        return this.registry.get(documentId).text;
      } catch (error) {
        if (error instanceof NotFoundError) {
          throw new MissingContextError('document_not_found', documentId);
        }
        throw error;
      }
    }

    if (context.documentText !== undefined && context.documentText.trim().length > 0) {
      return normalizeText(context.documentText, { field: 'document_text' }).text;
    }

    throw new MissingContextError('no_context');
  }
}
