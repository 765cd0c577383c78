/**
 * Document Analysis Service
 *
 * Entry point for the analysis pipeline and grounded Q&A:
 *   normalize -> compose prompt -> LLM -> coerce -> registry / chat ledger
 *
 * Only the LLM call suspends; registry and ledger operations happen
 * synchronously after it returns.
 */

import type { LLMProvider } from '../llm/LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { normalizeText } from './TextNormalizer.js';
import { PromptComposer } from './PromptComposer.js';
import { coerceAnalysis, coerceQuestionAnswer } from './ResponseCoercion.js';
import { DocumentRegistry } from './DocumentRegistry.js';
import { ChatLedger } from './ChatLedger.js';
import { ContextResolver } from './ContextResolver.js';
import type { QuestionContext } from './ContextResolver.js';
import { DEFAULT_ANALYSIS_CONFIG } from './types.js';
import type {
  AnalysisConfig,
  AnalyzeDocumentResult,
  DocumentRecord,
  QuestionAnswer,
  QuestionAnswerRecord,
} from './types.js';

export interface DocumentAnalysisServiceDeps {
  provider: LLMProvider;
  registry?: DocumentRegistry;
  ledger?: ChatLedger;
  composer?: PromptComposer;
  now?: () => Date;
}

export type ChatRecordInput = Omit<QuestionAnswerRecord, 'timestamp'> & { timestamp?: string };

export class DocumentAnalysisService {
  private readonly provider: LLMProvider;
  private readonly registry: DocumentRegistry;
  private readonly ledger: ChatLedger;
  private readonly composer: PromptComposer;
  private readonly resolver: ContextResolver;
  private readonly now: () => Date;

  constructor(deps: DocumentAnalysisServiceDeps) {
    this.provider = deps.provider;
    this.registry = deps.registry || new DocumentRegistry();
    this.ledger = deps.ledger || new ChatLedger();
    this.composer = deps.composer || new PromptComposer();
    this.resolver = new ContextResolver(this.registry);
    this.now = deps.now || (() => new Date());
  }

  /**
   * Analyze a document and register it for follow-up questions.
   *
   * @throws EmptyInputError for blank text; AI client errors propagate unchanged
   */
  async analyzeDocument(text: string, config: Partial<AnalysisConfig> = {}): Promise<AnalyzeDocumentResult> {
    const resolvedConfig: AnalysisConfig = {
      documentType: config.documentType ?? DEFAULT_ANALYSIS_CONFIG.documentType,
      userRole: config.userRole ?? DEFAULT_ANALYSIS_CONFIG.userRole,
      complexityLevel: config.complexityLevel ?? DEFAULT_ANALYSIS_CONFIG.complexityLevel,
    };
    const normalized = normalizeText(text, {
      softLimit: this.composer.limits.analysis,
      emptyMessage: 'Document text is required',
    });

    if (normalized.exceedsSoftLimit) {
      logger.info(
        { characterCount: normalized.characterCount, promptLimit: this.composer.limits.analysis },
        'Document exceeds prompt limit; analysis will cover the leading part only'
      );
    }

    const prompt = this.composer.compose({ mode: 'analysis', text: normalized.text, config: resolvedConfig });
    const response = await this.provider.generate([{ role: 'user', content: prompt }]);
    const coerced = coerceAnalysis(response.content);

    const documentId = this.registry.store(normalized.text, resolvedConfig, coerced.value);

    logger.info(
      {
        documentId,
        documentType: resolvedConfig.documentType,
        userRole: resolvedConfig.userRole,
        complexityLevel: resolvedConfig.complexityLevel,
        characterCount: normalized.characterCount,
        coercion: coerced.method,
        model: response.model,
      },
      'Document analyzed'
    );

    return { document_id: documentId, ...coerced.value };
  }

  /**
   * Answer a question grounded in a registered document or in supplied text,
   * and record the exchange in the chat ledger.
   *
   * @throws EmptyInputError for a blank question; MissingContextError when no grounding text resolves
   */
  async askQuestion(question: string, context: QuestionContext): Promise<QuestionAnswer> {
    const normalized = normalizeText(question, {
      field: 'question',
      softLimit: this.composer.limits.questionLength,
      emptyMessage: 'Question is required',
    });
    const normalizedQuestion = normalized.text;
    const documentText = this.resolver.resolve(context);

    if (normalized.exceedsSoftLimit) {
      logger.info(
        { characterCount: normalized.characterCount, promptLimit: this.composer.limits.questionLength },
        'Question exceeds prompt limit; only the leading part is sent'
      );
    }

    const prompt = this.composer.compose({ mode: 'question', question: normalizedQuestion, text: documentText });
    const response = await this.provider.generate([{ role: 'user', content: prompt }]);
    const coerced = coerceQuestionAnswer(response.content);

    this.ledger.append({
      question: normalizedQuestion,
      ...coerced.value,
      timestamp: this.now().toISOString(),
    });

    logger.info(
      {
        documentId: context.documentId,
        groundedBy: context.documentId ? 'registry' : 'text',
        confidenceLevel: coerced.value.confidence_level,
        coercion: coerced.method,
      },
      'Question answered'
    );

    return coerced.value;
  }

  getDocument(documentId: string): DocumentRecord {
    return this.registry.get(documentId);
  }

  listChatHistory(): QuestionAnswerRecord[] {
    return this.ledger.readAll();
  }

  appendChat(record: ChatRecordInput): QuestionAnswerRecord {
    const entry: QuestionAnswerRecord = {
      question: record.question,
      answer: record.answer,
      relevant_sections: record.relevant_sections,
      confidence_level: record.confidence_level,
      timestamp: record.timestamp ?? this.now().toISOString(),
    };
    this.ledger.append(entry);
    return entry;
  }

  clearChatHistory(): void {
    this.ledger.clear();
    logger.info('Chat history cleared');
  }

  isAiConfigured(): Promise<boolean> {
    return this.provider.isAvailable();
  }

  getStats(): { documents: number; chatEntries: number } {
    return { documents: this.registry.size, chatEntries: this.ledger.size };
  }
}
