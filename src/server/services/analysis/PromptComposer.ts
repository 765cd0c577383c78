/**
 * Prompt Composer
 *
 * Renders the two completion prompts (document analysis, grounded question)
 * from canonical text and analysis options. Pure: identical inputs always
 * produce identical prompt text.
 */

import type {
  AnalysisConfig,
  ComplexityLevel,
  DocumentType,
  KnownComplexityLevel,
  KnownDocumentType,
  KnownUserRole,
  UserRole,
} from './types.js';

export const DEFAULT_ANALYSIS_TEXT_LIMIT = 8000;
export const DEFAULT_QUESTION_TEXT_LIMIT = 6000;
export const DEFAULT_QUESTION_LENGTH_LIMIT = 1000;

export type PromptRequest =
  | { mode: 'analysis'; text: string; config: AnalysisConfig }
  | { mode: 'question'; question: string; text: string };

export interface PromptComposerOptions {
  analysisTextLimit?: number;
  questionTextLimit?: number;
  questionLengthLimit?: number;
}

const ROLE_CONTEXT: Record<KnownUserRole, string> = {
  individual: 'a regular person without legal expertise',
  business: 'a small business owner',
  tenant: 'someone looking to rent property',
  borrower: 'someone seeking a loan',
  employee: 'an employee reviewing the terms of their job',
};

const COMPLEXITY_INSTRUCTIONS: Record<KnownComplexityLevel, string> = {
  simple: 'Use very simple language, avoid legal jargon, explain everything in everyday terms',
  detailed: 'Provide moderate detail with some legal terms explained in parentheses',
  expert: 'Include relevant legal terminology with explanations',
};

const DOCUMENT_LABELS: Record<KnownDocumentType, string> = {
  contract: 'contract',
  rental_agreement: 'rental agreement',
  loan_agreement: 'loan agreement',
  terms_of_service: 'terms of service',
  privacy_policy: 'privacy policy',
  employment_contract: 'employment contract',
  other: 'legal document',
};

function lookup(table: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function describeRole(userRole: UserRole): string {
  return lookup(ROLE_CONTEXT, userRole) ?? `a person (${userRole})`;
}

export function describeComplexity(complexityLevel: ComplexityLevel): string {
  return (
    lookup(COMPLEXITY_INSTRUCTIONS, complexityLevel) ??
    `Use clear, simple language (requested level of detail: ${complexityLevel})`
  );
}

export function describeDocumentType(documentType: DocumentType): string {
  return lookup(DOCUMENT_LABELS, documentType) ?? documentType;
}

/**
 * Cut text to `limit` characters and append a marker naming the cut.
 */
export function truncateForPrompt(text: string, limit: number, label: string = 'Document'): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}\n[${label} truncated: showing the first ${limit} of ${text.length} characters]`;
}

export class PromptComposer {
  private readonly analysisTextLimit: number;
  private readonly questionTextLimit: number;
  private readonly questionLengthLimit: number;

  constructor(options: PromptComposerOptions = {}) {
    this.analysisTextLimit = options.analysisTextLimit ?? DEFAULT_ANALYSIS_TEXT_LIMIT;
    this.questionTextLimit = options.questionTextLimit ?? DEFAULT_QUESTION_TEXT_LIMIT;
    this.questionLengthLimit = options.questionLengthLimit ?? DEFAULT_QUESTION_LENGTH_LIMIT;
  }

  get limits(): { analysis: number; question: number; questionLength: number } {
    return {
      analysis: this.analysisTextLimit,
      question: this.questionTextLimit,
      questionLength: this.questionLengthLimit,
    };
  }

  compose(request: PromptRequest): string {
    switch (request.mode) {
      case 'analysis':
        return this.composeAnalysisPrompt(request.text, request.config);
      case 'question':
        return this.composeQuestionPrompt(request.question, request.text);
    }
  }

  composeAnalysisPrompt(text: string, config: AnalysisConfig): string {
    const documentText = truncateForPrompt(text, this.analysisTextLimit);

    return `You are a legal document expert helping ${describeRole(config.userRole)} understand a ${describeDocumentType(config.documentType)}.

INSTRUCTIONS:
- ${describeComplexity(config.complexityLevel)}
- Focus on practical implications and real-world consequences
- Highlight potential risks and red flags
- Provide actionable recommendations
- Be empathetic and supportive in tone

DOCUMENT TEXT:
${documentText}

Provide a comprehensive analysis as a single JSON object with exactly these keys:
{
  "summary": "A clear, concise summary of what this document is about and its main purpose",
  "key_points": [
    "5-7 of the most important points from the document, each in plain English"
  ],
  "risks_and_concerns": [
    "Potential risks, unfavorable terms, red flags or concerning clauses"
  ],
  "recommendations": [
    "Specific actions to take, questions to ask, and things to negotiate or clarify"
  ],
  "simplified_explanation": "A paragraph explaining the document as if talking to a friend, using analogies and simple examples where helpful"
}

Respond ONLY with valid JSON. Do not wrap it in markdown code fences and do not add any text before or after it.`;
  }

  composeQuestionPrompt(question: string, text: string): string {
    const documentText = truncateForPrompt(text, this.questionTextLimit);
    const userQuestion = truncateForPrompt(question, this.questionLengthLimit, 'Question');

    return `You are a helpful legal assistant. A user has a question about their legal document.
Answer strictly from the document text below. If the document does not contain the answer, say so and use a low confidence level.

DOCUMENT TEXT:
${documentText}

USER QUESTION:
${userQuestion}

Provide the answer as a single JSON object with exactly these keys:
{
  "answer": "A clear, helpful answer to the user's question in simple language",
  "relevant_sections": [
    "Exact quotes from the document that support the answer"
  ],
  "confidence_level": "high, medium or low"
}

Guidelines:
- Use simple, non-legal language
- Be specific and practical
- If you're not certain, say so
- Focus on what this means for the user personally

Respond ONLY with valid JSON. Do not wrap it in markdown code fences and do not add any text before or after it.`;
  }
}
