/**
 * Shared types for document analysis and grounded question answering.
 *
 * Field names of the analysis artifact and the question-answer record are the
 * JSON contract with both the AI service and API clients, hence snake_case.
 */

export const DOCUMENT_TYPES = [
  'contract',
  'rental_agreement',
  'loan_agreement',
  'terms_of_service',
  'privacy_policy',
  'employment_contract',
  'other',
] as const;

export const USER_ROLES = ['individual', 'business', 'tenant', 'borrower', 'employee'] as const;

export const COMPLEXITY_LEVELS = ['simple', 'detailed', 'expert'] as const;

export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;

export type KnownDocumentType = (typeof DOCUMENT_TYPES)[number];
export type KnownUserRole = (typeof USER_ROLES)[number];
export type KnownComplexityLevel = (typeof COMPLEXITY_LEVELS)[number];
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

/**
 * Unrecognized values are accepted and interpolated verbatim into prompts.
 * The `string & {}` arm keeps editor completion for the known values.
 */
export type DocumentType = KnownDocumentType | (string & {});
export type UserRole = KnownUserRole | (string & {});
export type ComplexityLevel = KnownComplexityLevel | (string & {});

export interface AnalysisConfig {
  documentType: DocumentType;
  userRole: UserRole;
  complexityLevel: ComplexityLevel;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  documentType: 'contract',
  userRole: 'individual',
  complexityLevel: 'simple',
};

export interface DocumentAnalysis {
  summary: string;
  key_points: string[];
  risks_and_concerns: string[];
  recommendations: string[];
  simplified_explanation: string;
}

export interface QuestionAnswer {
  answer: string;
  relevant_sections: string[];
  confidence_level: ConfidenceLevel | (string & {});
}

export interface QuestionAnswerRecord extends QuestionAnswer {
  question: string;
  /** ISO-8601 UTC */
  timestamp: string;
}

/**
 * Analysis as held by the registry: lists frozen along with the record
 */
export type StoredAnalysis = {
  readonly [K in keyof DocumentAnalysis]: DocumentAnalysis[K] extends string[] ? readonly string[] : DocumentAnalysis[K];
};

export interface DocumentRecord {
  readonly id: string;
  readonly text: string;
  readonly config: Readonly<AnalysisConfig>;
  readonly analysis: StoredAnalysis;
  readonly createdAt: Date;
}

export interface AnalyzeDocumentResult extends DocumentAnalysis {
  document_id: string;
}
