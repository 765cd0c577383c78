/**
 * Centralized error type definitions
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Generic error types
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;

    super(message, ErrorCode.NOT_FOUND, 404, true, { resource, identifier, ...additionalContext });
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string = 'Payload too large', context?: Record<string, unknown>) {
    super(message, ErrorCode.PAYLOAD_TOO_LARGE, 413, true, context);
  }
}

/**
 * Domain errors: document input and Q&A context
 */
export class EmptyInputError extends AppError {
  constructor(field: string = 'text', message?: string) {
    super(message ?? `${field} is required and cannot be blank`, ErrorCode.EMPTY_INPUT, 400, true, { field });
  }
}

export type MissingContextReason = 'document_not_found' | 'no_context';

export class MissingContextError extends AppError {
  public readonly reason: MissingContextReason;

  constructor(reason: MissingContextReason, documentId?: string) {
    const message = reason === 'document_not_found'
      ? `Document '${documentId}' was not found. Analyze the document again or send its text.`
      : 'Document ID or document text is required';
    super(message, ErrorCode.MISSING_CONTEXT, reason === 'document_not_found' ? 404 : 400, true, {
      reason,
      documentId,
    });
    this.reason = reason;
  }
}

/**
 * Domain errors: AI text service
 */
export class AiConfigurationError extends AppError {
  constructor(missingConfig: string[]) {
    super(
      `AI service not configured. Missing: ${missingConfig.join(', ')}`,
      ErrorCode.AI_NOT_CONFIGURED,
      503,
      true,
      { missingConfig }
    );
  }
}

export class AiTimeoutError extends AppError {
  constructor(timeoutMs: number, context?: Record<string, unknown>) {
    super(
      `AI service did not respond within ${timeoutMs}ms`,
      ErrorCode.AI_TIMEOUT,
      504,
      true,
      { timeoutMs, ...context }
    );
  }
}

export class AiTransportError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(`AI service unreachable: ${message}`, ErrorCode.AI_UNAVAILABLE, 503, true, context);
  }
}

export type AiServiceErrorCategory = 'authentication' | 'rate_limited' | 'bad_request' | 'upstream_failure';

/**
 * Non-2xx answer from the AI service. 429 keeps its status so clients can
 * back off; everything else is reported as a bad gateway with the upstream
 * status and category in the context.
 */
export class AiServiceError extends AppError {
  public readonly status: number;
  public readonly category: AiServiceErrorCategory;
  public readonly body: string;

  constructor(status: number, body: string) {
    const category = categorizeAiStatus(status, body);
    super(
      AI_SERVICE_MESSAGES[category](status),
      ErrorCode.AI_SERVICE_ERROR,
      category === 'rate_limited' ? 429 : 502,
      true,
      { status, category, body }
    );
    this.status = status;
    this.category = category;
    this.body = body;
  }
}

const AI_SERVICE_MESSAGES: Record<AiServiceErrorCategory, (status: number) => string> = {
  authentication: (status) =>
    `AI service rejected the credentials (HTTP ${status}). Check your GEMINI_API_KEY.`,
  rate_limited: (status) =>
    `AI service rate limit or quota exceeded (HTTP ${status}). Try again later.`,
  bad_request: (status) => `AI service rejected the request (HTTP ${status}).`,
  upstream_failure: (status) => `AI service failed to process the request (HTTP ${status}).`,
};

export function categorizeAiStatus(status: number, body: string): AiServiceErrorCategory {
  if (status === 401 || status === 403) {
    return 'authentication';
  }
  if (status === 429) {
    return 'rate_limited';
  }
  if (status >= 500) {
    return 'upstream_failure';
  }
  // Gemini reports an invalid key as 400 INVALID_ARGUMENT
  if (/API_KEY_INVALID|API key not valid/i.test(body)) {
    return 'authentication';
  }
  return 'bad_request';
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  EMPTY_INPUT = 'EMPTY_INPUT',
  MISSING_CONTEXT = 'MISSING_CONTEXT',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',

  // AI service
  AI_NOT_CONFIGURED = 'AI_NOT_CONFIGURED',
  AI_TIMEOUT = 'AI_TIMEOUT',
  AI_UNAVAILABLE = 'AI_UNAVAILABLE',
  AI_SERVICE_ERROR = 'AI_SERVICE_ERROR',
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
