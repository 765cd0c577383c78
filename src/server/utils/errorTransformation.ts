/**
 * Error transformation utilities
 * Converts framework and domain errors to the standardized response format
 */
import type { Request } from 'express';
import multer from 'multer';
import {
  toAppError,
  BadRequestError,
  PayloadTooLargeError,
  type AppError,
  type ErrorResponse,
} from '../types/errors.js';

interface BodyParserError {
  type: string;
  status?: number;
  message: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    error.type.startsWith('entity.')
  );
}

/**
 * Map errors raised outside our own code (body parsing, uploads) onto AppErrors
 */
export function normalizeError(error: unknown): AppError {
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return new PayloadTooLargeError('Uploaded file is too large', { field: error.field });
    }
    return new BadRequestError(`Upload rejected: ${error.message}`, { code: error.code, field: error.field });
  }

  if (isBodyParserError(error)) {
    if (error.type === 'entity.too.large') {
      return new PayloadTooLargeError('Request body is too large');
    }
    if (error.type === 'entity.parse.failed') {
      return new BadRequestError('Request body is not valid JSON');
    }
    return new BadRequestError(error.message);
  }

  return toAppError(error);
}

/**
 * Transform error to standardized error response
 */
export function transformErrorToResponse(
  error: unknown,
  req: Request,
  includeStack = false
): ErrorResponse {
  const appError = normalizeError(error);

  // Internal failures keep their message out of the response
  const message = appError.isOperational ? appError.message : 'An unexpected error occurred';

  return {
    error: appError.name,
    code: appError.code,
    message,
    statusCode: appError.statusCode,
    timestamp: new Date().toISOString(),
    path: req.path,
    ...(appError.isOperational && appError.context ? { context: appError.context } : {}),
    ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
  };
}
