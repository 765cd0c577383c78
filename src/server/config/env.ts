/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults.
 * Invalid values are collected and reported together.
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  const known: readonly string[] = NODE_ENVS;
  return known.includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;
  ALLOWED_ORIGINS?: string;
  MAX_UPLOAD_BYTES: number;

  // Logging Configuration
  LOG_LEVEL?: string;

  // Gemini Configuration
  GEMINI_API_KEY?: string;
  GEMINI_MODEL: string;
  GEMINI_TIMEOUT: number;
  GEMINI_MAX_RETRIES: number;
  GEMINI_RETRY_DELAY_MS: number;
  GEMINI_TEMPERATURE: number;
  GEMINI_MAX_OUTPUT_TOKENS: number;

  // Prompt Configuration
  ANALYSIS_TEXT_LIMIT: number;
  QUESTION_TEXT_LIMIT: number;
  QUESTION_LENGTH_LIMIT: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 8080);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const geminiTimeout = parseNumericEnv(process.env.GEMINI_TIMEOUT, 30000);
  if (geminiTimeout < 1000) {
    errors.push(`GEMINI_TIMEOUT: Invalid value "${process.env.GEMINI_TIMEOUT}". Must be at least 1000ms.`);
  }
  if (geminiTimeout > 120000) {
    logger.warn(`GEMINI_TIMEOUT (${geminiTimeout}ms) is greater than 2 minutes. Requests may hang for a long time.`);
  }

  const geminiMaxRetries = parseNumericEnv(process.env.GEMINI_MAX_RETRIES, 1);
  if (geminiMaxRetries < 0 || geminiMaxRetries > 5) {
    errors.push(`GEMINI_MAX_RETRIES: Invalid value "${process.env.GEMINI_MAX_RETRIES}". Must be between 0 and 5.`);
  }

  const geminiRetryDelay = parseNumericEnv(process.env.GEMINI_RETRY_DELAY_MS, 500);
  if (geminiRetryDelay < 0) {
    errors.push(`GEMINI_RETRY_DELAY_MS: Invalid value "${process.env.GEMINI_RETRY_DELAY_MS}". Must not be negative.`);
  }

  const geminiTemperature = parseFloatEnv(process.env.GEMINI_TEMPERATURE, 0.3);
  if (geminiTemperature < 0 || geminiTemperature > 2) {
    errors.push(`GEMINI_TEMPERATURE: Invalid value "${process.env.GEMINI_TEMPERATURE}". Must be between 0 and 2.`);
  }

  const geminiMaxOutputTokens = parseNumericEnv(process.env.GEMINI_MAX_OUTPUT_TOKENS, 2048);
  if (geminiMaxOutputTokens < 1) {
    errors.push(`GEMINI_MAX_OUTPUT_TOKENS: Invalid value "${process.env.GEMINI_MAX_OUTPUT_TOKENS}". Must be at least 1.`);
  }

  const analysisTextLimit = parseNumericEnv(process.env.ANALYSIS_TEXT_LIMIT, 8000);
  const questionTextLimit = parseNumericEnv(process.env.QUESTION_TEXT_LIMIT, 6000);
  const questionLengthLimit = parseNumericEnv(process.env.QUESTION_LENGTH_LIMIT, 1000);
  if (analysisTextLimit < 100) {
    errors.push(`ANALYSIS_TEXT_LIMIT: Invalid value "${process.env.ANALYSIS_TEXT_LIMIT}". Must be at least 100.`);
  }
  if (questionTextLimit < 100) {
    errors.push(`QUESTION_TEXT_LIMIT: Invalid value "${process.env.QUESTION_TEXT_LIMIT}". Must be at least 100.`);
  }
  if (questionLengthLimit < 10) {
    errors.push(`QUESTION_LENGTH_LIMIT: Invalid value "${process.env.QUESTION_LENGTH_LIMIT}". Must be at least 10.`);
  }

  const maxUploadBytes = parseNumericEnv(process.env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024);
  if (maxUploadBytes < 1024) {
    errors.push(`MAX_UPLOAD_BYTES: Invalid value "${process.env.MAX_UPLOAD_BYTES}". Must be at least 1024.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(`Environment validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }

  if (!process.env.GEMINI_API_KEY && nodeEnv !== 'test') {
    logger.warn('GEMINI_API_KEY is not set. Analysis and question requests will fail until it is configured.');
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,
    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,
    MAX_UPLOAD_BYTES: maxUploadBytes,

    LOG_LEVEL: process.env.LOG_LEVEL,

    GEMINI_API_KEY: process.env.GEMINI_API_KEY || undefined,
    GEMINI_MODEL: process.env.GEMINI_MODEL || 'gemini-2.0-flash',
    GEMINI_TIMEOUT: geminiTimeout,
    GEMINI_MAX_RETRIES: geminiMaxRetries,
    GEMINI_RETRY_DELAY_MS: geminiRetryDelay,
    GEMINI_TEMPERATURE: geminiTemperature,
    GEMINI_MAX_OUTPUT_TOKENS: geminiMaxOutputTokens,

    ANALYSIS_TEXT_LIMIT: analysisTextLimit,
    QUESTION_TEXT_LIMIT: questionTextLimit,
    QUESTION_LENGTH_LIMIT: questionLengthLimit,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
