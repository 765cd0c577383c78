/**
 * Service Initialization
 *
 * Builds the application services once at startup. The document registry and
 * chat ledger live for the lifetime of the process and are shared by all
 * requests through the services returned here.
 */

import type { Env } from './env.js';
import { logger } from '../utils/logger.js';
import type { LLMProvider } from '../services/llm/LLMProvider.js';
import { GeminiProvider } from '../services/llm/GeminiProvider.js';
import { DocumentRegistry } from '../services/analysis/DocumentRegistry.js';
import { ChatLedger } from '../services/analysis/ChatLedger.js';
import { PromptComposer } from '../services/analysis/PromptComposer.js';
import { DocumentAnalysisService } from '../services/analysis/DocumentAnalysisService.js';
import { DocumentTextExtractor } from '../extraction/DocumentTextExtractor.js';

export interface AppServices {
  analysisService: DocumentAnalysisService;
  textExtractor: DocumentTextExtractor;
}

export interface ServiceOverrides {
  provider?: LLMProvider;
  textExtractor?: DocumentTextExtractor;
}

/**
 * Initialize all application services
 */
export function createServices(env: Env, overrides: ServiceOverrides = {}): AppServices {
  const provider = overrides.provider ?? new GeminiProvider({
    apiKey: env.GEMINI_API_KEY,
    defaultModel: env.GEMINI_MODEL,
    timeout: env.GEMINI_TIMEOUT,
    maxRetries: env.GEMINI_MAX_RETRIES,
    retryDelayMs: env.GEMINI_RETRY_DELAY_MS,
    temperature: env.GEMINI_TEMPERATURE,
    maxOutputTokens: env.GEMINI_MAX_OUTPUT_TOKENS,
  });

  const analysisService = new DocumentAnalysisService({
    provider,
    registry: new DocumentRegistry(),
    ledger: new ChatLedger(),
    composer: new PromptComposer({
      analysisTextLimit: env.ANALYSIS_TEXT_LIMIT,
      questionTextLimit: env.QUESTION_TEXT_LIMIT,
      questionLengthLimit: env.QUESTION_LENGTH_LIMIT,
    }),
  });

  logger.info(
    {
      provider: provider.getName(),
      model: env.GEMINI_MODEL,
      timeout: env.GEMINI_TIMEOUT,
      maxRetries: env.GEMINI_MAX_RETRIES,
    },
    'Services initialized'
  );

  return {
    analysisService,
    textExtractor: overrides.textExtractor ?? new DocumentTextExtractor(),
  };
}
