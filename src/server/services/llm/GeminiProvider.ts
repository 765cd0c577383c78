/**
 * Google Gemini LLM Provider
 *
 * Implements LLMProvider for the Gemini `generateContent` REST endpoint.
 * One POST per attempt with a bounded timeout; transient failures (timeout,
 * connection errors, 5xx) are retried a bounded number of times, 4xx answers
 * are surfaced immediately.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { createHttpClient } from '../../config/httpClient.js';
import { retryWithBackoff } from '../../utils/retry.js';
import {
  AiConfigurationError,
  AiServiceError,
  AiTimeoutError,
  AiTransportError,
  isAppError,
} from '../../types/errors.js';
import { getEnv } from '../../config/env.js';

const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';
const MAX_ERROR_BODY_LENGTH = 500;

export interface GeminiProviderConfig {
  apiKey?: string;
  defaultModel?: string;
  timeout?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  temperature?: number;
  maxOutputTokens?: number;
  baseURL?: string;
}

interface GeminiGenerateContentResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
    finishReason?: string;
  }>;
  promptFeedback?: {
    blockReason?: string;
  };
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
  modelVersion?: string;
}

interface GeminiRequestBody {
  contents: Array<{ role: 'user' | 'model'; parts: Array<{ text: string }> }>;
  generationConfig: {
    temperature: number;
    topP: number;
    topK: number;
    maxOutputTokens: number;
  };
}

export class GeminiProvider implements LLMProvider {
  private config: Required<Omit<GeminiProviderConfig, 'apiKey'>> & { apiKey?: string };
  private client: AxiosInstance | null = null;

  constructor(config?: GeminiProviderConfig) {
    const env = getEnv();

    this.config = {
      apiKey: env.GEMINI_API_KEY,
      defaultModel: env.GEMINI_MODEL,
      timeout: env.GEMINI_TIMEOUT,
      maxRetries: env.GEMINI_MAX_RETRIES,
      retryDelayMs: env.GEMINI_RETRY_DELAY_MS,
      temperature: env.GEMINI_TEMPERATURE,
      maxOutputTokens: env.GEMINI_MAX_OUTPUT_TOKENS,
      baseURL: GEMINI_BASE_URL,
      ...config,
    };
  }

  getName(): string {
    return 'gemini';
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }

  async generate(
    messages: LLMMessage[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new AiConfigurationError(['GEMINI_API_KEY']);
    }

    const client = this.getClient();
    const model = options?.model || this.config.defaultModel;
    const requestBody = this.buildRequestBody(messages, options);

    const data = await retryWithBackoff(
      () => this.postOnce(client, apiKey, model, requestBody),
      {
        maxAttempts: this.config.maxRetries,
        initialDelay: this.config.retryDelayMs,
      },
      `gemini:${model}`
    );

    const candidate = data.candidates?.[0];
    const content = (candidate?.content?.parts ?? [])
      .map(part => part.text ?? '')
      .join('')
      .trim();

    if (!content) {
      // Left to the caller's coercion step; an empty completion is not a transport failure
      logger.warn(
        {
          model,
          finishReason: candidate?.finishReason,
          blockReason: data.promptFeedback?.blockReason,
        },
        'Gemini returned no candidate text'
      );
    }

    const usageMetadata = data.usageMetadata;
    const usage = usageMetadata
      ? {
          promptTokens: usageMetadata.promptTokenCount || 0,
          completionTokens: usageMetadata.candidatesTokenCount || 0,
          totalTokens: usageMetadata.totalTokenCount || 0,
        }
      : undefined;

    return {
      content,
      model: data.modelVersion || model,
      usage,
    };
  }

  /**
   * Set HTTP client (for testing)
   */
  setClient(client: AxiosInstance): void {
    this.client = client;
  }

  private getClient(): AxiosInstance {
    if (!this.client) {
      this.client = createHttpClient({
        baseURL: this.config.baseURL,
        timeout: this.config.timeout,
        headers: {
          'Content-Type': 'application/json',
        },
      });
    }
    return this.client;
  }

  /**
   * Gemini has no system role in this API version: the system message is
   * prepended to the first user turn, assistant turns become `model` turns.
   */
  private buildRequestBody(messages: LLMMessage[], options?: LLMGenerateOptions): GeminiRequestBody {
    const systemText = messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');
    const turns = messages.filter(m => m.role !== 'system');

    const contents = turns.map((m, index) => {
      const text = index === 0 && systemText ? `${systemText}\n\n${m.content}` : m.content;
      return { role: m.role === 'assistant' ? 'model' as const : 'user' as const, parts: [{ text }] };
    });
    if (contents.length === 0 && systemText) {
      contents.push({ role: 'user', parts: [{ text: systemText }] });
    }

    return {
      contents,
      generationConfig: {
        temperature: options?.temperature ?? this.config.temperature,
        topP: 0.8,
        topK: 40,
        maxOutputTokens: options?.max_tokens ?? this.config.maxOutputTokens,
      },
    };
  }

  private async postOnce(
    client: AxiosInstance,
    apiKey: string,
    model: string,
    requestBody: GeminiRequestBody
  ): Promise<GeminiGenerateContentResponse> {
    try {
      const response = await client.post<GeminiGenerateContentResponse>(
        `/v1beta/models/${encodeURIComponent(model)}:generateContent`,
        requestBody,
        {
          timeout: this.config.timeout,
          headers: { 'x-goog-api-key': apiKey },
        }
      );
      return response.data ?? {};
    } catch (error) {
      throw this.toAiError(error, model);
    }
  }

  private toAiError(error: unknown, model: string): Error {
    if (isAppError(error)) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        const body = stringifyBody(error.response.data);
        logger.error({ model, status: error.response.status, body }, 'Gemini API returned an error status');
        return new AiServiceError(error.response.status, body);
      }

      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || /timeout/i.test(error.message)) {
        logger.error({ model, timeout: this.config.timeout }, 'Gemini API timeout');
        return new AiTimeoutError(this.config.timeout, { provider: 'gemini', model });
      }

      logger.error({ model, code: error.code, message: error.message }, 'Gemini API unreachable');
      return new AiTransportError(error.message, { provider: 'gemini', model, code: error.code });
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error({ model, message }, 'Error calling Gemini API');
    return new AiTransportError(message, { provider: 'gemini', model });
  }
}

function stringifyBody(data: unknown): string {
  let text: string;
  if (typeof data === 'string') {
    text = data;
  } else if (data === undefined || data === null) {
    text = '';
  } else {
    try {
      text = JSON.stringify(data);
    } catch {
      text = String(data);
    }
  }
  return text.length > MAX_ERROR_BODY_LENGTH ? `${text.slice(0, MAX_ERROR_BODY_LENGTH)}...` : text;
}
