import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { GeminiProvider } from '../../../src/server/services/llm/GeminiProvider.js';
import type { GeminiProviderConfig } from '../../../src/server/services/llm/GeminiProvider.js';
import { createHttpClient } from '../../../src/server/config/httpClient.js';
import {
  AiConfigurationError,
  AiServiceError,
  AiTimeoutError,
  AiTransportError,
} from '../../../src/server/types/errors.js';

type Step =
  | { status: number; data: unknown }
  | { networkError: string; code: string };

interface RecordedCall {
  url: string | undefined;
  apiKey: unknown;
  body: unknown;
}

/**
 * Axios adapter standing in for the Gemini endpoint: answers each request
 * with the next scripted step and records what was sent.
 */
function scriptedAdapter(steps: Step[]): { adapter: AxiosAdapter; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    calls.push({
      url: config.url,
      apiKey: config.headers.get('x-goog-api-key'),
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
    });

    const step = steps.shift();
    if (!step) {
      throw new Error('No scripted response left');
    }
    if ('networkError' in step) {
      throw new AxiosError(step.networkError, step.code, config);
    }

    const response: AxiosResponse = {
      data: step.data,
      status: step.status,
      statusText: String(step.status),
      headers: {},
      config,
    };
    if (step.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${step.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response
      );
    }
    return response;
  };
  return { adapter, calls };
}

function candidateReply(...texts: string[]) {
  return { status: 200, data: { candidates: [{ content: { parts: texts.map(text => ({ text })) } }] } };
}

function buildProvider(steps: Step[], overrides: GeminiProviderConfig = {}) {
  const { adapter, calls } = scriptedAdapter(steps);
  const config: GeminiProviderConfig = {
    apiKey: 'test-secret',
    defaultModel: 'gemini-test',
    timeout: 1000,
    maxRetries: 1,
    retryDelayMs: 0,
    temperature: 0.3,
    maxOutputTokens: 2048,
    ...overrides,
  };
  const provider = new GeminiProvider(config);
  provider.setClient(createHttpClient({ baseURL: 'https://gemini.test', adapter }));
  return { provider, calls };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('GeminiProvider', () => {
  it('sends one generateContent request with the key in a header', async () => {
    const { provider, calls } = buildProvider([
      {
        status: 200,
        data: {
          candidates: [{ content: { parts: [{ text: '{"a":' }, { text: '1}' }] } }],
          usageMetadata: { promptTokenCount: 5, candidatesTokenCount: 3, totalTokenCount: 8 },
          modelVersion: 'gemini-test-001',
        },
      },
    ]);

    const response = await provider.generate([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Hello' },
    ]);

    expect(response).toEqual({
      content: '{"a":1}',
      model: 'gemini-test-001',
      usage: { promptTokens: 5, completionTokens: 3, totalTokens: 8 },
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('/v1beta/models/gemini-test:generateContent');
    expect(calls[0].apiKey).toBe('test-secret');
    expect(calls[0].body).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'Be brief.\n\nHello' }] }],
      generationConfig: { temperature: 0.3, topP: 0.8, topK: 40, maxOutputTokens: 2048 },
    });
  });

  it('maps assistant turns to model turns and applies per-call options', async () => {
    const { provider, calls } = buildProvider([candidateReply('ok')]);

    const response = await provider.generate(
      [
        { role: 'user', content: 'Q1' },
        { role: 'assistant', content: 'A1' },
        { role: 'user', content: 'Q2' },
      ],
      { temperature: 0, max_tokens: 64, model: 'gemini-other' }
    );

    expect(response.model).toBe('gemini-other');
    expect(calls[0].url).toBe('/v1beta/models/gemini-other:generateContent');
    expect(calls[0].body).toEqual({
      contents: [
        { role: 'user', parts: [{ text: 'Q1' }] },
        { role: 'model', parts: [{ text: 'A1' }] },
        { role: 'user', parts: [{ text: 'Q2' }] },
      ],
      generationConfig: { temperature: 0, topP: 0.8, topK: 40, maxOutputTokens: 64 },
    });
  });

  it('returns empty content when no candidate text comes back', async () => {
    const { provider } = buildProvider([{ status: 200, data: { candidates: [] } }]);

    const response = await provider.generate([{ role: 'user', content: 'Hello' }]);

    expect(response.content).toBe('');
    expect(response.usage).toBeUndefined();
  });

  it('retries once after a 503 answer', async () => {
    const { provider, calls } = buildProvider([
      { status: 503, data: { error: { message: 'overloaded' } } },
      candidateReply('recovered'),
    ]);

    const response = await provider.generate([{ role: 'user', content: 'Hello' }]);

    expect(response.content).toBe('recovered');
    expect(calls).toHaveLength(2);
  });

  it('surfaces a timeout after the retry is spent', async () => {
    const { provider, calls } = buildProvider([
      { networkError: 'timeout of 1000ms exceeded', code: 'ECONNABORTED' },
      { networkError: 'timeout of 1000ms exceeded', code: 'ECONNABORTED' },
    ]);

    const error = await captureError(provider.generate([{ role: 'user', content: 'Hello' }]));

    expect(error).toBeInstanceOf(AiTimeoutError);
    expect(calls).toHaveLength(2);
    if (error instanceof AiTimeoutError) {
      expect(error.statusCode).toBe(504);
      expect(error.message).toBe('AI service did not respond within 1000ms');
    }
  });

  it('reports connection failures as transport errors', async () => {
    const { provider, calls } = buildProvider(
      [{ networkError: 'connect ECONNREFUSED 127.0.0.1:443', code: 'ECONNREFUSED' }],
      { maxRetries: 0 }
    );

    const error = await captureError(provider.generate([{ role: 'user', content: 'Hello' }]));

    expect(error).toBeInstanceOf(AiTransportError);
    expect(calls).toHaveLength(1);
    if (error instanceof AiTransportError) {
      expect(error.message).toBe('AI service unreachable: connect ECONNREFUSED 127.0.0.1:443');
      expect(error.statusCode).toBe(503);
    }
  });

  it.each([
    { status: 400, body: { error: { status: 'INVALID_ARGUMENT' } }, category: 'bad_request', httpStatus: 502 },
    {
      status: 400,
      body: { error: { details: [{ reason: 'API_KEY_INVALID' }] } },
      category: 'authentication',
      httpStatus: 502,
    },
    { status: 401, body: 'unauthorized', category: 'authentication', httpStatus: 502 },
    { status: 403, body: 'forbidden', category: 'authentication', httpStatus: 502 },
    { status: 429, body: 'quota', category: 'rate_limited', httpStatus: 429 },
  ])('does not retry a $status answer ($category)', async ({ status, body, category, httpStatus }) => {
    const { provider, calls } = buildProvider([{ status, data: body }]);

    const error = await captureError(provider.generate([{ role: 'user', content: 'Hello' }]));

    expect(error).toBeInstanceOf(AiServiceError);
    expect(calls).toHaveLength(1);
    if (error instanceof AiServiceError) {
      expect(error.status).toBe(status);
      expect(error.category).toBe(category);
      expect(error.statusCode).toBe(httpStatus);
    }
  });

  it('truncates long error bodies', async () => {
    const { provider } = buildProvider([{ status: 400, data: 'e'.repeat(800) }]);

    const error = await captureError(provider.generate([{ role: 'user', content: 'Hello' }]));

    expect(error).toBeInstanceOf(AiServiceError);
    if (error instanceof AiServiceError) {
      expect(error.body).toBe(`${'e'.repeat(500)}...`);
    }
  });

  it('refuses to call the service without an API key', async () => {
    const { provider, calls } = buildProvider([candidateReply('unused')], { apiKey: undefined });

    await expect(provider.isAvailable()).resolves.toBe(false);
    await expect(provider.generate([{ role: 'user', content: 'Hello' }])).rejects.toBeInstanceOf(AiConfigurationError);
    expect(calls).toHaveLength(0);
  });

  it('reports its name', () => {
    const { provider } = buildProvider([]);

    expect(provider.getName()).toBe('gemini');
  });
});
