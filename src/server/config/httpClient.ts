/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances.
 */

import axios, { AxiosInstance, CreateAxiosDefaults, InternalAxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - quick API calls
  STANDARD: 30000,  // 30 seconds - standard operations
  LONG: 120000,     // 2 minutes - long-running operations
} as const;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

// Request start times, keyed by the request config axios hands back on completion
const requestStartTimes = new WeakMap<InternalAxiosRequestConfig, number>();

function logCompletion(config: InternalAxiosRequestConfig | undefined, status: number | undefined): void {
  if (!config) return;
  const startTime = requestStartTimes.get(config);
  if (startTime === undefined) return;
  requestStartTimes.delete(config);

  const duration = Date.now() - startTime;
  const timeout = config.timeout || HTTP_TIMEOUTS.STANDARD;
  const percentageUsed = (duration / timeout) * 100;
  if (percentageUsed > 80) {
    logger.warn(
      { baseURL: config.baseURL, method: config.method, status, duration, timeout, percentageUsed },
      'HTTP request came close to its timeout'
    );
  } else {
    logger.debug({ baseURL: config.baseURL, method: config.method, status, duration }, 'HTTP request completed');
  }
}

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 * @returns Configured axios instance
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    // If no timeout is set, use the default STANDARD timeout
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
      logger.debug(
        { method: requestConfig.method },
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }
    requestStartTimes.set(requestConfig, Date.now());
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      logCompletion(response.config, response.status);
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        logCompletion(error.config, error.response?.status);
      }
      return Promise.reject(error);
    }
  );

  return client;
}
