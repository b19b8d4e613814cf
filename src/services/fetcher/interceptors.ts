import { randomUUID } from 'node:crypto';
import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';
import { Readable } from 'node:stream';

import type {
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';
import { isAxiosError, isCancel } from 'axios';

import { FetchError } from '../../errors/app-error.js';

import { logDebug, logWarn } from '../logger.js';

import { getContentLength, getContentType, toHeaderMap } from './headers.js';

const REQUEST_START_TIME = Symbol('requestStartTime');
const REQUEST_ID = Symbol('requestId');
const SLOW_RESPONSE_MS = 5000;

export const FETCH_CHANNEL_NAME = 'media-relay.fetch';
const fetchChannel = diagnosticsChannel.channel(FETCH_CHANNEL_NAME);

interface TimedAxiosRequestConfig extends InternalAxiosRequestConfig {
  [REQUEST_START_TIME]?: number;
  [REQUEST_ID]?: string;
}

function calculateDuration(config: TimedAxiosRequestConfig): number {
  const startTime = config[REQUEST_START_TIME];
  return startTime ? Math.round(performance.now() - startTime) : 0;
}

function publishErrorEvent(error: AxiosError): void {
  if (!fetchChannel.hasSubscribers) return;
  const timedConfig: TimedAxiosRequestConfig | undefined = error.config;

  fetchChannel.publish({
    type: 'error',
    requestId: timedConfig?.[REQUEST_ID],
    url: error.config?.url ?? 'unknown',
    error: error.message,
    code: error.code,
    status: error.response?.status,
    duration: timedConfig ? calculateDuration(timedConfig) : 0,
  });
}

function publishResponseEvent(
  requestId: string | undefined,
  status: number,
  duration: number
): void {
  if (!fetchChannel.hasSubscribers) return;
  fetchChannel.publish({
    type: 'end',
    requestId,
    status,
    duration,
  });
}

function logResponse(
  response: AxiosResponse,
  requestId: string | undefined,
  duration: number
): void {
  const headers = toHeaderMap(response.headers);
  const url = response.config.url ?? 'unknown';

  logDebug('HTTP Response', {
    requestId,
    method: response.config.method?.toUpperCase(),
    status: response.status,
    url,
    contentType: getContentType(headers),
    size: getContentLength(headers),
    duration: `${duration}ms`,
  });

  if (duration > SLOW_RESPONSE_MS) {
    logWarn('Slow HTTP response headers', {
      requestId,
      url,
      duration: `${duration}ms`,
    });
  }
}

function createCanceledError(url: string): FetchError {
  logDebug('HTTP Request Aborted/Canceled', { url });
  return new FetchError('Request was canceled', url, 499, {
    reason: 'aborted',
  });
}

function createTimeoutError(url: string, timeoutMs: number): FetchError {
  logDebug('HTTP Timeout', { url, timeout: timeoutMs });
  return new FetchError(`Request timeout after ${timeoutMs}ms`, url, 504, {
    timeout: timeoutMs,
  });
}

function createHttpError(
  url: string,
  status: number,
  statusText: string
): FetchError {
  logDebug('HTTP Error Response', { url, status, statusText });
  return new FetchError(`HTTP ${status}: ${statusText}`, url, status);
}

function createNetworkError(
  url: string,
  code: string | undefined,
  message: string
): FetchError {
  logDebug('HTTP Network Error', { url, code, message });
  return new FetchError(
    `Network error: Could not reach ${url}`,
    url,
    undefined,
    code ? { code, message } : { message }
  );
}

export function handleRequest(
  config: InternalAxiosRequestConfig
): InternalAxiosRequestConfig {
  const timedConfig: TimedAxiosRequestConfig = config;
  timedConfig[REQUEST_START_TIME] = performance.now();
  timedConfig[REQUEST_ID] = randomUUID().substring(0, 8);

  const eventData = {
    requestId: timedConfig[REQUEST_ID],
    method: config.method?.toUpperCase(),
    url: config.url,
  };

  if (fetchChannel.hasSubscribers) {
    fetchChannel.publish({ type: 'start', ...eventData });
  }

  logDebug('HTTP Request', eventData);

  return config;
}

export function handleResponse(response: AxiosResponse): AxiosResponse {
  const timedConfig: TimedAxiosRequestConfig = response.config;
  const duration = calculateDuration(timedConfig);
  const requestId = timedConfig[REQUEST_ID];

  timedConfig[REQUEST_START_TIME] = undefined;
  timedConfig[REQUEST_ID] = undefined;

  publishResponseEvent(requestId, response.status, duration);
  logResponse(response, requestId, duration);

  return response;
}

/**
 * Maps every axios failure onto a {@link FetchError}. Cancellation keeps
 * `reason: 'aborted'` so the retry policy can stop early.
 */
export function mapAxiosError(error: AxiosError): FetchError {
  const url = error.config?.url ?? 'unknown';

  if (
    isCancel(error) ||
    error.name === 'AbortError' ||
    error.name === 'CanceledError' ||
    error.code === 'ERR_CANCELED'
  ) {
    return createCanceledError(url);
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return createTimeoutError(url, error.config?.timeout ?? 0);
  }

  if (error.response) {
    const { status, statusText } = error.response;
    return createHttpError(url, status, statusText);
  }

  return createNetworkError(url, error.code, error.message);
}

/**
 * Destroys the unread body of a rejected stream response. Until it is
 * destroyed the keep-alive socket stays checked out of the agent.
 */
export function discardResponseBody(error: AxiosError): void {
  const body: unknown = error.response?.data;
  if (body instanceof Readable && !body.destroyed) body.destroy();
}

export function handleResponseError(error: unknown): Promise<never> {
  if (error instanceof FetchError) return Promise.reject(error);
  if (!isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return Promise.reject(new FetchError(message, 'unknown'));
  }

  discardResponseBody(error);
  publishErrorEvent(error);
  return Promise.reject(mapAxiosError(error));
}
