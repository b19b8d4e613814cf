import { createWriteStream } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { type AxiosInstance, isAxiosError } from 'axios';

import { config } from '../config/index.js';

import {
  AppError,
  ContentMismatchError,
  FetchError,
} from '../errors/app-error.js';

import { isAbortError, isSystemError } from '../utils/error-utils.js';
import { validateMediaUrl } from '../utils/url-validator.js';

import {
  getContentLength,
  getContentType,
  type HeaderMap,
  toHeaderMap,
} from './fetcher/headers.js';
import { createHttpClient } from './fetcher/http-client.js';
import { discardResponseBody, mapAxiosError } from './fetcher/interceptors.js';
import {
  assertContentLengthWithinLimit,
  ByteCounter,
  isMediaContentType,
  readSample,
} from './fetcher/response.js';
import {
  type AttemptOutcome,
  type DelayFn,
  RetryPolicy,
  type RetryPolicyOptions,
} from './fetcher/retry-policy.js';
import { createScratchPath, removeScratchFile } from './fetcher/scratch.js';
import { logDebug, logWarn } from './logger.js';

export type MediaKind = 'video' | 'photo';

const SUFFIX_BY_KIND: Readonly<Record<MediaKind, string>> = {
  video: '.mp4',
  photo: '.jpg',
};

export function suffixForKind(kind: MediaKind): string {
  return SUFFIX_BY_KIND[kind];
}

export interface FetchResult {
  /** Owned by the caller until released. */
  localPath: string;
  bytes: number;
  contentType?: string;
  attempts: number;
}

export interface FetchCallOptions {
  signal?: AbortSignal;
  /** Overrides the configured probe switch for this call. */
  probe?: boolean;
}

export interface FetcherOptions {
  client?: AxiosInstance;
  scratchDir?: string;
  probeEnabled?: boolean;
  probeTimeoutMs?: number;
  timeoutMs?: number;
  maxBytes?: number;
  chunkSize?: number;
  sampleBytes?: number;
  retry?: Partial<RetryPolicyOptions>;
  delay?: DelayFn;
}

interface FetcherSettings {
  scratchDir: string;
  probeEnabled: boolean;
  probeTimeoutMs: number;
  timeoutMs: number;
  maxBytes: number;
  chunkSize: number;
  sampleBytes: number;
}

interface StreamedFile {
  localPath: string;
  bytes: number;
  contentType?: string;
}

type AttemptFailure = Extract<AttemptOutcome<never>, { ok: false }>;

const WRITE_ERROR_CODES = new Set([
  'EACCES',
  'EDQUOT',
  'EEXIST',
  'EISDIR',
  'EMFILE',
  'ENOENT',
  'ENOSPC',
  'ENOTDIR',
  'EPERM',
  'EROFS',
]);

function createAbortedError(url: string): FetchError {
  return new FetchError('Request was canceled', url, 499, {
    reason: 'aborted',
  });
}

export class Fetcher {
  private readonly client: AxiosInstance;
  private readonly settings: FetcherSettings;
  private readonly retryOptions: RetryPolicyOptions;

  constructor(options: FetcherOptions = {}) {
    this.client = options.client ?? createHttpClient();
    this.settings = {
      scratchDir: options.scratchDir ?? config.fetcher.scratchDir,
      probeEnabled: options.probeEnabled ?? config.fetcher.probeEnabled,
      probeTimeoutMs: options.probeTimeoutMs ?? config.fetcher.probeTimeoutMs,
      timeoutMs: options.timeoutMs ?? config.fetcher.timeoutMs,
      maxBytes: options.maxBytes ?? config.fetcher.maxBytes,
      chunkSize: options.chunkSize ?? config.fetcher.chunkSize,
      sampleBytes: options.sampleBytes ?? config.fetcher.sampleBytes,
    };
    this.retryOptions = {
      maxAttempts: options.retry?.maxAttempts ?? config.fetcher.maxAttempts,
      baseDelayMs: options.retry?.baseDelayMs ?? config.fetcher.backoffBaseMs,
      maxDelayMs: options.retry?.maxDelayMs ?? config.fetcher.backoffMaxMs,
      delay: options.delay ?? options.retry?.delay,
    };
  }

  /**
   * Advisory metadata lookup: HEAD first, a header-only GET when HEAD is
   * rejected, and an empty map on any failure except cancellation.
   */
  async probe(url: string, signal?: AbortSignal): Promise<HeaderMap> {
    const requestConfig = {
      timeout: this.settings.probeTimeoutMs,
      signal,
      validateStatus: (): boolean => true,
    };

    try {
      const head = await this.client.head<unknown>(url, requestConfig);
      if (head.status < 400) return toHeaderMap(head.headers);

      logDebug('HEAD rejected, probing with GET', {
        url,
        status: head.status,
      });
      const response = await this.client.get<unknown>(url, {
        ...requestConfig,
        responseType: 'stream',
      });
      if (response.data instanceof Readable) response.data.destroy();
      return toHeaderMap(response.headers);
    } catch (error) {
      if (signal?.aborted) throw createAbortedError(url);
      logDebug('Probe failed, continuing without headers', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  /**
   * Streams `url` into a fresh scratch file named with `suffix`. Failed
   * attempts leave nothing on disk; the returned file belongs to the caller.
   */
  async fetch(
    url: string,
    suffix: string,
    options: FetchCallOptions = {}
  ): Promise<FetchResult> {
    const normalizedUrl = validateMediaUrl(url);
    const { signal } = options;

    if (options.probe ?? this.settings.probeEnabled) {
      const headers = await this.probe(normalizedUrl, signal);
      this.reportProbe(normalizedUrl, headers);
    }

    const policy = new RetryPolicy(this.retryOptions, normalizedUrl);
    return policy.execute(
      async (attempt): Promise<AttemptOutcome<FetchResult>> => {
        const outcome = await this.runAttempt(normalizedUrl, suffix, signal);
        if (!outcome.ok) return outcome;
        return { ok: true, value: { ...outcome.value, attempts: attempt } };
      },
      signal
    );
  }

  private reportProbe(url: string, headers: HeaderMap): void {
    const contentType = getContentType(headers);
    if (contentType !== undefined && !isMediaContentType(contentType)) {
      logWarn('Probe reported unexpected content-type, downloading anyway', {
        url,
        contentType,
      });
      return;
    }

    logDebug('Probe result', {
      url,
      contentType,
      contentLength: getContentLength(headers),
    });
  }

  private async runAttempt(
    url: string,
    suffix: string,
    signal?: AbortSignal
  ): Promise<AttemptOutcome<StreamedFile>> {
    const localPath = createScratchPath(this.settings.scratchDir, suffix);

    try {
      const file = await this.streamToFile(url, localPath, signal);
      return { ok: true, value: file };
    } catch (error) {
      await removeScratchFile(localPath);
      return this.classifyFailure(error, url, signal);
    }
  }

  private async streamToFile(
    url: string,
    localPath: string,
    signal?: AbortSignal
  ): Promise<StreamedFile> {
    const response = await this.client.get<unknown>(url, {
      responseType: 'stream',
      timeout: this.settings.timeoutMs,
      signal,
    });

    const body = response.data;
    if (!(body instanceof Readable)) {
      throw new FetchError('Response body is not a stream', url);
    }

    const headers = toHeaderMap(response.headers);
    const contentType = getContentType(headers);

    if (contentType !== undefined && !isMediaContentType(contentType)) {
      const sample = await readSample(body, this.settings.sampleBytes);
      throw new ContentMismatchError(url, contentType, sample);
    }

    try {
      assertContentLengthWithinLimit(
        getContentLength(headers),
        url,
        this.settings.maxBytes
      );
    } catch (error) {
      body.destroy();
      throw error;
    }

    const counter = new ByteCounter(url, this.settings.maxBytes);
    await pipeline(
      body,
      counter,
      createWriteStream(localPath, {
        flags: 'wx',
        highWaterMark: this.settings.chunkSize,
      }),
      { signal }
    );

    return { localPath, bytes: counter.bytes, contentType };
  }

  private classifyFailure(
    error: unknown,
    url: string,
    signal?: AbortSignal
  ): AttemptFailure {
    if (signal?.aborted) {
      const aborted =
        error instanceof FetchError && error.aborted
          ? error
          : createAbortedError(url);
      return { ok: false, kind: 'aborted', error: aborted };
    }

    if (isAxiosError(error)) {
      discardResponseBody(error);
      return this.classifyFailure(mapAxiosError(error), url, signal);
    }

    if (error instanceof ContentMismatchError) {
      return { ok: false, kind: 'content-mismatch', error };
    }

    if (error instanceof FetchError) {
      if (error.details.reason === 'too-large') {
        return { ok: false, kind: 'limit', error };
      }
      if (error.aborted) return { ok: false, kind: 'aborted', error };
      const isStatusError =
        error.httpStatus !== undefined && error.details.timeout === undefined;
      return { ok: false, kind: isStatusError ? 'http' : 'network', error };
    }

    if (error instanceof AppError) {
      return { ok: false, kind: 'network', error };
    }

    if (isAbortError(error)) {
      return { ok: false, kind: 'aborted', error: createAbortedError(url) };
    }

    if (isSystemError(error) && WRITE_ERROR_CODES.has(error.code ?? '')) {
      return {
        ok: false,
        kind: 'write',
        error: new FetchError(
          `Failed to write download: ${error.message}`,
          url,
          undefined,
          { code: error.code }
        ),
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      kind: 'network',
      error: new FetchError(`Network error: ${message}`, url, undefined, {
        ...(isSystemError(error) && { code: error.code }),
        message,
      }),
    };
  }
}

export async function releaseFetchResult(
  result: FetchResult
): Promise<boolean> {
  return removeScratchFile(result.localPath);
}
