import { setTimeout } from 'node:timers/promises';

import {
  type AppError,
  DownloadFailedError,
  FetchError,
} from '../../errors/app-error.js';
import { isAbortError } from '../../utils/error-utils.js';

import { logDebug, logWarn } from '../logger.js';

export type AttemptFailureKind =
  | 'network'
  | 'http'
  | 'content-mismatch'
  | 'write'
  | 'limit'
  | 'aborted';

export type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: AttemptFailureKind; error: AppError };

export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  delay?: DelayFn;
}

const NON_RETRYABLE: ReadonlySet<AttemptFailureKind> = new Set([
  'aborted',
  'limit',
]);

const MAX_ATTEMPTS_LIMIT = 10;

const defaultDelay: DelayFn = async (ms, signal) => {
  await setTimeout(ms, undefined, { signal });
};

export function isRetryable(kind: AttemptFailureKind): boolean {
  return !NON_RETRYABLE.has(kind);
}

/**
 * Runs attempts strictly one after another. Each attempt reports a typed
 * outcome; the policy decides whether to wait and try again or to stop.
 */
export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly delay: DelayFn;

  constructor(
    private readonly options: RetryPolicyOptions,
    private readonly url: string
  ) {
    this.maxAttempts = Math.min(
      Math.max(1, Math.floor(options.maxAttempts)),
      MAX_ATTEMPTS_LIMIT
    );
    this.delay = options.delay ?? defaultDelay;
  }

  get attempts(): number {
    return this.maxAttempts;
  }

  async execute<T>(
    attemptFn: (attempt: number) => Promise<AttemptOutcome<T>>,
    signal?: AbortSignal
  ): Promise<T> {
    let lastError: Error = new Error(`Failed to fetch ${this.url}`);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.throwIfAborted(signal, 'Request was aborted before execution');

      const outcome = await attemptFn(attempt);
      if (outcome.ok) return outcome.value;

      lastError = outcome.error;
      logWarn('Download attempt failed', {
        url: this.url,
        attempt,
        maxAttempts: this.maxAttempts,
        kind: outcome.kind,
        error: outcome.error.message,
      });

      if (!isRetryable(outcome.kind)) throw outcome.error;
      if (attempt >= this.maxAttempts) break;

      await this.wait(attempt, signal);
    }

    throw new DownloadFailedError(this.url, this.maxAttempts, lastError);
  }

  /** Delay before attempt `attempt + 1`: base × 2^(attempt-1), capped. */
  calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.options.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    return Math.min(exponentialDelay, this.options.maxDelayMs);
  }

  private async wait(attempt: number, signal?: AbortSignal): Promise<void> {
    const delay = this.calculateDelay(attempt);
    logDebug('Retrying download', {
      url: this.url,
      attempt: attempt + 1,
      delay: `${delay}ms`,
    });

    try {
      await this.delay(delay, signal);
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw this.createAbortError('Request was aborted during retry wait');
      }
      throw error;
    }
  }

  private throwIfAborted(signal: AbortSignal | undefined, message: string): void {
    if (!signal?.aborted) return;
    throw this.createAbortError(message);
  }

  private createAbortError(message: string): FetchError {
    return new FetchError(message, this.url, 499, { reason: 'aborted' });
  }
}
