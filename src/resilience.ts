/**
 * Retry policy for the dispatcher: which outcomes are retried and how long
 * to wait between attempts.
 *
 * @module resilience
 */

import type { RetryConfig } from './config.js';
import { GitHubError, GitHubErrorKind } from './errors.js';
import type { Failure } from './outcome.js';

/**
 * Decision for a failed attempt.
 */
export type RetryDecision =
  | { retry: true; delayMs: number }
  | { retry: false; reason: string };

/**
 * Retry policy with capped exponential backoff
 */
export class RetryPolicy {
  private readonly config: RetryConfig;
  private readonly random: () => number;
  private readonly clock: () => number;

  constructor(
    config: RetryConfig,
    options: { random?: () => number; clock?: () => number } = {}
  ) {
    this.config = { ...config };
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Delay after the given failed attempt (1-based):
   * `initialBackoff * multiplier^(attempt-1)`, capped at `maxBackoff`,
   * plus up to `jitter` of itself.
   */
  backoff(attempt: number): number {
    const base = this.config.initialBackoff * Math.pow(this.config.multiplier, attempt - 1);
    const capped = Math.min(base, this.config.maxBackoff);
    const jitter = capped * this.config.jitter * this.random();
    return Math.round(capped + jitter);
  }

  /**
   * Decides whether the failed attempt is retried.
   */
  decide(failure: Failure, attempt: number, request: { idempotent: boolean }): RetryDecision {
    if (!this.config.enabled) {
      return { retry: false, reason: 'retries disabled' };
    }
    if (attempt >= this.config.maxAttempts) {
      return { retry: false, reason: 'attempts exhausted' };
    }

    const error = failure.error;
    if (!error.isRetryable() || error.kind === GitHubErrorKind.Aborted) {
      return { retry: false, reason: `${error.category} errors are not retried` };
    }
    if (!request.idempotent) {
      return { retry: false, reason: 'request is not idempotent' };
    }

    const delayMs = this.backoff(attempt);
    if (error.category !== 'rate_limited') {
      return { retry: true, delayMs };
    }

    const hintSeconds = error.retryAfter(new Date(this.clock()));
    if (hintSeconds === undefined) {
      return { retry: true, delayMs };
    }
    const hintMs = hintSeconds * 1000;
    if (hintMs > this.config.maxRateLimitWait) {
      return { retry: false, reason: `rate limit resets in ${hintSeconds}s` };
    }
    return { retry: true, delayMs: Math.max(hintMs, delayMs) };
  }
}

/**
 * Sleeps for `ms`, rejecting early with an `aborted` error when `signal`
 * fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new GitHubError(GitHubErrorKind.Aborted, 'Request aborted during backoff'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new GitHubError(GitHubErrorKind.Aborted, 'Request aborted during backoff'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
