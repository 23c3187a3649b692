/**
 * Request dispatch: authentication, transport, classification and retries.
 *
 * A call to {@link Dispatcher.send} runs one or more attempts. Each attempt
 * derives a fresh Authorization header, sends the request and classifies
 * the response into an {@link Outcome}. Transport, server and rate limit
 * failures are retried according to the {@link RetryPolicy}.
 *
 * @module dispatcher
 */

import type { AuthManager } from './auth.js';
import { cacheKeyFrom, conditionalHeader, type HttpCache } from './cache.js';
import type { RetryConfig } from './config.js';
import { decodeBody, decodeErrorEnvelope, type Decoder } from './decode.js';
import { GitHubError, GitHubErrorKind } from './errors.js';
import type { Logger } from './logging.js';
import { NoopLogger } from './logging.js';
import { failure, success, type Failure, type Outcome } from './outcome.js';
import { isRateLimited, rateLimitHint, type RateLimitTracker } from './rate-limit.js';
import type { GitHubRequest, HttpMethod } from './request.js';
import { RetryPolicy, sleep as defaultSleep } from './resilience.js';
import type { HttpTransport, TransportResponse } from './transport.js';

/** Redirect hops followed for a request that opts in. */
export const MAX_REDIRECTS = 5;

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/**
 * Dispatcher collaborators.
 */
export interface DispatcherOptions {
  transport: HttpTransport;
  auth: AuthManager;
  retry: RetryConfig;
  /** Default per-attempt timeout in milliseconds. */
  timeout: number;
  rateLimits: RateLimitTracker;
  cache?: HttpCache;
  logger?: Logger;
  /** Backoff sleep; replaced in tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Jitter source. */
  random?: () => number;
  /** Clock in epoch milliseconds, used for rate limit reset hints. */
  clock?: () => number;
}

/**
 * Sends built requests and classifies the responses.
 */
export class Dispatcher {
  private readonly transport: HttpTransport;
  private readonly auth: AuthManager;
  private readonly policy: RetryPolicy;
  private readonly timeout: number;
  private readonly rateLimits: RateLimitTracker;
  private readonly cache?: HttpCache;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly dispatched: WeakSet<GitHubRequest> = new WeakSet();

  constructor(options: DispatcherOptions) {
    this.transport = options.transport;
    this.auth = options.auth;
    this.policy = new RetryPolicy(options.retry, {
      random: options.random,
      clock: options.clock,
    });
    this.timeout = options.timeout;
    this.rateLimits = options.rateLimits;
    this.cache = options.cache;
    this.logger = options.logger ?? new NoopLogger();
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Sends `request` and decodes a 2xx body with `decoder`.
   *
   * HTTP, transport, auth and decode failures are returned as failure
   * outcomes. Sending the same request object twice throws a
   * `request_already_sent` error.
   */
  async send<T>(request: GitHubRequest, decoder: Decoder<T>): Promise<Outcome<T>> {
    if (this.dispatched.has(request)) {
      throw new GitHubError(
        GitHubErrorKind.RequestAlreadySent,
        `Request ${request.method} ${request.url} was already sent; build a new one`
      );
    }
    this.dispatched.add(request);

    let attempt = 0;
    for (;;) {
      attempt++;
      const outcome = await this.attempt(request, decoder, attempt);
      if (outcome.type === 'success') {
        return outcome;
      }

      const decision = this.policy.decide(outcome, attempt, request);
      if (!decision.retry) {
        this.logger.debug('Request failed', {
          method: request.method,
          url: request.url,
          attempt,
          kind: outcome.error.kind,
          status: outcome.error.statusCode,
          reason: decision.reason,
        });
        return outcome;
      }

      this.logger.warn('Retrying request', {
        method: request.method,
        url: request.url,
        attempt,
        delayMs: decision.delayMs,
        kind: outcome.error.kind,
        status: outcome.error.statusCode,
      });

      try {
        await this.sleep(decision.delayMs, request.signal);
      } catch (error) {
        if (error instanceof GitHubError) {
          return failure('transport_error', error);
        }
        throw error;
      }
    }
  }

  /**
   * One attempt, following redirects when the request opts in.
   */
  private async attempt<T>(
    request: GitHubRequest,
    decoder: Decoder<T>,
    attempt: number
  ): Promise<Outcome<T>> {
    let method: HttpMethod = request.method;
    let url = request.url;
    let body = request.body;
    let baseHeaders = request.headers;

    for (let hop = 0; ; hop++) {
      let authorization: string | undefined;
      try {
        authorization = await this.auth.authorizationFor(url, request.credential);
      } catch (error) {
        return failure('auth_error', asAuthError(error));
      }

      const headers: Array<[string, string]> = baseHeaders.map(([name, value]) => [name, value]);
      if (authorization !== undefined) {
        headers.push(['Authorization', authorization]);
      }

      const cache = method === 'GET' ? this.cache : undefined;
      const validator = cache?.lookup(url);
      if (validator) {
        headers.push(conditionalHeader(validator));
      }

      this.logger.debug('Sending request', { method, url, attempt, hop });

      let response: TransportResponse;
      try {
        response = await this.transport.send({
          method,
          url,
          headers,
          body,
          signal: request.signal,
          timeout: request.timeout ?? this.timeout,
        });
      } catch (error) {
        return failure(
          'transport_error',
          error instanceof GitHubError ? error : GitHubError.transport(error)
        );
      }

      this.rateLimits.record(response.headers);
      this.logger.debug('Received response', {
        method,
        url,
        status: response.status,
        requestId: response.headers.get('x-github-request-id') ?? undefined,
      });

      let fromCache = false;
      if (response.status === 304 && cache && validator) {
        const stored = cache.load(url);
        if (stored) {
          response = { status: 200, headers: new Headers([...stored.headers]), body: stored.body };
          fromCache = true;
        }
      }

      if (request.followRedirects && REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get('location');
        if (location) {
          if (hop >= MAX_REDIRECTS) {
            return failure(
              'github_error',
              new GitHubError(
                GitHubErrorKind.TooManyRedirects,
                `Exceeded ${MAX_REDIRECTS} redirects starting at ${request.url}`,
                { statusCode: response.status }
              )
            );
          }
          url = new URL(location, url).toString();
          if (
            response.status === 303 ||
            ((response.status === 301 || response.status === 302) && method === 'POST')
          ) {
            method = 'GET';
            body = undefined;
            baseHeaders = baseHeaders.filter(([name]) => !isBodyHeader(name));
          }
          continue;
        }
      }

      if (response.status >= 200 && response.status < 300) {
        if (cache && !fromCache) {
          const key = cacheKeyFrom(response.headers);
          if (key) {
            cache.store(url, key, { body: response.body, headers: [...response.headers] });
          }
        }
        const decoded = decodeBody(response, decoder);
        return decoded.ok
          ? success(decoded.value, response.status, response.headers)
          : failure('decode_error', decoded.error);
      }

      return errorOutcome(response);
    }
  }
}

function isBodyHeader(name: string): boolean {
  const lower = name.toLowerCase();
  return lower === 'content-type' || lower === 'content-length';
}

function asAuthError(error: unknown): GitHubError {
  if (error instanceof GitHubError) {
    return error;
  }
  return new GitHubError(
    GitHubErrorKind.AppAuthenticationFailed,
    `Failed to derive credentials: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error }
  );
}

/**
 * Classifies a non-2xx response.
 */
export function errorOutcome(response: TransportResponse): Failure {
  const rateLimited = isRateLimited(response.status, response.headers);
  const envelope = decodeErrorEnvelope(response.status, response.body);
  const error = new GitHubError(
    GitHubError.kindFromStatus(response.status, rateLimited),
    envelope.message,
    {
      statusCode: response.status,
      requestId: response.headers.get('x-github-request-id') ?? undefined,
      documentationUrl: envelope.documentationUrl,
      errors: envelope.errors,
      rateLimit: rateLimited ? rateLimitHint(response.headers) : undefined,
      rawBody: envelope.raw,
    }
  );
  return failure('github_error', error);
}
