/**
 * Error types for the GitHub client.
 * @module errors
 */

/**
 * Error kinds for categorizing GitHub errors.
 */
export enum GitHubErrorKind {
  // Configuration errors
  /** Invalid base URL. */
  InvalidBaseUrl = 'invalid_base_url',
  /** Invalid configuration. */
  InvalidConfiguration = 'invalid_configuration',
  /** Request object was already dispatched once. */
  RequestAlreadySent = 'request_already_sent',

  // Authentication errors
  /** Invalid GitHub App credentials (key cannot be parsed or used). */
  InvalidAppCredentials = 'invalid_app_credentials',
  /** Installation token exchange failed. */
  AppAuthenticationFailed = 'app_auth_failed',
  /** Bad credentials (401). */
  BadCredentials = 'bad_credentials',

  // Client errors
  /** Request validation failed (400). */
  ValidationError = 'validation_error',
  /** Access forbidden (403 without rate-limit headers). */
  Forbidden = 'forbidden',
  /** Resource not found (404). */
  NotFound = 'not_found',
  /** Resource conflict (409). */
  Conflict = 'conflict',
  /** Resource is gone (410). */
  Gone = 'gone',
  /** Unprocessable entity (422). */
  UnprocessableEntity = 'unprocessable_entity',
  /** Not modified (304) with nothing cached to answer from. */
  NotModified = 'not_modified',
  /** Redirect that the request did not opt into following. */
  UnexpectedRedirect = 'unexpected_redirect',
  /** Redirect chain longer than the allowed number of hops. */
  TooManyRedirects = 'too_many_redirects',
  /** GraphQL query returned errors. */
  QueryError = 'query_error',
  /** Any other 4xx. */
  ClientError = 'client_error',

  // Rate limit errors
  /** Primary rate limit exhausted (remaining = 0). */
  PrimaryRateLimitExceeded = 'primary_rate_limit_exceeded',
  /** Secondary rate limit (retry-after or 429). */
  SecondaryRateLimitExceeded = 'secondary_rate_limit_exceeded',

  // Network errors
  /** Connection failed. */
  ConnectionFailed = 'connection_failed',
  /** Request timeout. */
  Timeout = 'timeout',
  /** Request aborted by the caller. */
  Aborted = 'aborted',

  // Server errors
  /** Internal server error (500). */
  InternalError = 'internal_error',
  /** Bad gateway (502). */
  BadGateway = 'bad_gateway',
  /** Service unavailable (503). */
  ServiceUnavailable = 'service_unavailable',
  /** Gateway timeout (504). */
  GatewayTimeout = 'gateway_timeout',
  /** Any other 5xx. */
  ServerError = 'server_error',

  // Response errors
  /** Response body did not match the expected shape. */
  DeserializationError = 'deserialization_error',
  /** Response body was not valid JSON. */
  InvalidJson = 'invalid_json',
}

/**
 * Coarse classification used to decide what a caller can do about an error.
 */
export type ErrorCategory =
  | 'configuration'
  | 'auth'
  | 'transport'
  | 'rate_limited'
  | 'server'
  | 'client'
  | 'decode';

/**
 * Rate limit information attached to rate limit errors.
 */
export interface RateLimitHint {
  /** Maximum requests allowed. */
  limit?: number;
  /** Remaining requests in current window. */
  remaining?: number;
  /** Time when the rate limit resets. */
  resetAt?: Date;
  /** Retry-After header value in seconds (if present). */
  retryAfter?: number;
  /** Resource category. */
  resource?: string;
}

/**
 * Options accepted by the GitHubError constructor.
 */
export interface GitHubErrorOptions {
  statusCode?: number;
  requestId?: string;
  documentationUrl?: string;
  errors?: unknown[];
  rateLimit?: RateLimitHint;
  rawBody?: string;
  cause?: unknown;
}

const KIND_CATEGORY: Record<GitHubErrorKind, ErrorCategory> = {
  [GitHubErrorKind.InvalidBaseUrl]: 'configuration',
  [GitHubErrorKind.InvalidConfiguration]: 'configuration',
  [GitHubErrorKind.RequestAlreadySent]: 'configuration',
  [GitHubErrorKind.InvalidAppCredentials]: 'auth',
  [GitHubErrorKind.AppAuthenticationFailed]: 'auth',
  [GitHubErrorKind.BadCredentials]: 'auth',
  [GitHubErrorKind.ValidationError]: 'client',
  [GitHubErrorKind.Forbidden]: 'client',
  [GitHubErrorKind.NotFound]: 'client',
  [GitHubErrorKind.Conflict]: 'client',
  [GitHubErrorKind.Gone]: 'client',
  [GitHubErrorKind.UnprocessableEntity]: 'client',
  [GitHubErrorKind.NotModified]: 'client',
  [GitHubErrorKind.UnexpectedRedirect]: 'client',
  [GitHubErrorKind.TooManyRedirects]: 'client',
  [GitHubErrorKind.QueryError]: 'client',
  [GitHubErrorKind.ClientError]: 'client',
  [GitHubErrorKind.PrimaryRateLimitExceeded]: 'rate_limited',
  [GitHubErrorKind.SecondaryRateLimitExceeded]: 'rate_limited',
  [GitHubErrorKind.ConnectionFailed]: 'transport',
  [GitHubErrorKind.Timeout]: 'transport',
  [GitHubErrorKind.Aborted]: 'transport',
  [GitHubErrorKind.InternalError]: 'server',
  [GitHubErrorKind.BadGateway]: 'server',
  [GitHubErrorKind.ServiceUnavailable]: 'server',
  [GitHubErrorKind.GatewayTimeout]: 'server',
  [GitHubErrorKind.ServerError]: 'server',
  [GitHubErrorKind.DeserializationError]: 'decode',
  [GitHubErrorKind.InvalidJson]: 'decode',
};

/**
 * GitHub API error with detailed information.
 */
export class GitHubError extends Error {
  /** Error kind. */
  public readonly kind: GitHubErrorKind;
  /** Coarse category derived from the kind. */
  public readonly category: ErrorCategory;
  /** HTTP status code. */
  public readonly statusCode?: number;
  /** GitHub request ID. */
  public readonly requestId?: string;
  /** Documentation URL from the error envelope. */
  public readonly documentationUrl?: string;
  /** `errors` array from the error envelope. */
  public readonly errors?: unknown[];
  /** Rate limit info (if applicable). */
  public readonly rateLimit?: RateLimitHint;
  /** Raw response body, kept for diagnosing decode failures. */
  public readonly rawBody?: string;
  /** Underlying cause. */
  public readonly cause?: unknown;

  constructor(kind: GitHubErrorKind, message: string, options: GitHubErrorOptions = {}) {
    super(message);
    this.name = 'GitHubError';
    this.kind = kind;
    this.category = KIND_CATEGORY[kind];
    this.statusCode = options.statusCode;
    this.requestId = options.requestId;
    this.documentationUrl = options.documentationUrl;
    this.errors = options.errors;
    this.rateLimit = options.rateLimit;
    this.rawBody = options.rawBody;
    this.cause = options.cause;

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GitHubError);
    }
  }

  /**
   * Returns the retry-after duration in seconds.
   */
  retryAfter(now: Date = new Date()): number | undefined {
    if (this.rateLimit?.retryAfter !== undefined) {
      return this.rateLimit.retryAfter;
    }

    const resetAt = this.rateLimit?.resetAt;
    if (resetAt && resetAt > now) {
      return Math.ceil((resetAt.getTime() - now.getTime()) / 1000);
    }

    return undefined;
  }

  /**
   * Returns true if a retry may succeed without changing the request.
   */
  isRetryable(): boolean {
    return (
      this.category === 'transport' ||
      this.category === 'server' ||
      this.category === 'rate_limited'
    );
  }

  /**
   * Maps an HTTP status code to an error kind. Rate limiting is decided by
   * headers, so the caller passes it in.
   */
  static kindFromStatus(status: number, rateLimited = false): GitHubErrorKind {
    if (rateLimited) {
      return status === 403
        ? GitHubErrorKind.PrimaryRateLimitExceeded
        : GitHubErrorKind.SecondaryRateLimitExceeded;
    }

    switch (status) {
      case 304:
        return GitHubErrorKind.NotModified;
      case 400:
        return GitHubErrorKind.ValidationError;
      case 401:
        return GitHubErrorKind.BadCredentials;
      case 403:
        return GitHubErrorKind.Forbidden;
      case 404:
        return GitHubErrorKind.NotFound;
      case 409:
        return GitHubErrorKind.Conflict;
      case 410:
        return GitHubErrorKind.Gone;
      case 422:
        return GitHubErrorKind.UnprocessableEntity;
      case 429:
        return GitHubErrorKind.SecondaryRateLimitExceeded;
      case 500:
        return GitHubErrorKind.InternalError;
      case 502:
        return GitHubErrorKind.BadGateway;
      case 503:
        return GitHubErrorKind.ServiceUnavailable;
      case 504:
        return GitHubErrorKind.GatewayTimeout;
    }

    if (status >= 500) {
      return GitHubErrorKind.ServerError;
    }
    if (status >= 300 && status < 400) {
      return GitHubErrorKind.UnexpectedRedirect;
    }
    return GitHubErrorKind.ClientError;
  }

  // Convenience factory methods

  /**
   * Creates a configuration error.
   */
  static configuration(message: string, cause?: unknown): GitHubError {
    return new GitHubError(GitHubErrorKind.InvalidConfiguration, message, { cause });
  }

  /**
   * Creates a transport error from whatever `fetch` threw.
   */
  static transport(cause: unknown, kind = GitHubErrorKind.ConnectionFailed): GitHubError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new GitHubError(kind, `Transport failure: ${detail}`, { cause });
  }

  /**
   * Creates a decode error with the raw body attached.
   */
  static decode(
    message: string,
    rawBody: string,
    options: { statusCode?: number; requestId?: string; cause?: unknown; kind?: GitHubErrorKind } = {}
  ): GitHubError {
    return new GitHubError(options.kind ?? GitHubErrorKind.DeserializationError, message, {
      statusCode: options.statusCode,
      requestId: options.requestId,
      rawBody,
      cause: options.cause,
    });
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    if (this.documentationUrl) {
      result += `\nDocumentation URL: ${this.documentationUrl}`;
    }
    if (this.errors && this.errors.length > 0) {
      result += '\nErrors:';
      for (const error of this.errors) {
        result += `\n- ${JSON.stringify(error)}`;
      }
    }
    if (this.requestId) {
      result += `\n[request_id: ${this.requestId}]`;
    }
    return result;
  }
}
