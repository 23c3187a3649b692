/**
 * Configuration types for the GitHub client.
 * @module config
 */

import { z } from 'zod';
import { Credential, credentialFromEnv } from './auth.js';
import type { HttpCache } from './cache.js';
import { GitHubError, GitHubErrorKind } from './errors.js';
import type { Logger } from './logging.js';
import { NoopLogger } from './logging.js';
import { DEFAULT_TOKEN_SAFETY_MARGIN } from './token-cache.js';

/** Default GitHub API base URL. */
export const DEFAULT_BASE_URL = 'https://api.github.com';

/** Default GitHub API version (date-based). */
export const DEFAULT_API_VERSION = '2022-11-28';

/** Default Accept header. */
export const DEFAULT_ACCEPT = 'application/vnd.github+json';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'github-dispatch/0.1.0';

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Enable retries. */
  enabled: boolean;
  /** Maximum attempts, the first one included. */
  maxAttempts: number;
  /** Initial backoff delay in milliseconds. */
  initialBackoff: number;
  /** Maximum backoff delay in milliseconds. */
  maxBackoff: number;
  /** Backoff multiplier. */
  multiplier: number;
  /** Jitter factor (0.0 to 1.0), added on top of the computed delay. */
  jitter: number;
  /** Longest server-requested rate limit wait that is still retried, in milliseconds. */
  maxRateLimitWait: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  enabled: true,
  maxAttempts: 3,
  initialBackoff: 1000,
  maxBackoff: 60000,
  multiplier: 2.0,
  jitter: 0.1,
  maxRateLimitWait: 60000,
};

/**
 * GitHub client configuration.
 */
export interface GitHubConfig {
  /** API base URL; its authority is the only one that receives credentials. */
  baseUrl: string;
  /** GraphQL endpoint; defaults to `<baseUrl>/graphql`. */
  graphqlUrl?: string;
  /** API version header. */
  apiVersion: string;
  /** Credential. */
  credential: Credential;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** User-Agent header. */
  userAgent: string;
  /** Default Accept header. */
  accept: string;
  /** Retry configuration. */
  retry: RetryConfig;
  /** Installation tokens are renewed this many milliseconds before expiry. */
  tokenSafetyMargin: number;
  /** Optional conditional-request cache. */
  cache?: HttpCache;
  /** Logger. */
  logger: Logger;
  /** `fetch` implementation; defaults to the global one. */
  fetch?: typeof fetch;
}

const httpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), {
    message: 'must start with http:// or https://',
  });

const configSchema = z.object({
  baseUrl: httpUrlSchema,
  graphqlUrl: httpUrlSchema.optional(),
  apiVersion: z.string().min(1),
  userAgent: z.string().trim().min(1, 'User-Agent is required by GitHub API'),
  accept: z.string().min(1),
  timeout: z.number().int().positive(),
  tokenSafetyMargin: z.number().int().nonnegative(),
  retry: z.object({
    enabled: z.boolean(),
    maxAttempts: z.number().int().min(1),
    initialBackoff: z.number().nonnegative(),
    maxBackoff: z.number().nonnegative(),
    multiplier: z.number().min(1),
    jitter: z.number().min(0).max(1),
    maxRateLimitWait: z.number().nonnegative(),
  }),
});

/**
 * Creates a default GitHub configuration.
 */
export function createDefaultConfig(): GitHubConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    apiVersion: DEFAULT_API_VERSION,
    credential: Credential.none(),
    timeout: DEFAULT_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
    accept: DEFAULT_ACCEPT,
    retry: { ...DEFAULT_RETRY_CONFIG },
    tokenSafetyMargin: DEFAULT_TOKEN_SAFETY_MARGIN,
    logger: new NoopLogger(),
  };
}

/**
 * Validates a GitHub configuration.
 * @throws {GitHubError} If the configuration is invalid.
 */
export function validateConfig(config: GitHubConfig): void {
  const result = configSchema.safeParse(config);
  if (result.success) {
    return;
  }

  const issue = result.error.issues[0];
  const field = issue.path.join('.');
  const kind =
    field === 'baseUrl' || field === 'graphqlUrl'
      ? GitHubErrorKind.InvalidBaseUrl
      : GitHubErrorKind.InvalidConfiguration;
  throw new GitHubError(kind, `Invalid configuration: ${field}: ${issue.message}`, {
    cause: result.error,
  });
}

const envSchema = z.object({
  GITHUB_API_URL: z.string().optional(),
  GITHUB_GRAPHQL_URL: z.string().optional(),
  GITHUB_API_VERSION: z.string().optional(),
  GITHUB_USER_AGENT: z.string().optional(),
  GITHUB_TIMEOUT: z.coerce.number().optional(),
  GITHUB_MAX_RETRIES: z.coerce.number().optional(),
});

/**
 * Creates a configuration from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): GitHubConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw GitHubError.configuration('Invalid GitHub environment configuration', parsed.error);
  }
  const vars = parsed.data;
  const builder = new GitHubConfigBuilder().credential(credentialFromEnv(env));

  if (vars.GITHUB_API_URL) builder.baseUrl(vars.GITHUB_API_URL);
  if (vars.GITHUB_GRAPHQL_URL) builder.graphqlUrl(vars.GITHUB_GRAPHQL_URL);
  if (vars.GITHUB_API_VERSION) builder.apiVersion(vars.GITHUB_API_VERSION);
  if (vars.GITHUB_USER_AGENT) builder.userAgent(vars.GITHUB_USER_AGENT);
  if (vars.GITHUB_TIMEOUT !== undefined) builder.timeout(vars.GITHUB_TIMEOUT);
  if (vars.GITHUB_MAX_RETRIES !== undefined) {
    builder.retry({ ...DEFAULT_RETRY_CONFIG, maxAttempts: vars.GITHUB_MAX_RETRIES + 1 });
  }

  return builder.build();
}

/**
 * Builder for GitHubConfig.
 */
export class GitHubConfigBuilder {
  private config: GitHubConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the base URL.
   */
  baseUrl(url: string): this {
    this.config.baseUrl = url;
    return this;
  }

  /**
   * Sets the GraphQL endpoint.
   */
  graphqlUrl(url: string): this {
    this.config.graphqlUrl = url;
    return this;
  }

  /**
   * Sets the API version.
   */
  apiVersion(version: string): this {
    this.config.apiVersion = version;
    return this;
  }

  /**
   * Sets the credential.
   */
  credential(credential: Credential): this {
    this.config.credential = credential;
    return this;
  }

  /**
   * Shorthand for a bearer token credential.
   */
  personalToken(token: string): this {
    return this.credential(Credential.bearer(token));
  }

  /**
   * Shorthand for a GitHub App credential.
   */
  app(appId: number, privateKey: string): this {
    return this.credential(Credential.app(appId, privateKey));
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Sets the default Accept header.
   */
  accept(accept: string): this {
    this.config.accept = accept;
    return this;
  }

  /**
   * Sets the retry configuration.
   */
  retry(config: Partial<RetryConfig>): this {
    this.config.retry = { ...this.config.retry, ...config };
    return this;
  }

  /**
   * Disables retries.
   */
  noRetry(): this {
    this.config.retry = { ...this.config.retry, enabled: false };
    return this;
  }

  /**
   * Sets the installation token safety margin in milliseconds.
   */
  tokenSafetyMargin(ms: number): this {
    this.config.tokenSafetyMargin = ms;
    return this;
  }

  /**
   * Enables the conditional-request cache.
   */
  cache(cache: HttpCache): this {
    this.config.cache = cache;
    return this;
  }

  /**
   * Sets the logger.
   */
  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /**
   * Sets the `fetch` implementation.
   */
  fetch(fetchImpl: typeof fetch): this {
    this.config.fetch = fetchImpl;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {GitHubError} If the configuration is invalid.
   */
  build(): GitHubConfig {
    validateConfig(this.config);
    return { ...this.config, retry: { ...this.config.retry } };
  }
}

/**
 * Namespace for GitHubConfig-related utilities.
 */
export namespace GitHubConfig {
  /**
   * Creates a new configuration builder.
   */
  export function builder(): GitHubConfigBuilder {
    return new GitHubConfigBuilder();
  }

  /**
   * Creates a default configuration.
   */
  export function defaultConfig(): GitHubConfig {
    return createDefaultConfig();
  }

  /**
   * Validates a configuration.
   */
  export function validate(config: GitHubConfig): void {
    validateConfig(config);
  }
}
