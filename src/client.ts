/**
 * GitHub API Client
 *
 * Facade over the dispatch engine:
 * - Credential derivation, including GitHub App installation tokens
 * - Link header pagination
 * - Rate limit tracking
 * - Retry with exponential backoff
 *
 * @module client
 */

import {
  AuthManager,
  Credential,
  type AppCredential,
  type InstallationTokenExchange,
} from './auth.js';
import { configFromEnv, validateConfig, type GitHubConfig } from './config.js';
import { bytes, type Decoder } from './decode.js';
import { Dispatcher } from './dispatcher.js';
import { GitHubError } from './errors.js';
import { GraphQLClient } from './graphql.js';
import { unwrap, type Outcome } from './outcome.js';
import { Paginator, type Page, type PageOptions } from './pagination.js';
import { RateLimitTracker, type RateLimitInfo } from './rate-limit.js';
import {
  RequestBuilder,
  type GitHubRequest,
  type HttpMethod,
  type RequestOptions,
} from './request.js';
import { AppsHandler } from './services/apps.js';
import { RepoHandler } from './services/repositories.js';
import { InstallationTokenCache } from './token-cache.js';
import { FetchHttpTransport, type HttpTransport } from './transport.js';

/**
 * Collaborators a client may share with, or take from, its creator.
 */
export interface ClientOptions {
  /** Transport; defaults to fetch with `config.fetch`. */
  transport?: HttpTransport;
  /** Installation token cache shared between clients of one app. */
  tokenCache?: InstallationTokenCache;
  rateLimits?: RateLimitTracker;
  /** Backoff sleep. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Jitter source. */
  random?: () => number;
  /** Clock in epoch milliseconds for token expiry and rate limit hints. */
  clock?: () => number;
}

/**
 * GitHub API client implementation
 */
export class GitHubClient {
  private readonly config: GitHubConfig;
  private readonly options: ClientOptions;
  private readonly builder: RequestBuilder;
  private readonly auth: AuthManager;
  private readonly dispatcher: Dispatcher;
  private readonly paginator: Paginator;
  private readonly graphqlClient: GraphQLClient;
  private readonly tokenCache: InstallationTokenCache;
  private readonly rateLimits: RateLimitTracker;
  private readonly transport: HttpTransport;

  /**
   * @throws {GitHubError} If the configuration is invalid.
   */
  constructor(config: GitHubConfig, options: ClientOptions = {}) {
    validateConfig(config);
    this.config = { ...config, retry: { ...config.retry } };
    this.options = options;

    this.transport = options.transport ?? new FetchHttpTransport(config.fetch);
    this.tokenCache =
      options.tokenCache ??
      new InstallationTokenCache({
        safetyMarginMs: config.tokenSafetyMargin,
        clock: options.clock,
        logger: config.logger,
      });
    this.rateLimits = options.rateLimits ?? new RateLimitTracker();

    this.builder = new RequestBuilder({
      baseUrl: config.baseUrl,
      userAgent: config.userAgent,
      accept: config.accept,
      apiVersion: config.apiVersion,
    });

    const exchange: InstallationTokenExchange = (app, installationId) =>
      this.apps().createInstallationAccessToken(installationId, {}, app);

    this.auth = new AuthManager({
      credential: config.credential,
      baseUrl: config.baseUrl,
      graphqlUrl: config.graphqlUrl,
      tokenCache: this.tokenCache,
      exchange,
      logger: config.logger,
    });

    this.dispatcher = new Dispatcher({
      transport: this.transport,
      auth: this.auth,
      retry: config.retry,
      timeout: config.timeout,
      rateLimits: this.rateLimits,
      cache: config.cache,
      logger: config.logger,
      sleep: options.sleep,
      random: options.random,
      clock: options.clock,
    });

    this.paginator = new Paginator(this.builder, this.dispatcher);
    this.graphqlClient = new GraphQLClient(
      this.builder,
      this.dispatcher,
      config.graphqlUrl ?? this.builder.absoluteUrl('/graphql')
    );
  }

  // Collaborator surface

  /**
   * Builds a request against the configured base URL.
   */
  build(method: HttpMethod, route: string, options?: RequestOptions): GitHubRequest {
    return this.builder.build(method, route, options);
  }

  /**
   * Sends a built request. Never throws for HTTP, transport, auth or decode
   * failures; they are returned as failure outcomes.
   */
  send<T>(request: GitHubRequest, decoder: Decoder<T>): Promise<Outcome<T>> {
    return this.dispatcher.send(request, decoder);
  }

  /**
   * Resolves a route to an absolute URL.
   */
  absoluteUrl(route: string): string {
    return this.builder.absoluteUrl(route);
  }

  /**
   * Authorization header value this client would send to `url`.
   */
  authorizationFor(url: string, credential?: Credential): Promise<string | undefined> {
    return this.auth.authorizationFor(url, credential);
  }

  // Convenience methods; these throw the failure's GitHubError.

  /**
   * Builds, sends and unwraps a request.
   * @throws {GitHubError}
   */
  async request<T>(
    method: HttpMethod,
    route: string,
    decoder: Decoder<T>,
    options?: RequestOptions
  ): Promise<T> {
    return unwrap(await this.send(this.build(method, route, options), decoder));
  }

  /**
   * Make a GET request
   */
  get<T>(route: string, decoder: Decoder<T>, options?: RequestOptions): Promise<T> {
    return this.request('GET', route, decoder, options);
  }

  /**
   * Make a POST request
   */
  post<T>(route: string, body: unknown, decoder: Decoder<T>, options?: RequestOptions): Promise<T> {
    return this.request('POST', route, decoder, { ...options, body });
  }

  /**
   * Make a PUT request
   */
  put<T>(route: string, body: unknown, decoder: Decoder<T>, options?: RequestOptions): Promise<T> {
    return this.request('PUT', route, decoder, { ...options, body });
  }

  /**
   * Make a PATCH request
   */
  patch<T>(route: string, body: unknown, decoder: Decoder<T>, options?: RequestOptions): Promise<T> {
    return this.request('PATCH', route, decoder, { ...options, body });
  }

  /**
   * Make a DELETE request
   */
  delete<T>(route: string, decoder: Decoder<T>, options?: RequestOptions): Promise<T> {
    return this.request('DELETE', route, decoder, options);
  }

  // Pagination

  /**
   * Fetches the first page of a list endpoint.
   * @throws {GitHubError}
   */
  async getPage<T>(route: string, item: Decoder<T>, options?: PageOptions): Promise<Page<T>> {
    return unwrap(await this.paginator.getPage(route, item, options));
  }

  /**
   * Fetches the page after `page`, or `undefined` when it is the last one.
   * @throws {GitHubError}
   */
  async nextPage<T>(page: Page<T>, item: Decoder<T>): Promise<Page<T> | undefined> {
    const outcome = await this.paginator.nextPage(page, item);
    return outcome === undefined ? undefined : unwrap(outcome);
  }

  /**
   * Fetches the page before `page`, if linked.
   * @throws {GitHubError}
   */
  async prevPage<T>(page: Page<T>, item: Decoder<T>): Promise<Page<T> | undefined> {
    const outcome = await this.paginator.prevPage(page, item);
    return outcome === undefined ? undefined : unwrap(outcome);
  }

  /**
   * Iterates `first` and every following page.
   */
  pages<T>(first: Page<T>, item: Decoder<T>): AsyncGenerator<Page<T>, void, undefined> {
    return this.paginator.pages(first, item);
  }

  /**
   * Iterates every item from `first` onwards.
   */
  items<T>(first: Page<T>, item: Decoder<T>): AsyncGenerator<T, void, undefined> {
    return this.paginator.items(first, item);
  }

  /**
   * Collects every item from `first` onwards.
   */
  collectAll<T>(first: Page<T>, item: Decoder<T>): Promise<T[]> {
    return this.paginator.collectAll(first, item);
  }

  // GraphQL

  /**
   * Runs a GraphQL query and returns its decoded `data`.
   * @throws {GitHubError} `query_error` when the response carries errors.
   */
  async graphql<T>(
    query: string,
    data: Decoder<T>,
    variables?: Record<string, unknown>
  ): Promise<T> {
    return unwrap(await this.graphqlClient.query(query, data, variables));
  }

  /**
   * GraphQL client sharing this client's dispatcher.
   */
  graphqlApi(): GraphQLClient {
    return this.graphqlClient;
  }

  /**
   * Downloads a resource, following redirects. Credentials are only sent
   * while the chain stays on the API authority.
   * @throws {GitHubError}
   */
  download(route: string, options: RequestOptions = {}): Promise<Uint8Array> {
    return this.request('GET', route, bytes, {
      accept: 'application/octet-stream',
      ...options,
      followRedirects: true,
    });
  }

  // Credentials

  /**
   * Client authenticated as one installation of the configured GitHub App.
   * The new client shares this client's token cache, transport and rate
   * limit tracker.
   * @throws {GitHubError} `invalid_configuration` without an app credential.
   */
  installation(installationId: number): GitHubClient {
    const app = this.appCredential();
    if (!app) {
      throw GitHubError.configuration(
        'installation() requires a GitHub App or installation credential'
      );
    }
    return new GitHubClient(
      { ...this.config, credential: Credential.installation(app, installationId) },
      {
        ...this.options,
        transport: this.transport,
        tokenCache: this.tokenCache,
        rateLimits: this.rateLimits,
      }
    );
  }

  /**
   * App credential behind the client credential, if any.
   */
  appCredential(): AppCredential | undefined {
    const credential = this.config.credential;
    if (credential.type === 'app') {
      return credential;
    }
    if (credential.type === 'installation') {
      return credential.app;
    }
    return undefined;
  }

  /**
   * Gets the client credential.
   */
  getCredential(): Credential {
    return this.config.credential;
  }

  // Handlers

  /**
   * GitHub App endpoints.
   */
  apps(): AppsHandler {
    return new AppsHandler(this);
  }

  /**
   * Endpoints of one repository.
   */
  repositories(owner: string, repo: string): RepoHandler {
    return new RepoHandler(this, owner, repo);
  }

  // Introspection

  /**
   * Last rate limit seen for a resource.
   */
  rateLimit(resource: string = 'core'): RateLimitInfo | undefined {
    return this.rateLimits.get(resource);
  }

  /**
   * Get the client configuration
   */
  getConfig(): Readonly<GitHubConfig> {
    return this.config;
  }
}

/**
 * Creates a new GitHub client.
 * @throws {GitHubError} If the configuration is invalid.
 */
export function createClient(config: GitHubConfig, options?: ClientOptions): GitHubClient {
  return new GitHubClient(config, options);
}

/**
 * Create a GitHub client from environment variables
 * @throws {GitHubError} If the environment holds an invalid configuration.
 */
export function createClientFromEnv(env: NodeJS.ProcessEnv = process.env): GitHubClient {
  return new GitHubClient(configFromEnv(env));
}
