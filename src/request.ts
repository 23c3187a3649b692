/**
 * Request assembly: URL resolution, query serialization, headers and body.
 * @module request
 */

import type { Credential } from './auth.js';
import { GitHubError, GitHubErrorKind } from './errors.js';

/**
 * HTTP method types
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Query value; arrays repeat the key, `undefined` is skipped.
 */
export type QueryValue = string | number | boolean | undefined | ReadonlyArray<string | number | boolean>;

/**
 * Query parameters, serialized in the order given.
 */
export type QueryParams =
  | Record<string, QueryValue>
  | ReadonlyArray<readonly [string, QueryValue]>;

/**
 * Ordered header list; names may repeat.
 */
export type HeaderList = Array<[name: string, value: string]>;

/**
 * A fully assembled request. The Authorization header is never stored here;
 * the dispatcher derives it for every attempt.
 */
export interface GitHubRequest {
  readonly method: HttpMethod;
  /** Absolute URL. */
  readonly url: string;
  readonly headers: ReadonlyArray<readonly [string, string]>;
  readonly body?: string | Uint8Array;
  readonly contentType?: string;
  /** POST and PATCH are only retried when this is set. */
  readonly idempotent: boolean;
  /** Follow 3xx responses (asset downloads). */
  readonly followRedirects: boolean;
  /** Per-request credential, overriding the client one. */
  readonly credential?: Credential;
  /** Cancels the request, including backoff sleeps. */
  readonly signal?: AbortSignal;
  /** Per-request timeout in milliseconds. */
  readonly timeout?: number;
}

/**
 * Per-call request options.
 */
export interface RequestOptions {
  query?: QueryParams;
  /** JSON-serializable value, or a raw string / byte body. */
  body?: unknown;
  /** Extra headers, appended after the defaults. */
  headers?: Record<string, string>;
  /** Overrides the default Accept header. */
  accept?: string;
  /** Content type of a raw body; JSON bodies always use application/json. */
  contentType?: string;
  idempotent?: boolean;
  followRedirects?: boolean;
  credential?: Credential;
  signal?: AbortSignal;
  timeout?: number;
}

/**
 * Settings the builder needs from the client configuration.
 */
export interface RequestBuilderSettings {
  baseUrl: string;
  userAgent: string;
  accept: string;
  apiVersion: string;
}

const METHODS_WITH_CONTENT_LENGTH: ReadonlySet<HttpMethod> = new Set([
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
]);

/**
 * Builds requests relative to a base URL.
 */
export class RequestBuilder {
  private readonly settings: RequestBuilderSettings;
  private readonly base: string;

  constructor(settings: RequestBuilderSettings) {
    this.settings = settings;
    this.base = settings.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Resolves a route against the base URL. Absolute http(s) URLs are
   * returned unchanged; paths keep any path prefix of the base URL.
   */
  absoluteUrl(route: string): string {
    if (/^https?:\/\//i.test(route)) {
      try {
        return new URL(route).toString();
      } catch (error) {
        throw new GitHubError(GitHubErrorKind.InvalidBaseUrl, `Invalid URL: ${route}`, {
          cause: error,
        });
      }
    }
    const path = route.startsWith('/') ? route : `/${route}`;
    return `${this.base}${path}`;
  }

  /**
   * Assembles a request. Pure; nothing is sent.
   */
  build(method: HttpMethod, route: string, options: RequestOptions = {}): GitHubRequest {
    const url = appendQuery(this.absoluteUrl(route), options.query);

    const headers: HeaderList = [
      ['User-Agent', this.settings.userAgent],
      ['Accept', options.accept ?? this.settings.accept],
      ['X-GitHub-Api-Version', this.settings.apiVersion],
    ];

    const { body, contentType } = serializeBody(options.body, options.contentType);
    if (contentType) {
      headers.push(['Content-Type', contentType]);
    }
    if (body !== undefined || METHODS_WITH_CONTENT_LENGTH.has(method)) {
      headers.push(['Content-Length', String(byteLength(body))]);
    }

    for (const [name, value] of Object.entries(options.headers ?? {})) {
      headers.push([name, value]);
    }

    return {
      method,
      url,
      headers,
      body,
      contentType,
      idempotent: options.idempotent ?? isIdempotentMethod(method),
      followRedirects: options.followRedirects ?? false,
      credential: options.credential,
      signal: options.signal,
      timeout: options.timeout,
    };
  }
}

/**
 * GET, HEAD, PUT and DELETE are idempotent by definition.
 */
export function isIdempotentMethod(method: HttpMethod): boolean {
  return method !== 'POST' && method !== 'PATCH';
}

/**
 * Appends query parameters in caller order.
 */
export function appendQuery(url: string, query?: QueryParams): string {
  if (!query) {
    return url;
  }

  const entries: ReadonlyArray<readonly [string, QueryValue]> = isEntryList(query)
    ? query
    : Object.entries(query);

  const parsed = new URL(url);
  for (const [key, value] of entries) {
    if (value === undefined) {
      continue;
    }
    if (isValueList(value)) {
      for (const item of value) {
        parsed.searchParams.append(key, String(item));
      }
    } else {
      parsed.searchParams.append(key, String(value));
    }
  }
  return parsed.toString();
}

function isEntryList(
  query: QueryParams
): query is ReadonlyArray<readonly [string, QueryValue]> {
  return Array.isArray(query);
}

function isValueList(value: QueryValue): value is ReadonlyArray<string | number | boolean> {
  return Array.isArray(value);
}

/**
 * Looks up a header value (case-insensitive, first match).
 */
export function headerValue(
  headers: ReadonlyArray<readonly [string, string]>,
  name: string
): string | undefined {
  const lower = name.toLowerCase();
  return headers.find(([key]) => key.toLowerCase() === lower)?.[1];
}

function serializeBody(
  body: unknown,
  contentType?: string
): { body?: string | Uint8Array; contentType?: string } {
  if (body === undefined || body === null) {
    return {};
  }
  if (typeof body === 'string' || body instanceof Uint8Array) {
    return { body, contentType: contentType ?? 'application/octet-stream' };
  }
  return { body: JSON.stringify(body), contentType: 'application/json' };
}

function byteLength(body: string | Uint8Array | undefined): number {
  if (body === undefined) {
    return 0;
  }
  return typeof body === 'string' ? Buffer.byteLength(body, 'utf8') : body.byteLength;
}

/**
 * Formats a preview media type, e.g. `application/vnd.github.squirrel-girl-preview`.
 */
export function formatPreview(preview: string): string {
  return `application/vnd.github.${preview}-preview`;
}

/**
 * Formats a versioned media type. `raw`, `text`, `html` and `full` get a
 * `+json` suffix.
 */
export function formatMediaType(mediaType: string): string {
  const jsonSuffix = ['raw', 'text', 'html', 'full'].includes(mediaType) ? '+json' : '';
  return `application/vnd.github.v3.${mediaType}${jsonSuffix}`;
}
