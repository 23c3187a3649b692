/**
 * Conditional-request cache. GET responses carrying `ETag` or
 * `Last-Modified` are stored; later GETs for the same URL send the
 * matching validator and a 304 is answered from the stored response.
 * @module cache
 */

/**
 * Validator stored for a URL.
 */
export type CacheKey =
  | { readonly type: 'etag'; readonly value: string }
  | { readonly type: 'last_modified'; readonly value: string };

/**
 * Stored response.
 */
export interface CachedResponse {
  readonly body: Uint8Array;
  readonly headers: ReadonlyArray<[string, string]>;
}

/**
 * Storage backend for conditional requests.
 */
export interface HttpCache {
  /** Validator to send for `url`, if one is stored. */
  lookup(url: string): CacheKey | undefined;
  /** Stored response for `url`. */
  load(url: string): CachedResponse | undefined;
  /** Stores a response under its validator. */
  store(url: string, key: CacheKey, response: CachedResponse): void;
}

/**
 * Picks the validator of a response, preferring `ETag`.
 */
export function cacheKeyFrom(headers: Headers): CacheKey | undefined {
  const etag = headers.get('etag');
  if (etag) {
    return { type: 'etag', value: etag };
  }
  const lastModified = headers.get('last-modified');
  if (lastModified) {
    return { type: 'last_modified', value: lastModified };
  }
  return undefined;
}

/**
 * Request header carrying a validator.
 */
export function conditionalHeader(key: CacheKey): [string, string] {
  return key.type === 'etag'
    ? ['If-None-Match', key.value]
    : ['If-Modified-Since', key.value];
}

interface Entry {
  key: CacheKey;
  response: CachedResponse;
}

/**
 * Process-local cache keyed by absolute URL.
 */
export class InMemoryHttpCache implements HttpCache {
  private readonly entries: Map<string, Entry> = new Map();

  lookup(url: string): CacheKey | undefined {
    return this.entries.get(url)?.key;
  }

  load(url: string): CachedResponse | undefined {
    return this.entries.get(url)?.response;
  }

  store(url: string, key: CacheKey, response: CachedResponse): void {
    this.entries.set(url, { key, response });
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
