/**
 * Rate limit header parsing and tracking. Limits are recorded for callers
 * to inspect; requests are never delayed on their account.
 * @module rate-limit
 */

import type { RateLimitHint } from './errors.js';

/**
 * Rate limit information from GitHub API headers
 */
export interface RateLimitInfo {
  /** Maximum requests allowed in the time window */
  limit: number;
  /** Remaining requests in the time window */
  remaining: number;
  /** When the rate limit resets */
  resetAt: Date;
  /** Number of requests used in the time window */
  used: number;
  /** Rate limit resource type (core, search, graphql, etc.) */
  resource: string;
}

function intHeader(headers: Headers, name: string): number | undefined {
  const value = headers.get(name);
  if (value === null) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Reads the `x-ratelimit-*` headers; `undefined` unless limit, remaining
 * and reset are all present.
 */
export function parseRateLimitHeaders(headers: Headers): RateLimitInfo | undefined {
  const limit = intHeader(headers, 'x-ratelimit-limit');
  const remaining = intHeader(headers, 'x-ratelimit-remaining');
  const reset = intHeader(headers, 'x-ratelimit-reset');
  if (limit === undefined || remaining === undefined || reset === undefined) {
    return undefined;
  }

  return {
    limit,
    remaining,
    resetAt: new Date(reset * 1000),
    used: intHeader(headers, 'x-ratelimit-used') ?? limit - remaining,
    resource: headers.get('x-ratelimit-resource') ?? 'core',
  };
}

/**
 * Parses `Retry-After` given in seconds.
 */
export function parseRetryAfter(headers: Headers): number | undefined {
  return intHeader(headers, 'retry-after');
}

/**
 * True for a 429, or a 403 carrying rate-limit headers (`retry-after`, or
 * `x-ratelimit-remaining: 0`).
 */
export function isRateLimited(status: number, headers: Headers): boolean {
  if (status === 429) {
    return true;
  }
  if (status !== 403) {
    return false;
  }
  return (
    parseRetryAfter(headers) !== undefined || headers.get('x-ratelimit-remaining') === '0'
  );
}

/**
 * Builds the hint attached to rate limit errors.
 */
export function rateLimitHint(headers: Headers): RateLimitHint {
  const info = parseRateLimitHeaders(headers);
  return {
    limit: info?.limit,
    remaining: info?.remaining,
    resetAt: info?.resetAt,
    retryAfter: parseRetryAfter(headers),
    resource: info?.resource,
  };
}

/**
 * Last-seen rate limit per resource.
 */
export class RateLimitTracker {
  private readonly limits: Map<string, RateLimitInfo> = new Map();

  /**
   * Records the rate limit headers of a response, if any.
   */
  record(headers: Headers): RateLimitInfo | undefined {
    const info = parseRateLimitHeaders(headers);
    if (info) {
      this.limits.set(info.resource, info);
    }
    return info;
  }

  /**
   * Get rate limit information for a resource
   */
  get(resource: string = 'core'): RateLimitInfo | undefined {
    return this.limits.get(resource);
  }

  /**
   * Get all tracked rate limit information
   */
  getAll(): Map<string, RateLimitInfo> {
    return new Map(this.limits);
  }

  /**
   * Clear all rate limit information
   */
  clear(): void {
    this.limits.clear();
  }
}
