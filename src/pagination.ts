/**
 * Pagination Support for GitHub API
 *
 * GitHub uses RFC 8288 Link headers for pagination:
 * Link: <https://api.github.com/resource?page=2>; rel="next",
 *       <https://api.github.com/resource?page=5>; rel="last"
 *
 * A {@link Page} carries its own links, so paging can resume from any page
 * already seen. {@link Paginator} fetches pages through the dispatcher.
 *
 * @module pagination
 */

import { z } from 'zod';
import type { Credential } from './auth.js';
import type { Decoder } from './decode.js';
import type { Dispatcher } from './dispatcher.js';
import { failure, success, unwrap, type Outcome } from './outcome.js';
import type { QueryParams, RequestBuilder } from './request.js';

/**
 * Pagination links extracted from Link header
 */
export interface PaginationLinks {
  /** URL for the next page of results */
  next?: string;
  /** URL for the previous page of results */
  prev?: string;
  /** URL for the first page of results */
  first?: string;
  /** URL for the last page of results */
  last?: string;
}

/**
 * Page of results with pagination metadata
 */
export class Page<T> {
  public readonly items: T[];
  public readonly next?: string;
  public readonly prev?: string;
  public readonly first?: string;
  public readonly last?: string;
  /** `total_count` of search and wrapped list responses. */
  public readonly totalCount?: number;
  /** `incomplete_results` of search responses. */
  public readonly incompleteResults?: boolean;

  constructor(
    items: T[],
    links: PaginationLinks = {},
    totals: { totalCount?: number; incompleteResults?: boolean } = {}
  ) {
    this.items = items;
    this.next = links.next;
    this.prev = links.prev;
    this.first = links.first;
    this.last = links.last;
    this.totalCount = totals.totalCount;
    this.incompleteResults = totals.incompleteResults;
  }

  /**
   * Pagination links of this page
   */
  get links(): PaginationLinks {
    return { next: this.next, prev: this.prev, first: this.first, last: this.last };
  }

  /**
   * Check if there is a next page
   */
  hasNext(): boolean {
    return this.next !== undefined;
  }

  /**
   * Check if there is a previous page
   */
  hasPrev(): boolean {
    return this.prev !== undefined;
  }

  /**
   * Get the number of items in this page
   */
  get length(): number {
    return this.items.length;
  }

  /**
   * Check if the page is empty
   */
  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Total number of pages, read from the `page` query of the `last` link.
   */
  numberOfPages(): number | undefined {
    return this.last === undefined ? undefined : extractPageNumber(this.last);
  }

  /**
   * Copy of this page without a `next` link.
   */
  withoutNext(): Page<T> {
    return new Page(
      this.items,
      { prev: this.prev, first: this.first, last: this.last },
      { totalCount: this.totalCount, incompleteResults: this.incompleteResults }
    );
  }
}

const LINK_ENTRY = /^<([^>]*)>\s*((?:;\s*[^;]+)+)$/;
const REL_PARAM = /^rel\s*=\s*"?([^"]*)"?$/i;

/**
 * Parse GitHub Link header according to RFC 8288
 *
 * Any entry without a `<url>`, without a `rel` or with an unparsable URL
 * makes the whole header count as carrying no links. Unknown rel names are
 * ignored.
 */
export function parseLinkHeader(linkHeader: string | null | undefined): PaginationLinks {
  const links: PaginationLinks = {};
  if (!linkHeader || linkHeader.trim() === '') {
    return links;
  }

  for (const part of linkHeader.split(/,(?=\s*<)/).map((p) => p.trim())) {
    const match = LINK_ENTRY.exec(part);
    if (!match) {
      return {};
    }
    const [, url, params] = match;
    if (!isAbsoluteUrl(url)) {
      return {};
    }

    const rels: string[] = [];
    for (const param of params.split(';').map((p) => p.trim())) {
      const rel = REL_PARAM.exec(param);
      if (rel) {
        rels.push(...rel[1].split(/\s+/).filter(Boolean));
      }
    }
    if (rels.length === 0) {
      return {};
    }

    for (const rel of rels) {
      switch (rel) {
        case 'next':
          links.next = url;
          break;
        case 'prev':
          links.prev = url;
          break;
        case 'first':
          links.first = url;
          break;
        case 'last':
          links.last = url;
          break;
      }
    }
  }

  return links;
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Extract page number from a pagination URL
 */
export function extractPageNumber(url: string): number | undefined {
  try {
    const page = new URL(url).searchParams.get('page');
    if (page) {
      const parsed = parseInt(page, 10);
      return Number.isNaN(parsed) ? undefined : parsed;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * Attributes that wrap the item array of list responses.
 */
export const PAGE_WRAPPER_KEYS = [
  'items',
  'workflows',
  'workflow_runs',
  'jobs',
  'artifacts',
  'repositories',
  'installations',
  'runners',
  'secrets',
  'variables',
] as const;

/**
 * Decoded page body, before links are attached.
 */
export interface PageBody<T> {
  items: T[];
  totalCount?: number;
  incompleteResults?: boolean;
}

const pageEnvelopeSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

/**
 * Decoder for list bodies: a bare array, or an object wrapping the array
 * under one of {@link PAGE_WRAPPER_KEYS}. Each element goes through `item`.
 */
export function pageBodyDecoder<T>(item: Decoder<T>): Decoder<PageBody<T>> {
  return {
    parse(value: unknown): PageBody<T> {
      const envelope = pageEnvelopeSchema.parse(value);

      let raw: unknown[];
      let totalCount: number | undefined;
      let incompleteResults: boolean | undefined;
      if (Array.isArray(envelope)) {
        raw = envelope;
      } else {
        const key = PAGE_WRAPPER_KEYS.find((k) => Array.isArray(envelope[k]));
        const wrapped = key === undefined ? undefined : envelope[key];
        if (!Array.isArray(wrapped)) {
          throw new TypeError(`expected an array or one of ${PAGE_WRAPPER_KEYS.join(', ')}`);
        }
        raw = wrapped;
        const total = envelope['total_count'];
        totalCount = typeof total === 'number' ? total : undefined;
        const incomplete = envelope['incomplete_results'];
        incompleteResults = typeof incomplete === 'boolean' ? incomplete : undefined;
      }

      const items = raw.map((element, index) => {
        try {
          return item.parse(element);
        } catch (error) {
          const detail = error instanceof Error ? error.message : String(error);
          throw new TypeError(`item ${index}: ${detail}`, { cause: error });
        }
      });
      return { items, totalCount, incompleteResults };
    },
  };
}

/**
 * Options for fetching the first page of a list.
 */
export interface PageOptions {
  query?: QueryParams;
  accept?: string;
  credential?: Credential;
  signal?: AbortSignal;
}

/**
 * Fetches pages of list endpoints.
 */
export class Paginator {
  constructor(
    private readonly builder: RequestBuilder,
    private readonly dispatcher: Dispatcher
  ) {}

  /**
   * Fetches the first page of `route`.
   */
  getPage<T>(route: string, item: Decoder<T>, options: PageOptions = {}): Promise<Outcome<Page<T>>> {
    return this.fetch(route, item, options);
  }

  /**
   * Fetches the page after `current`, or `undefined` when there is none.
   * A page that links back to the cursor it was fetched from is returned
   * without `next`.
   */
  async nextPage<T>(
    current: Page<T>,
    item: Decoder<T>,
    options: Omit<PageOptions, 'query'> = {}
  ): Promise<Outcome<Page<T>> | undefined> {
    const cursor = current.next;
    if (cursor === undefined) {
      return undefined;
    }
    const outcome = await this.fetch(cursor, item, options);
    if (outcome.type === 'success' && outcome.value.next === cursor) {
      return success(outcome.value.withoutNext(), outcome.status, outcome.headers);
    }
    return outcome;
  }

  /**
   * Fetches the page before `current`, or `undefined` when there is none.
   */
  prevPage<T>(
    current: Page<T>,
    item: Decoder<T>,
    options: Omit<PageOptions, 'query'> = {}
  ): Promise<Outcome<Page<T>>> | undefined {
    return current.prev === undefined ? undefined : this.fetch(current.prev, item, options);
  }

  /**
   * Fetches the first page linked from `current`, or `undefined`.
   */
  firstPage<T>(
    current: Page<T>,
    item: Decoder<T>,
    options: Omit<PageOptions, 'query'> = {}
  ): Promise<Outcome<Page<T>>> | undefined {
    return current.first === undefined ? undefined : this.fetch(current.first, item, options);
  }

  /**
   * Fetches the last page linked from `current`, or `undefined`.
   */
  lastPage<T>(
    current: Page<T>,
    item: Decoder<T>,
    options: Omit<PageOptions, 'query'> = {}
  ): Promise<Outcome<Page<T>>> | undefined {
    return current.last === undefined ? undefined : this.fetch(current.last, item, options);
  }

  /**
   * Yields `first` and every following page.
   * @throws {GitHubError} when a page fails to load.
   */
  async *pages<T>(
    first: Page<T>,
    item: Decoder<T>,
    options: Omit<PageOptions, 'query'> = {}
  ): AsyncGenerator<Page<T>, void, undefined> {
    let current: Page<T> | undefined = first;
    while (current !== undefined) {
      yield current;
      const next: Outcome<Page<T>> | undefined = await this.nextPage(current, item, options);
      current = next === undefined ? undefined : unwrap(next);
    }
  }

  /**
   * Yields every item from `first` onwards.
   * @throws {GitHubError} when a page fails to load.
   */
  async *items<T>(
    first: Page<T>,
    item: Decoder<T>,
    options: Omit<PageOptions, 'query'> = {}
  ): AsyncGenerator<T, void, undefined> {
    for await (const page of this.pages(first, item, options)) {
      yield* page.items;
    }
  }

  /**
   * Collects every item from `first` onwards.
   * WARNING: This will fetch all remaining pages and can be expensive
   */
  async collectAll<T>(
    first: Page<T>,
    item: Decoder<T>,
    options: Omit<PageOptions, 'query'> = {}
  ): Promise<T[]> {
    const all: T[] = [];
    for await (const value of this.items(first, item, options)) {
      all.push(value);
    }
    return all;
  }

  private async fetch<T>(
    route: string,
    item: Decoder<T>,
    options: PageOptions
  ): Promise<Outcome<Page<T>>> {
    const request = this.builder.build('GET', route, {
      query: options.query,
      accept: options.accept,
      credential: options.credential,
      signal: options.signal,
    });
    const outcome = await this.dispatcher.send(request, pageBodyDecoder(item));
    if (outcome.type !== 'success') {
      return failure(outcome.type, outcome.error);
    }
    const body = outcome.value;
    const page = new Page(body.items, parseLinkHeader(outcome.headers.get('link')), {
      totalCount: body.totalCount,
      incompleteResults: body.incompleteResults,
    });
    return success(page, outcome.status, outcome.headers);
  }
}
