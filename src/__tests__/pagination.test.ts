import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { AuthManager, Credential } from '../auth.js';
import { DEFAULT_RETRY_CONFIG } from '../config.js';
import { Dispatcher } from '../dispatcher.js';
import { GitHubError, GitHubErrorKind } from '../errors.js';
import {
  Page,
  Paginator,
  extractPageNumber,
  pageBodyDecoder,
  parseLinkHeader,
} from '../pagination.js';
import { RateLimitTracker } from '../rate-limit.js';
import { RequestBuilder } from '../request.js';
import { InstallationTokenCache } from '../token-cache.js';
import { createMockTransport, respond, sentRequest } from '../__mocks__/http-transport.mock.js';

const issueSchema = z.object({ number: z.number() });

function setup() {
  const transport = createMockTransport();
  const builder = new RequestBuilder({
    baseUrl: 'https://api.github.com',
    userAgent: 'test-agent',
    accept: 'application/vnd.github+json',
    apiVersion: '2022-11-28',
  });
  const dispatcher = new Dispatcher({
    transport,
    auth: new AuthManager({
      credential: Credential.bearer('test-token'),
      baseUrl: 'https://api.github.com',
      tokenCache: new InstallationTokenCache(),
      exchange: vi.fn(),
    }),
    retry: { ...DEFAULT_RETRY_CONFIG, enabled: false },
    timeout: 5000,
    rateLimits: new RateLimitTracker(),
  });
  return { transport, paginator: new Paginator(builder, dispatcher) };
}

function issues(...numbers: number[]) {
  return numbers.map((number) => ({ number }));
}

describe('parseLinkHeader', () => {
  it('extracts next and last', () => {
    const links = parseLinkHeader(
      '<https://api.github.com/x?page=2>; rel="next", <https://api.github.com/x?page=5>; rel="last"'
    );

    expect(links).toEqual({
      next: 'https://api.github.com/x?page=2',
      last: 'https://api.github.com/x?page=5',
    });
    expect(new Page([], links).numberOfPages()).toBe(5);
  });

  it('reads all four relations', () => {
    const links = parseLinkHeader(
      [
        '<https://api.github.com/x?page=3>; rel="next"',
        '<https://api.github.com/x?page=1>; rel="prev"',
        '<https://api.github.com/x?page=1>; rel="first"',
        '<https://api.github.com/x?page=9>; rel="last"',
      ].join(', ')
    );

    expect(links).toEqual({
      next: 'https://api.github.com/x?page=3',
      prev: 'https://api.github.com/x?page=1',
      first: 'https://api.github.com/x?page=1',
      last: 'https://api.github.com/x?page=9',
    });
  });

  it('ignores unknown relations', () => {
    expect(
      parseLinkHeader(
        '<https://api.github.com/x?page=2>; rel="next", <https://api.github.com/y>; rel="alternate"'
      )
    ).toEqual({ next: 'https://api.github.com/x?page=2' });
  });

  it('keeps commas inside link targets', () => {
    expect(
      parseLinkHeader(
        '<https://api.github.com/search/code?q=a,b&page=2>; rel="next", ' +
          '<https://api.github.com/search/code?q=a,b&page=9>; rel="last"'
      )
    ).toEqual({
      next: 'https://api.github.com/search/code?q=a,b&page=2',
      last: 'https://api.github.com/search/code?q=a,b&page=9',
    });
  });

  it('returns no links for a missing header', () => {
    expect(parseLinkHeader(null)).toEqual({});
    expect(parseLinkHeader(undefined)).toEqual({});
    expect(parseLinkHeader('   ')).toEqual({});
  });

  it('returns no links when any entry is malformed', () => {
    expect(parseLinkHeader('https://api.github.com/x?page=2; rel="next"')).toEqual({});
    expect(
      parseLinkHeader('<https://api.github.com/x?page=2>; rel="next", <https://api.github.com/x?page=5>')
    ).toEqual({});
    expect(parseLinkHeader('</relative?page=2>; rel="next"')).toEqual({});
  });
});

describe('extractPageNumber', () => {
  it('reads the page query', () => {
    expect(extractPageNumber('https://api.github.com/x?per_page=10&page=7')).toBe(7);
  });

  it('returns undefined without a page', () => {
    expect(extractPageNumber('https://api.github.com/x')).toBeUndefined();
    expect(extractPageNumber('not a url')).toBeUndefined();
  });
});

describe('pageBodyDecoder', () => {
  const decoder = pageBodyDecoder(issueSchema);

  it('accepts a bare array', () => {
    expect(decoder.parse([{ number: 1 }, { number: 2 }])).toEqual({
      items: [{ number: 1 }, { number: 2 }],
      totalCount: undefined,
      incompleteResults: undefined,
    });
  });

  it('unwraps search results', () => {
    expect(
      decoder.parse({ total_count: 40, incomplete_results: false, items: [{ number: 3 }] })
    ).toEqual({ items: [{ number: 3 }], totalCount: 40, incompleteResults: false });
  });

  it('unwraps list wrappers', () => {
    expect(decoder.parse({ total_count: 1, workflow_runs: [{ number: 9 }] }).items).toEqual([
      { number: 9 },
    ]);
  });

  it('rejects objects without an item array', () => {
    expect(() => decoder.parse({ message: 'nope' })).toThrow(/expected an array or one of items/);
  });

  it('names the failing item', () => {
    expect(() => decoder.parse([{ number: 1 }, { number: 'two' }])).toThrow(/^item 1: /);
  });
});

describe('Page', () => {
  it('reports its navigation state', () => {
    const page = new Page(issues(1, 2), { prev: 'https://api.github.com/x?page=1' });

    expect(page.hasNext()).toBe(false);
    expect(page.hasPrev()).toBe(true);
    expect(page.length).toBe(2);
    expect(page.isEmpty()).toBe(false);
    expect(page.numberOfPages()).toBeUndefined();
  });

  it('drops only next in withoutNext', () => {
    const page = new Page(issues(1), {
      next: 'https://api.github.com/x?page=2',
      last: 'https://api.github.com/x?page=2',
    }, { totalCount: 2 });

    const trimmed = page.withoutNext();

    expect(trimmed.links).toEqual({
      next: undefined,
      prev: undefined,
      first: undefined,
      last: 'https://api.github.com/x?page=2',
    });
    expect(trimmed.totalCount).toBe(2);
    expect(trimmed.items).toBe(page.items);
  });
});

describe('Paginator', () => {
  it('fetches a first page with its links', async () => {
    const { transport, paginator } = setup();
    transport.send.mockResolvedValueOnce(
      respond(200, issues(1, 2), {
        link: '<https://api.github.com/repos/o/r/issues?per_page=2&page=2>; rel="next", <https://api.github.com/repos/o/r/issues?per_page=2&page=5>; rel="last"',
      })
    );

    const outcome = await paginator.getPage('/repos/o/r/issues', issueSchema, {
      query: { per_page: 2 },
    });

    expect(sentRequest(transport, 0).url).toBe('https://api.github.com/repos/o/r/issues?per_page=2');
    expect(outcome.type).toBe('success');
    if (outcome.type === 'success') {
      expect(outcome.value.items).toEqual(issues(1, 2));
      expect(outcome.value.next).toBe('https://api.github.com/repos/o/r/issues?per_page=2&page=2');
      expect(outcome.value.numberOfPages()).toBe(5);
    }
  });

  it('passes failures through', async () => {
    const { transport, paginator } = setup();
    transport.send.mockResolvedValueOnce(respond(404, { message: 'Not Found' }));

    const outcome = await paginator.getPage('/repos/o/r/issues', issueSchema);

    expect(outcome.type).toBe('github_error');
    expect(outcome.type !== 'success' && outcome.error.kind).toBe(GitHubErrorKind.NotFound);
  });

  it('returns undefined for a page without next', async () => {
    const { transport, paginator } = setup();

    const next = await paginator.nextPage(new Page(issues(1)), issueSchema);

    expect(next).toBeUndefined();
    expect(transport.send).not.toHaveBeenCalled();
  });

  it('follows the next link verbatim', async () => {
    const { transport, paginator } = setup();
    const cursor = 'https://api.github.com/repos/o/r/issues?per_page=2&page=2';
    transport.send.mockResolvedValueOnce(respond(200, issues(3)));

    const next = await paginator.nextPage(new Page(issues(1, 2), { next: cursor }), issueSchema);

    expect(sentRequest(transport, 0).url).toBe(cursor);
    expect(next?.type === 'success' && next.value.items).toEqual(issues(3));
    expect(next?.type === 'success' && next.value.hasNext()).toBe(false);
  });

  it('clears next when the server links back to the same cursor', async () => {
    const { transport, paginator } = setup();
    const cursor = 'https://api.github.com/x?page=2';
    transport.send.mockResolvedValueOnce(
      respond(200, issues(3), { link: `<${cursor}>; rel="next"` })
    );

    const next = await paginator.nextPage(new Page(issues(1), { next: cursor }), issueSchema);

    expect(next?.type === 'success' && next.value.hasNext()).toBe(false);
  });

  it('navigates prev, first and last links', async () => {
    const { transport, paginator } = setup();
    transport.send.mockResolvedValue(respond(200, issues(1)));
    const page = new Page(issues(5), {
      prev: 'https://api.github.com/x?page=4',
      first: 'https://api.github.com/x?page=1',
    });

    await paginator.prevPage(page, issueSchema);
    await paginator.firstPage(page, issueSchema);

    expect(paginator.lastPage(page, issueSchema)).toBeUndefined();
    expect(transport.send.mock.calls.map(([request]) => request.url)).toEqual([
      'https://api.github.com/x?page=4',
      'https://api.github.com/x?page=1',
    ]);
  });

  it('collects items across pages', async () => {
    const { transport, paginator } = setup();
    transport.send
      .mockResolvedValueOnce(
        respond(200, issues(3, 4), { link: '<https://api.github.com/x?page=3>; rel="next"' })
      )
      .mockResolvedValueOnce(respond(200, issues(5)));
    const first = new Page(issues(1, 2), { next: 'https://api.github.com/x?page=2' });

    const all = await paginator.collectAll(first, issueSchema);

    expect(all).toEqual(issues(1, 2, 3, 4, 5));
    expect(transport.send).toHaveBeenCalledTimes(2);
  });

  it('yields whole pages in order', async () => {
    const { transport, paginator } = setup();
    transport.send.mockResolvedValueOnce(respond(200, issues(2)));
    const first = new Page(issues(1), { next: 'https://api.github.com/x?page=2' });

    const sizes: number[] = [];
    for await (const page of paginator.pages(first, issueSchema)) {
      sizes.push(page.length);
    }

    expect(sizes).toEqual([1, 1]);
  });

  it('throws when a later page fails', async () => {
    const { transport, paginator } = setup();
    transport.send.mockResolvedValueOnce(respond(500, { message: 'boom' }));
    const first = new Page(issues(1), { next: 'https://api.github.com/x?page=2' });

    const error = await paginator.collectAll(first, issueSchema).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitHubError);
    expect(error).toMatchObject({ kind: GitHubErrorKind.InternalError });
  });
});
