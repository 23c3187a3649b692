import { describe, it, expect, vi } from 'vitest';
import { GitHubError, GitHubErrorKind } from '../errors.js';
import { FetchHttpTransport, type TransportRequest } from '../transport.js';

function request(overrides: Partial<TransportRequest> = {}): TransportRequest {
  return {
    method: 'GET',
    url: 'https://api.github.com/user',
    headers: [['User-Agent', 'test-agent']],
    timeout: 1000,
    ...overrides,
  };
}

/** fetch that never settles until its signal aborts. */
function hangingFetch() {
  return vi.fn(
    (_input: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
      })
  );
}

describe('FetchHttpTransport', () => {
  it('sends the request without following redirects', async () => {
    const fetchImpl = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response('{"login":"octocat"}', {
          status: 200,
          headers: { 'content-type': 'application/json' },
        })
    );
    const transport = new FetchHttpTransport(fetchImpl);

    const response = await transport.send(
      request({ method: 'POST', body: '{"a":1}', headers: [['Content-Type', 'application/json']] })
    );

    expect(fetchImpl).toHaveBeenCalledWith(
      'https://api.github.com/user',
      expect.objectContaining({
        method: 'POST',
        headers: [['Content-Type', 'application/json']],
        body: '{"a":1}',
        redirect: 'manual',
      })
    );
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/json');
    expect(new TextDecoder().decode(response.body)).toBe('{"login":"octocat"}');
  });

  it('returns an empty body for 204', async () => {
    const transport = new FetchHttpTransport(
      vi.fn(async () => new Response(null, { status: 204 }))
    );

    const response = await transport.send(request());

    expect(response.status).toBe(204);
    expect(response.body.byteLength).toBe(0);
  });

  it('reports a timeout', async () => {
    const transport = new FetchHttpTransport(hangingFetch());

    const error = await transport.send(request({ timeout: 10 })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitHubError);
    expect(error).toMatchObject({
      kind: GitHubErrorKind.Timeout,
      category: 'transport',
      message: 'Request timeout after 10ms',
    });
  });

  it('reports a caller abort', async () => {
    const transport = new FetchHttpTransport(hangingFetch());
    const controller = new AbortController();

    const pending = transport.send(request({ signal: controller.signal, timeout: 60_000 }));
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: GitHubErrorKind.Aborted });
  });

  it('does not call fetch for an already aborted signal', async () => {
    const fetchImpl = hangingFetch();
    const transport = new FetchHttpTransport(fetchImpl);
    const controller = new AbortController();
    controller.abort();

    await expect(transport.send(request({ signal: controller.signal }))).rejects.toMatchObject({
      kind: GitHubErrorKind.Aborted,
      message: 'Request aborted',
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('wraps connection failures', async () => {
    const transport = new FetchHttpTransport(
      vi.fn(async () => {
        throw new TypeError('getaddrinfo ENOTFOUND api.github.com');
      })
    );

    await expect(transport.send(request())).rejects.toMatchObject({
      kind: GitHubErrorKind.ConnectionFailed,
      message: 'Transport failure: getaddrinfo ENOTFOUND api.github.com',
    });
  });
});
