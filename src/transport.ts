/**
 * HTTP transport over the Fetch API.
 * @module transport
 */

import { GitHubError, GitHubErrorKind } from './errors.js';
import type { HttpMethod } from './request.js';

/**
 * A single HTTP exchange as seen by the transport.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Array<[string, string]>;
  body?: string | Uint8Array;
  signal?: AbortSignal;
  timeout: number;
}

/**
 * Raw response. Redirects are never followed by the transport.
 */
export interface TransportResponse {
  status: number;
  headers: Headers;
  body: Uint8Array;
}

/**
 * Interface for HTTP transport layer
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Implementation of HttpTransport using the Fetch API
 */
export class FetchHttpTransport implements HttpTransport {
  constructor(private readonly fetchImpl: typeof fetch = globalThis.fetch) {}

  /**
   * Sends the request.
   * @throws {GitHubError} transport category on connection failure, timeout or abort.
   */
  async send(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeout);
    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      if (request.signal?.aborted) {
        throw new GitHubError(GitHubErrorKind.Aborted, 'Request aborted');
      }

      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        redirect: 'manual',
        signal: controller.signal,
      });

      const body = new Uint8Array(await response.arrayBuffer());
      return { status: response.status, headers: response.headers, body };
    } catch (error) {
      if (error instanceof GitHubError) {
        throw error;
      }
      if (request.signal?.aborted) {
        throw GitHubError.transport(error, GitHubErrorKind.Aborted);
      }
      if (controller.signal.aborted) {
        throw new GitHubError(GitHubErrorKind.Timeout, `Request timeout after ${request.timeout}ms`, {
          cause: error,
        });
      }
      throw GitHubError.transport(error);
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
