import { vi } from 'vitest';
import type { TransportRequest, TransportResponse } from '../transport.js';

const encoder = new TextEncoder();

/**
 * Transport whose responses are queued with `mockResolvedValueOnce`.
 * Unqueued requests fail the test.
 */
export function createMockTransport() {
  return {
    send: vi.fn(async (request: TransportRequest): Promise<TransportResponse> => {
      throw new Error(`Unexpected request: ${request.method} ${request.url}`);
    }),
  };
}

export type MockTransport = ReturnType<typeof createMockTransport>;

/**
 * Builds a transport response. Objects and arrays are sent as JSON.
 */
export function respond(
  status: number,
  body?: unknown,
  headers: Record<string, string> = {}
): TransportResponse {
  if (body === undefined) {
    return { status, headers: new Headers(headers), body: new Uint8Array() };
  }
  if (typeof body === 'string') {
    return { status, headers: new Headers(headers), body: encoder.encode(body) };
  }
  return {
    status,
    headers: new Headers({ 'content-type': 'application/json; charset=utf-8', ...headers }),
    body: encoder.encode(JSON.stringify(body)),
  };
}

/**
 * Request passed to the transport on call `index`.
 */
export function sentRequest(transport: MockTransport, index: number): TransportRequest {
  const call = transport.send.mock.calls[index];
  if (!call) {
    throw new Error(`Transport was called ${transport.send.mock.calls.length} times`);
  }
  return call[0];
}

/**
 * Header sent on call `index`, case-insensitive.
 */
export function sentHeader(
  transport: MockTransport,
  index: number,
  name: string
): string | undefined {
  const lower = name.toLowerCase();
  return sentRequest(transport, index).headers.find(([key]) => key.toLowerCase() === lower)?.[1];
}
