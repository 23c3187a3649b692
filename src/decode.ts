/**
 * Response decoding. Every response body passes through {@link decodeBody}
 * or {@link decodeErrorEnvelope}; nothing else parses JSON.
 * @module decode
 */

import { z } from 'zod';
import { GitHubError, GitHubErrorKind } from './errors.js';

/**
 * Anything with a zod-style `parse` that returns the decoded value or
 * throws. Zod schemas satisfy it directly.
 */
export interface Decoder<T> {
  parse(value: unknown): T;
  /** Receive the body bytes unparsed. */
  readonly binary?: boolean;
}

/**
 * Result of running a decoder without throwing.
 */
export type ParseResult<T> = { success: true; data: T } | { success: false; error: Error };

/**
 * Runs `decoder`, capturing what it throws.
 */
export function tryDecode<T>(decoder: Decoder<T>, value: unknown): ParseResult<T> {
  try {
    return { success: true, data: decoder.parse(value) };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

/**
 * Decoder for endpoints that answer without a body (204, 205).
 */
export const noContent: Decoder<void> = z.void();

/**
 * Decoder that accepts any JSON value.
 */
export const anyJson: Decoder<unknown> = z.unknown();

/**
 * Decoder that passes the body through as text.
 */
export const text: Decoder<string> = z.string();

/**
 * Decoder that returns the body bytes as received.
 */
export const bytes: Decoder<Uint8Array> = {
  binary: true,
  parse(value: unknown): Uint8Array {
    if (value instanceof Uint8Array) {
      return value;
    }
    throw new TypeError('expected a byte body');
  },
};

const textDecoder = new TextDecoder('utf-8');

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: GitHubError };

/**
 * Decodes a 2xx body. Binary decoders get the bytes. Otherwise 204/205
 * and empty bodies are never parsed: the decoder receives `undefined`. JSON
 * media types are parsed; anything else reaches the decoder as text.
 */
export function decodeBody<T>(
  response: { status: number; headers: Headers; body: Uint8Array },
  decoder: Decoder<T>
): DecodeResult<T> {
  const raw = textDecoder.decode(response.body);
  const requestId = response.headers.get('x-github-request-id') ?? undefined;

  let input: unknown;
  if (decoder.binary) {
    input = response.body;
  } else if (response.status === 204 || response.status === 205 || raw.length === 0) {
    input = undefined;
  } else {
    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('json')) {
      try {
        input = JSON.parse(raw);
      } catch (error) {
        return {
          ok: false,
          error: GitHubError.decode(
            `Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}`,
            raw,
            { statusCode: response.status, requestId, cause: error, kind: GitHubErrorKind.InvalidJson }
          ),
        };
      }
    } else {
      input = raw;
    }
  }

  const result = tryDecode(decoder, input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return {
    ok: false,
    error: GitHubError.decode(
      `Response body did not match the expected shape: ${result.error.message}`,
      raw,
      { statusCode: response.status, requestId, cause: result.error }
    ),
  };
}

const errorEnvelopeSchema = z.object({
  message: z.string().optional(),
  documentation_url: z.string().optional(),
  errors: z.array(z.unknown()).optional(),
});

/**
 * GitHub error envelope.
 */
export interface ErrorEnvelope {
  message: string;
  documentationUrl?: string;
  errors?: unknown[];
}

/**
 * Decodes a non-2xx body. Bodies that are not the JSON envelope become the
 * message verbatim.
 */
export function decodeErrorEnvelope(status: number, body: Uint8Array): ErrorEnvelope & { raw: string } {
  const raw = textDecoder.decode(body);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { message: raw.trim() || `HTTP ${status} error`, raw };
  }

  const envelope = errorEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return { message: raw.trim() || `HTTP ${status} error`, raw };
  }
  return {
    message: envelope.data.message ?? `HTTP ${status} error`,
    documentationUrl: envelope.data.documentation_url,
    errors: envelope.data.errors,
    raw,
  };
}
