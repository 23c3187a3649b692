import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { bytes, decodeBody, decodeErrorEnvelope, noContent, text, tryDecode } from '../decode.js';
import { GitHubErrorKind } from '../errors.js';

const encoder = new TextEncoder();

function response(status: number, body: string, contentType?: string) {
  const headers = new Headers(contentType ? { 'content-type': contentType } : {});
  return { status, headers, body: encoder.encode(body) };
}

describe('decodeBody', () => {
  it('parses JSON media types', () => {
    const result = decodeBody(
      response(200, '{"id":1}', 'application/vnd.github+json'),
      z.object({ id: z.number() })
    );

    expect(result).toEqual({ ok: true, value: { id: 1 } });
  });

  it('hands other media types over as text', () => {
    expect(decodeBody(response(200, '# README', 'text/plain'), text)).toEqual({
      ok: true,
      value: '# README',
    });
  });

  it('never parses 204 bodies', () => {
    expect(decodeBody(response(204, ''), noContent)).toEqual({ ok: true, value: undefined });
  });

  it('passes bytes through for binary decoders', () => {
    const body = new Uint8Array([0x1f, 0x8b]);
    const result = decodeBody({ status: 200, headers: new Headers(), body }, bytes);

    expect(result.ok && result.value).toBe(body);
  });

  it('keeps the raw body on a shape mismatch', () => {
    const result = decodeBody(
      response(200, '{"id":"x"}', 'application/json'),
      z.object({ id: z.number() })
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(GitHubErrorKind.DeserializationError);
      expect(result.error.rawBody).toBe('{"id":"x"}');
      expect(result.error.message.startsWith('Response body did not match the expected shape: ')).toBe(
        true
      );
    }
  });
});

describe('tryDecode', () => {
  it('captures thrown values', () => {
    const result = tryDecode(
      {
        parse(): never {
          throw 'plain string';
        },
      },
      1
    );

    expect(result.success).toBe(false);
    expect(!result.success && result.error.message).toBe('plain string');
  });
});

describe('decodeErrorEnvelope', () => {
  it('reads the GitHub envelope', () => {
    const envelope = decodeErrorEnvelope(
      404,
      encoder.encode('{"message":"Not Found","documentation_url":"https://docs.github.com"}')
    );

    expect(envelope).toEqual({
      message: 'Not Found',
      documentationUrl: 'https://docs.github.com',
      errors: undefined,
      raw: '{"message":"Not Found","documentation_url":"https://docs.github.com"}',
    });
  });

  it('falls back to the status for an empty body', () => {
    expect(decodeErrorEnvelope(500, new Uint8Array()).message).toBe('HTTP 500 error');
  });

  it('falls back to the status when the envelope has no message', () => {
    expect(decodeErrorEnvelope(418, encoder.encode('{}')).message).toBe('HTTP 418 error');
  });
});
