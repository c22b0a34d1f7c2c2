// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZATION TESTS — Body Classification and Error Extraction
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { AbstractApiError, ResponseDecodeError } from '../errors.js';
import { extractErrorMessage, normalizeResponse, readBody, UNKNOWN_ERROR } from '../normalize.js';
import { binaryResponse, jsonResponse, textResponse } from './helpers.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BODY CLASSIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('readBody', () => {
  it('should return raw bytes for image content', async () => {
    const body = await readBody(binaryResponse([0x89, 0x50, 0x4e, 0x47], 'image/png'));

    expect(body.kind).toBe('binary');
    if (body.kind === 'binary') {
      expect([...body.bytes]).toEqual([0x89, 0x50, 0x4e, 0x47]);
      expect(body.contentType).toBe('image/png');
    }
  });

  it('should return raw bytes for octet-stream content', async () => {
    const body = await readBody(binaryResponse([1, 2, 3], 'application/octet-stream'));
    expect(body.kind).toBe('binary');
  });

  it('should parse declared JSON', async () => {
    const body = await readBody(jsonResponse({ a: 1 }, 200, 'application/json; charset=utf-8'));
    expect(body).toEqual({ kind: 'json', data: { a: 1 } });
  });

  it('should flag declared JSON that does not parse', async () => {
    const body = await readBody(textResponse('{"a":', 'application/json'));
    expect(body).toEqual({ kind: 'undecodable', text: '{"a":' });
  });

  it('should wrap plain text as a result', async () => {
    const body = await readBody(textResponse('pong', 'text/plain'));
    expect(body).toEqual({ kind: 'text', data: { result: 'pong' } });
  });

  it('should sniff JSON in undeclared content', async () => {
    const body = await readBody(textResponse('[1,2]', 'text/html'));
    expect(body).toEqual({ kind: 'json', data: [1, 2] });
  });

  it('should wrap undeclared content that only looks like JSON', async () => {
    const body = await readBody(textResponse('{not json', 'text/html'));
    expect(body).toEqual({ kind: 'text', data: { result: '{not json' } });
  });

  it('should wrap HTML as a result', async () => {
    const body = await readBody(textResponse('<html></html>', 'text/html'));
    expect(body).toEqual({ kind: 'text', data: { result: '<html></html>' } });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR MESSAGE EXTRACTION
// ─────────────────────────────────────────────────────────────────────────────────

describe('extractErrorMessage', () => {
  it('should prefer the nested error message', () => {
    expect(extractErrorMessage({ error: { message: 'Invalid API key' }, message: 'ignored' })).toBe(
      'Invalid API key'
    );
  });

  it('should fall back when the error object has no message', () => {
    expect(extractErrorMessage({ error: { code: 'quota' }, message: 'ignored' })).toBe(UNKNOWN_ERROR);
  });

  it('should use a top-level message', () => {
    expect(extractErrorMessage({ message: 'Rate limited' })).toBe('Rate limited');
  });

  it('should use a title when there is no message', () => {
    expect(extractErrorMessage({ title: 'Forbidden' })).toBe('Forbidden');
  });

  it('should stringify a scalar error field last', () => {
    expect(extractErrorMessage({ error: 'quota exceeded' })).toBe('quota exceeded');
    expect(extractErrorMessage({ error: 'quota exceeded', message: 'Too many requests' })).toBe(
      'Too many requests'
    );
  });

  it('should use the generic message for a null error field', () => {
    expect(extractErrorMessage({ error: null })).toBe(UNKNOWN_ERROR);
  });

  it('should return the generic message for anything else', () => {
    expect(extractErrorMessage({})).toBe(UNKNOWN_ERROR);
    expect(extractErrorMessage(null)).toBe(UNKNOWN_ERROR);
    expect(extractErrorMessage([{ message: 'in a list' }])).toBe(UNKNOWN_ERROR);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('normalizeResponse', () => {
  it('should raise a structured error for a 401 JSON body', async () => {
    const body = { error: { message: 'Invalid API key', code: 'unauthorized' } };

    const error = await normalizeResponse(jsonResponse(body, 401)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AbstractApiError);
    if (error instanceof AbstractApiError) {
      expect(error.status).toBe(401);
      expect(error.message).toBe('Invalid API key');
      expect(error.details).toEqual(body);
      expect(error.toString()).toBe('Abstract API Error 401: Invalid API key');
    }
  });

  it('should raise for an error status even when the body is binary', async () => {
    const error = await normalizeResponse(binaryResponse([0], 'image/png', 500)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AbstractApiError);
    if (error instanceof AbstractApiError) {
      expect(error.status).toBe(500);
      expect(error.message).toBe(UNKNOWN_ERROR);
      expect(error.details).toBeNull();
    }
  });

  it('should carry null details when an error body does not decode', async () => {
    const error = await normalizeResponse(textResponse('<oops', 'application/json', 502)).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(AbstractApiError);
    if (error instanceof AbstractApiError) {
      expect(error.status).toBe(502);
      expect(error.details).toBeNull();
    }
  });

  it('should keep a wrapped text body as details', async () => {
    const error = await normalizeResponse(textResponse('Not Found', 'text/plain', 404)).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(AbstractApiError);
    if (error instanceof AbstractApiError) {
      expect(error.status).toBe(404);
      expect(error.message).toBe(UNKNOWN_ERROR);
      expect(error.details).toEqual({ result: 'Not Found' });
    }
  });

  it('should reject a successful body declared JSON that does not parse', async () => {
    const error = await normalizeResponse(textResponse('{"broken', 'application/json')).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ResponseDecodeError);
    if (error instanceof ResponseDecodeError) {
      expect(error.status).toBe(502);
      expect(error.details).toEqual({ preview: '{"broken' });
    }
  });

  it('should return the decoded body on success', async () => {
    await expect(normalizeResponse(jsonResponse({ ok: true }))).resolves.toEqual({
      kind: 'json',
      data: { ok: true },
    });
  });
});
