// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE NORMALIZATION — Content-Type Sniffing & Error Extraction
// ═══════════════════════════════════════════════════════════════════════════════

import { tryCatch } from '../../types/result.js';
import { AbstractApiError, ResponseDecodeError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Wrapper used for any body that is plain text rather than JSON.
 */
export interface TextResult {
  result: string;
}

export type NormalizedBody =
  | { readonly kind: 'binary'; readonly bytes: Uint8Array; readonly contentType: string }
  | { readonly kind: 'json'; readonly data: unknown }
  | { readonly kind: 'text'; readonly data: TextResult }
  | { readonly kind: 'undecodable'; readonly text: string };

/**
 * A body that passed status and decoding checks.
 */
export type DecodedBody = Exclude<NormalizedBody, { kind: 'undecodable' }>;

export const UNKNOWN_ERROR = 'Unknown error';

// ─────────────────────────────────────────────────────────────────────────────────
// BODY CLASSIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

export function isBinaryContentType(contentType: string): boolean {
  return contentType.includes('image') || contentType.includes('application/octet-stream');
}

/**
 * Classify and read a response body by its declared content type.
 */
export async function readBody(response: Response): Promise<NormalizedBody> {
  const contentType = response.headers.get('content-type') ?? '';

  if (isBinaryContentType(contentType)) {
    const buffer = await response.arrayBuffer();
    return { kind: 'binary', bytes: new Uint8Array(buffer), contentType };
  }

  const text = await response.text();

  if (contentType.includes('application/json')) {
    const parsed = tryCatch((): unknown => JSON.parse(text));
    return parsed.ok ? { kind: 'json', data: parsed.value } : { kind: 'undecodable', text };
  }

  if (contentType.includes('text/plain')) {
    return { kind: 'text', data: { result: text } };
  }

  // Undeclared or other types: sniff for a JSON document
  if (text.startsWith('{') || text.startsWith('[')) {
    const parsed = tryCatch((): unknown => JSON.parse(text));
    if (parsed.ok) {
      return { kind: 'json', data: parsed.value };
    }
  }

  return { kind: 'text', data: { result: text } };
}

/**
 * The decoded document a body stands for: bytes, parsed JSON, or `{ result: text }`.
 * Undecodable bodies have no document.
 */
export function documentOf(body: NormalizedBody): unknown {
  switch (body.kind) {
    case 'binary':
      return body.bytes;
    case 'json':
    case 'text':
      return body.data;
    case 'undecodable':
      return null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR EXTRACTION
// ─────────────────────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Human-readable message of an error body. Precedence:
 * `error.message` (when `error` is an object), `message`, `title`, `String(error)`.
 */
export function extractErrorMessage(document: unknown): string {
  if (!isRecord(document)) {
    return UNKNOWN_ERROR;
  }

  const { error } = document;
  if (isRecord(error)) {
    return nonEmptyString(error.message) ?? UNKNOWN_ERROR;
  }

  const message = nonEmptyString(document.message) ?? nonEmptyString(document.title);
  if (message) {
    return message;
  }

  if (error !== undefined && error !== null) {
    return String(error);
  }

  return UNKNOWN_ERROR;
}

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read a response and either return its decoded body or throw.
 *
 * Any status >= 400 throws {@link AbstractApiError} carrying the decoded body
 * (null when the body is binary or undecodable). A 2xx body declared as JSON
 * that does not parse throws {@link ResponseDecodeError}.
 */
export async function normalizeResponse(response: Response): Promise<DecodedBody> {
  const body = await readBody(response);

  if (response.status >= 400) {
    const document = body.kind === 'json' || body.kind === 'text' ? body.data : null;
    throw new AbstractApiError(response.status, extractErrorMessage(document), document);
  }

  if (body.kind === 'undecodable') {
    throw new ResponseDecodeError('Response declared JSON but could not be parsed', {
      preview: body.text.slice(0, 200),
    });
  }

  return body;
}
