// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — Stubbed fetch and Canned Responses
// ═══════════════════════════════════════════════════════════════════════════════

import { vi, type Mock } from 'vitest';
import { configureLogger, resetLogger } from '../../../observability/logging/index.js';

export type FetchMock = Mock<typeof fetch>;

export function jsonResponse(body: unknown, status = 200, contentType = 'application/json'): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': contentType } });
}

export function textResponse(text: string, contentType: string, status = 200): Response {
  return new Response(text, { status, headers: { 'content-type': contentType } });
}

export function binaryResponse(bytes: number[], contentType: string, status = 200): Response {
  return new Response(new Uint8Array(bytes), { status, headers: { 'content-type': contentType } });
}

/**
 * Replace global fetch with a mock answering the given responses in order.
 * An Error entry makes that call reject.
 */
export function stubFetch(...responses: Array<Response | Error>): FetchMock {
  const mock = vi.fn<typeof fetch>();
  for (const response of responses) {
    if (response instanceof Error) {
      mock.mockRejectedValueOnce(response);
    } else {
      mock.mockResolvedValueOnce(response);
    }
  }
  vi.stubGlobal('fetch', mock);
  return mock;
}

/**
 * fetch mock whose calls stay pending until their signal aborts.
 */
export function stubHangingFetch(): FetchMock {
  const mock = vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(new DOMException('This operation was aborted', 'AbortError'));
        });
      })
  );
  vi.stubGlobal('fetch', mock);
  return mock;
}

export interface RecordedRequest {
  url: URL;
  init: RequestInit | undefined;
}

export function requestOf(mock: FetchMock, index = 0): RecordedRequest {
  const call = mock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${mock.mock.calls.length} time(s), wanted call #${index + 1}`);
  }
  const [input, init] = call;
  const url = input instanceof URL ? input : new URL(typeof input === 'string' ? input : input.url);
  return { url, init };
}

export function endpointOf(request: RecordedRequest): string {
  return `${request.url.origin}${request.url.pathname}`;
}

export function silenceLogs(): void {
  configureLogger({ sink: () => undefined });
}

export function restoreLogs(): void {
  resetLogger();
}
