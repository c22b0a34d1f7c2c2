// ═══════════════════════════════════════════════════════════════════════════════
// HTTP SESSION — Shared Fetch Session with Per-Request Timeouts
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { AbstractApiError } from './errors.js';
import { normalizeResponse, type DecodedBody } from './normalize.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface HttpSessionOptions {
  /** Default request timeout in ms */
  timeoutMs: number;

  /** Headers sent with every request */
  headers?: Record<string, string>;
}

export interface GetOptions {
  /** Overrides the session timeout for this request only */
  timeoutMs?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function buildUrl(url: string, params: QueryParams): URL {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target;
}

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    // undici reports "fetch failed" and keeps the socket error as the cause
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

// ─────────────────────────────────────────────────────────────────────────────────
// SESSION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One logical connection session: default headers, a default timeout and the
 * set of requests in flight. Safe for concurrent requests; each request owns
 * its AbortController.
 */
export class HttpSession {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;
  private readonly logger = getLogger({ component: 'client' });

  constructor(options: HttpSessionOptions) {
    this.timeoutMs = options.timeoutMs;
    this.headers = { ...options.headers };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get activeRequests(): number {
    return this.inFlight.size;
  }

  get defaultTimeoutMs(): number {
    return this.timeoutMs;
  }

  /**
   * Issue a GET and normalize the response.
   *
   * @throws AbstractApiError on status >= 400, and with status 500 on any transport failure
   */
  async get(url: string, params: QueryParams = {}, options: GetOptions = {}): Promise<DecodedBody> {
    if (this.closed) {
      throw new AbstractApiError(500, 'Network error: session is closed');
    }

    const target = buildUrl(url, params);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    this.inFlight.add(controller);
    const startTime = Date.now();

    try {
      const response = await fetch(target, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
      });

      const body = await normalizeResponse(response);

      this.logger.debug('Request completed', {
        endpoint: `${target.origin}${target.pathname}`,
        status: response.status,
        kind: body.kind,
        durationMs: Date.now() - startTime,
      });

      return body;
    } catch (error) {
      if (error instanceof AbstractApiError) {
        throw error;
      }

      let reason: string;
      if (timedOut) {
        reason = `request timed out after ${timeoutMs}ms`;
      } else if (this.closed) {
        reason = 'session closed during request';
      } else {
        reason = describeFailure(error);
      }

      throw new AbstractApiError(500, `Network error: ${reason}`, null, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      this.inFlight.delete(controller);
    }
  }

  /**
   * Abort requests in flight and refuse new ones. Idempotent.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}
