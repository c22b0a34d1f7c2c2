// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — JSON-RPC Error Responses for the HTTP Transport
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getLogger } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * JSON-RPC error codes used by the transport layer.
 */
export const JSON_RPC_ERRORS = {
  /** Server-defined: bad or missing session */
  badRequest: -32000,
  internal: -32603,
} as const;

export interface JsonRpcErrorBody {
  jsonrpc: '2.0';
  error: { code: number; message: string };
  id: null;
}

export function jsonRpcError(code: number, message: string): JsonRpcErrorBody {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

const logger = getLogger({ component: 'http' });

/**
 * Forward a rejected handler promise to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Last middleware in the chain. Answers with a JSON-RPC internal error unless
 * the transport has already started the response.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  logger.error('Request failed', err, { method: req.method, path: req.path });

  if (res.headersSent) {
    return;
  }
  res.status(500).json(jsonRpcError(JSON_RPC_ERRORS.internal, 'Internal server error'));
}
