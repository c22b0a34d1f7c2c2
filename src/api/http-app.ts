// ═══════════════════════════════════════════════════════════════════════════════
// HTTP APP — Streamable HTTP MCP Endpoint and Liveness Route
// ═══════════════════════════════════════════════════════════════════════════════
//
// POST   /mcp  initialize a session, or send messages to an existing one
// GET    /mcp  server-to-client event stream of a session
// DELETE /mcp  end a session
// GET    /health
//
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express, type Request, type Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { v4 as uuidv4 } from 'uuid';
import { getLogger } from '../observability/logging/index.js';
import { createMcpServer, McpSessionStore } from '../mcp/index.js';
import type { ClientRegistry } from '../registry/index.js';
import { createHealthRouter } from './routes/health.js';
import { asyncHandler, errorHandler, jsonRpcError, JSON_RPC_ERRORS } from './middleware/error-handler.js';

export const SESSION_HEADER = 'mcp-session-id';

const logger = getLogger({ component: 'http' });

export interface McpHandlers {
  post: (req: Request, res: Response) => Promise<void>;
  session: (req: Request, res: Response) => Promise<void>;
}

function sessionIdOf(req: Request): string | undefined {
  return req.header(SESSION_HEADER);
}

/**
 * Route handlers for `/mcp`. A session gets its own McpServer; all of them
 * share `registry`.
 */
export function createMcpHandlers(registry: ClientRegistry, sessions: McpSessionStore): McpHandlers {
  const post = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    if (existing) {
      await existing.transport.handleRequest(req, res, req.body);
      return;
    }

    if (sessionId !== undefined || !isInitializeRequest(req.body)) {
      res.status(400).json(jsonRpcError(JSON_RPC_ERRORS.badRequest, 'Bad Request: No valid session ID provided'));
      return;
    }

    const server = createMcpServer(registry);
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => uuidv4(),
      onsessioninitialized: id => sessions.add(id, { transport, server }),
    });
    transport.onclose = () => {
      if (transport.sessionId) {
        sessions.remove(transport.sessionId);
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  };

  const session = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    if (!existing) {
      res.status(400).json(jsonRpcError(JSON_RPC_ERRORS.badRequest, 'Invalid or missing session ID'));
      return;
    }
    await existing.transport.handleRequest(req, res);
  };

  return { post, session };
}

export interface HttpApp {
  app: Express;
  sessions: McpSessionStore;
}

export function createHttpApp(registry: ClientRegistry): HttpApp {
  const app = express();
  const sessions = new McpSessionStore();
  const handlers = createMcpHandlers(registry, sessions);

  app.use(express.json({ limit: '1mb' }));
  app.use(createHealthRouter());

  app.post('/mcp', asyncHandler(handlers.post));
  app.get('/mcp', asyncHandler(handlers.session));
  app.delete('/mcp', asyncHandler(handlers.session));

  app.use(errorHandler);

  logger.debug('HTTP app created');
  return { app, sessions };
}
