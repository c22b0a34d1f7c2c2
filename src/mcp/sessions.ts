// ═══════════════════════════════════════════════════════════════════════════════
// MCP SESSIONS — Streamable HTTP Sessions by Id
// ═══════════════════════════════════════════════════════════════════════════════

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { getLogger } from '../observability/logging/index.js';

export interface McpSession {
  readonly transport: StreamableHTTPServerTransport;
  readonly server: McpServer;
}

export class McpSessionStore {
  private readonly sessions = new Map<string, McpSession>();
  private readonly logger = getLogger({ component: 'http' });

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): McpSession | undefined {
    return this.sessions.get(sessionId);
  }

  add(sessionId: string, session: McpSession): void {
    this.sessions.set(sessionId, session);
    this.logger.info('Session opened', { sessionId, open: this.sessions.size });
  }

  remove(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.logger.info('Session closed', { sessionId, open: this.sessions.size });
    }
    return removed;
  }

  /**
   * Close every session's server (and with it its transport).
   */
  async closeAll(): Promise<void> {
    const entries = [...this.sessions.entries()];
    this.sessions.clear();

    const results = await Promise.allSettled(entries.map(([, session]) => session.server.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error('Failed to close session', result.reason, { sessionId: entries[index]?.[0] });
      }
    });
  }
}
