// ═══════════════════════════════════════════════════════════════════════════════
// MCP SERVER — Server Instance with Every Abstract API Tool
// ═══════════════════════════════════════════════════════════════════════════════

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SERVER_NAME, SERVER_VERSION } from '../config/index.js';
import type { ClientRegistry } from '../registry/index.js';
import { registerTools } from './tools.js';

export interface McpServerIdentity {
  name: string;
  version: string;
}

const INSTRUCTIONS =
  'Tools for the Abstract API: email, phone and VAT validation, IP geolocation, ' +
  'time zones, public holidays, exchange rates, company enrichment, scraping and screenshots.';

/**
 * Build a server with the logging capability and all tools. Every server
 * created from the same registry shares its cached clients.
 */
export function createMcpServer(
  registry: ClientRegistry,
  identity: McpServerIdentity = { name: SERVER_NAME, version: SERVER_VERSION }
): McpServer {
  const server = new McpServer(identity, {
    capabilities: { logging: {} },
    instructions: INSTRUCTIONS,
  });
  registerTools(server, registry);
  return server;
}
