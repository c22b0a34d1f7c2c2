#!/usr/bin/env node
// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT — Abstract API MCP Server
// ═══════════════════════════════════════════════════════════════════════════════
//
//   MCP_TRANSPORT=stdio (default)  one session over stdin/stdout
//   MCP_TRANSPORT=http             Streamable HTTP on HOST:PORT at /mcp, plus /health
//
// ═══════════════════════════════════════════════════════════════════════════════

import 'dotenv/config';
import type { Server } from 'node:http';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { configureLogger, getLogger } from './observability/logging/index.js';
import { ClientRegistry } from './registry/index.js';
import { createMcpServer } from './mcp/index.js';
import { createHttpApp } from './api/http-app.js';
import {
  ShutdownHooks,
  createRegistryCloseHook,
  createServerCloseHook,
  installSignalHandlers,
  performShutdown,
} from './infrastructure/shutdown/index.js';

const logger = getLogger({ component: 'main' });

async function startStdio(registry: ClientRegistry, hooks: ShutdownHooks, config: AppConfig): Promise<void> {
  const server = createMcpServer(registry);
  const transport = new StdioServerTransport();

  hooks.register('mcp-stdio', () => server.close(), { priority: 'critical' });

  // stdin closing means the client is gone
  server.server.onclose = () => {
    if (!hooks.inProgress) {
      performShutdown(hooks, 'transport-closed', config.shutdown).catch((error: unknown) => {
        logger.fatal('Shutdown failed', error);
        process.exit(1);
      });
    }
  };

  await server.connect(transport);
  logger.info('Server running on stdio', { version: config.server.version });
}

async function startHttp(registry: ClientRegistry, hooks: ShutdownHooks, config: AppConfig): Promise<void> {
  const { app, sessions } = createHttpApp(registry);
  const { host, port } = config.server;

  const listener = await new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once('error', reject);
  });

  hooks.register('http-server', createServerCloseHook(listener), { priority: 'critical' });
  hooks.register('mcp-sessions', () => sessions.closeAll(), { priority: 'critical' });

  logger.info('Server listening', { host, port, endpoint: '/mcp', version: config.server.version });
}

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger({
    level: config.env.debugMode ? 'debug' : 'info',
    pretty: !config.env.isProduction,
    environment: config.env.environment,
  });

  const registry = new ClientRegistry();
  const hooks = new ShutdownHooks();
  hooks.register('abstract-clients', createRegistryCloseHook(registry), { priority: 'high' });
  installSignalHandlers(hooks, config.shutdown);

  if (config.server.transport === 'http') {
    await startHttp(registry, hooks, config);
  } else {
    await startStdio(registry, hooks, config);
  }
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start server', error);
  process.exit(1);
});
