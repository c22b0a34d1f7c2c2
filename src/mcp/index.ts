export { createMcpServer, type McpServerIdentity } from './server.js';
export { McpToolReporter, type ToolExtra } from './reporter.js';
export { McpSessionStore, type McpSession } from './sessions.js';
export {
  registerTools,
  toToolResult,
  TOOL_NAMES,
  type ToolName,
  type ToolContext,
} from './tools.js';
