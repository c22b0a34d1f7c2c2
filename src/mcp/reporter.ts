// ═══════════════════════════════════════════════════════════════════════════════
// TOOL REPORTER — Server Log + MCP Log Notifications to the Caller
// ═══════════════════════════════════════════════════════════════════════════════

import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { LoggingLevel, ServerNotification, ServerRequest } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_NAME } from '../config/index.js';
import { getLogger } from '../observability/logging/index.js';
import type { ToolReporter } from '../registry/index.js';

export type ToolExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

type Notify = ToolExtra['sendNotification'];

/**
 * Reports to the structured log and, as `notifications/message`, to the MCP
 * client that invoked the tool.
 */
export class McpToolReporter implements ToolReporter {
  private readonly logger = getLogger({ component: 'tools' });

  constructor(
    private readonly notify: Notify,
    private readonly tool: string
  ) {}

  static fromExtra(extra: ToolExtra, tool: string): McpToolReporter {
    return new McpToolReporter(extra.sendNotification, tool);
  }

  async warning(message: string): Promise<void> {
    this.logger.warn(message, { tool: this.tool });
    await this.send('warning', message);
  }

  async error(message: string): Promise<void> {
    this.logger.error(message, undefined, { tool: this.tool });
    await this.send('error', message);
  }

  private async send(level: LoggingLevel, data: string): Promise<void> {
    try {
      await this.notify({
        method: 'notifications/message',
        params: { level, logger: SERVER_NAME, data },
      });
    } catch (error) {
      // The tool's own outcome must still reach the caller
      this.logger.warn('Could not deliver log notification', {
        tool: this.tool,
        level,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
