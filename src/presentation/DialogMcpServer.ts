import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Config } from '../config.js';
import { registerDialogTools, type DialogToolDeps } from './tools/DialogTools.js';
import type { Logger } from '../utils/logger.js';

/**
 * MCP stdio surface over the dialog services
 */
export class DialogMcpServer {
  private server: BaseMcpServer;

  constructor(
    config: Config,
    deps: DialogToolDeps,
    private logger: Logger
  ) {
    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });
    registerDialogTools(this.server, deps);
  }

  async start(): Promise<void> {
    await this.server.connect(new StdioServerTransport());
    this.logger.info('MCP server listening on stdio');
  }

  async shutdown(): Promise<void> {
    await this.server.close();
  }
}
