import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { getContainer, type ServiceContainer } from './services/index.js';
import { registerTools, handleToolCall } from './tools/index.js';
import { logger } from './utils/logger.js';

/**
 * OutputCheck MCP Server
 *
 * Validates machine-generated content against declarative schemas.
 */
export class OutputCheckServer {
  private server: Server;
  private container: ServiceContainer;

  constructor(container: ServiceContainer = getContainer()) {
    this.container = container;
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: registerTools(),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      const services = await this.container.getAll();
      return handleToolCall(name, args ?? {}, services, extra.signal);
    });
  }

  /**
   * Serve over any transport; start() uses stdio
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async start(): Promise<void> {
    const { config, semanticService } = await this.container.getAll();

    await this.connect(new StdioServerTransport());

    // stdout carries the protocol; the logger writes to stderr
    logger.info('OutputCheck MCP server started', {
      version: SERVER_VERSION,
      schemaDir: config.schemaDir,
      semanticService: semanticService?.name ?? null,
      semanticAvailable: semanticService?.isAvailable() ?? false,
    });
  }

  async stop(): Promise<void> {
    await this.server.close();
  }
}
