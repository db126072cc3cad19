import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Config } from './config/schema.js';
import { ConfigurationError, ErrorCode, ToolError } from './errors/index.js';
import { LifecycleManager } from './lifecycle/index.js';
import type { Logger } from './logger/index.js';
import { callTool, listAllTools } from './tools/index.js';

/**
 * MCP server exposing the interface-state tools over stdio
 */
export class SriovStateMCPServer {
  private readonly server: Server;
  private readonly logger: Logger;
  private readonly config: Config;
  private readonly lifecycle: LifecycleManager;
  private transport?: StdioServerTransport;

  constructor(config: Config, logger: Logger) {
    this.config = config;
    this.logger = logger;

    this.server = new Server(
      {
        name: config.mcp.serverName,
        version: config.mcp.serverVersion,
      },
      {
        capabilities: {
          tools: {
            listChanged: false,
          },
        },
      }
    );

    this.lifecycle = new LifecycleManager(logger);
    this.setupLifecycleHooks();
    this.setupMCPHandlers();
  }

  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('announce', async () => {
      this.logger.info('Initializing MCP server', {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
      });
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.transport) {
        this.logger.info('Closing MCP transport');
        await this.transport.close();
      }
    });
  }

  private setupMCPHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.debug('Received list_tools request');
      return { tools: listAllTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolName = request.params.name;
      const toolLogger = this.logger.child({ tool: toolName });
      toolLogger.debug('Received call_tool request', { args: request.params.arguments });

      try {
        return callTool(toolName, request.params.arguments, toolLogger);
      } catch (error) {
        const toolError = new ToolError(
          `Failed to execute tool ${toolName}`,
          ErrorCode.TOOL_EXECUTION_ERROR,
          { tool: toolName },
          error instanceof Error ? error : undefined
        );
        toolLogger.error('Tool failed', toolError);
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(
                {
                  error: toolError.message,
                  code: toolError.code,
                  message: error instanceof Error ? error.message : 'Unknown error',
                },
                null,
                2
              ),
            },
          ],
          isError: true,
        };
      }
    });
  }

  async start(): Promise<void> {
    await this.lifecycle.startup();

    if (this.config.mcp.transport !== 'stdio') {
      throw new ConfigurationError(`Unsupported transport: ${this.config.mcp.transport}`);
    }

    this.logger.info('Starting MCP server with stdio transport');
    this.transport = new StdioServerTransport();
    await this.server.connect(this.transport);
    this.lifecycle.handleSignals();
    this.logger.info('MCP server started');
  }

  async stop(): Promise<void> {
    await this.lifecycle.shutdown();
  }

  getServer(): Server {
    return this.server;
  }
}
