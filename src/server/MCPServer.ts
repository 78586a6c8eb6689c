import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'winston';
import { createLogger } from '../utils/logger.js';
import { toMcpToolResult } from '../utils/McpToolResult.js';
import { VERSION } from '../version.js';

export type ToolHandler = (params: unknown) => Promise<unknown>;

/**
 * Tool registry entry
 */
interface ToolEntry {
  tool: Tool;
  handler: ToolHandler;
}

interface TrackedListener {
  target: NodeJS.EventEmitter;
  event: string;
  handler: (...args: unknown[]) => void;
}

export interface MCPServerOptions {
  skipTransportErrorHandling?: boolean;
  skipGracefulShutdown?: boolean;
  logger?: Logger;
}

/**
 * stdio MCP server exposing the sandbox tools
 */
export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private logger: Logger;
  private tools: Map<string, ToolEntry> = new Map();
  private isShuttingDown = false;
  private options: MCPServerOptions;
  private eventListeners: TrackedListener[] = [];

  constructor(options: MCPServerOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? createLogger();

    this.server = new Server(
      {
        name: 'sandbox-exec-mcp',
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );

    this.transport = new StdioServerTransport();

    // Add custom error handler to the transport (skip in tests)
    if (!options.skipTransportErrorHandling) {
      this.setupTransportErrorHandling();
    }

    this.setupHandlers();

    // Set up graceful shutdown (skip in tests to avoid process listeners)
    if (!this.options.skipGracefulShutdown) {
      this.setupGracefulShutdown();
    }

    this.logger.info('MCPServer initialized');
  }

  /**
   * Add an event listener and track it for cleanup
   */
  private addTrackedListener(
    target: NodeJS.EventEmitter,
    event: string,
    handler: (...args: unknown[]) => void,
  ): void {
    target.on(event, handler);
    this.eventListeners.push({ target, event, handler });
  }

  /**
   * Remove all tracked event listeners
   */
  private removeAllListeners(): void {
    for (const { target, event, handler } of this.eventListeners) {
      target.removeListener(event, handler);
    }
    this.eventListeners = [];
  }

  /**
   * Set up custom error handling for the transport
   */
  private setupTransportErrorHandling(): void {
    // StdioServerTransport uses the process stdin/stdout directly
    this.addTrackedListener(process.stdin, 'error', (error) => {
      this.logger.error('Transport stdin error:', error);
    });

    this.addTrackedListener(process.stdout, 'error', (error) => {
      this.logger.error('Transport stdout error:', error);
    });

    // The client went away; nothing left to serve
    this.addTrackedListener(process.stdin, 'close', () => {
      this.logger.warn('Transport stdin closed');
      this.stop().catch((error: unknown) => {
        this.logger.error('Failed to stop after stdin closed', error);
      });
    });
  }

  /**
   * Set up request handlers for MCP protocol
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = Array.from(this.tools.values()).map((entry) => entry.tool);
      this.logger.debug(`Listing ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolEntry = this.tools.get(request.params.name);

      if (!toolEntry) {
        const error = `Tool not found: ${request.params.name}`;
        this.logger.error(error);
        throw new Error(error);
      }

      // Arguments carry guest source; log only their names
      this.logger.info(`Executing tool: ${request.params.name}`, {
        arguments: Object.keys(request.params.arguments ?? {}),
      });

      try {
        const result = await toolEntry.handler(request.params.arguments);
        return toMcpToolResult(result);
      } catch (error) {
        this.logger.error(`Tool execution failed: ${request.params.name}`, error);
        throw error;
      }
    });
  }

  /**
   * Register a tool with the MCP server
   */
  public registerTool(tool: Tool, handler: ToolHandler): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Tool already registered: ${tool.name}, overwriting`);
    }

    this.tools.set(tool.name, { tool, handler });
    this.logger.info(`Registered tool: ${tool.name}`);
  }

  /**
   * Get all registered tools
   */
  public getTools(): Tool[] {
    return Array.from(this.tools.values()).map((t) => t.tool);
  }

  /**
   * Execute a tool directly, bypassing the transport
   */
  public async executeTool(toolName: string, params: unknown): Promise<unknown> {
    const toolEntry = this.tools.get(toolName);
    if (!toolEntry) {
      throw new Error(`Tool not found: ${toolName}`);
    }
    return toolEntry.handler(params);
  }

  /**
   * Start the MCP server
   */
  public async start(): Promise<void> {
    this.logger.info('Starting MCP server...');

    try {
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', error);
      throw error;
    }
  }

  /**
   * Stop the MCP server
   */
  public async stop(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Stopping MCP server...');

    this.removeAllListeners();

    await this.server.close();
    this.logger.info('MCP server stopped');
  }

  /**
   * Set up graceful shutdown handling
   */
  private setupGracefulShutdown(): void {
    const shutdown = async (signal: string) => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      try {
        await this.stop();
      } catch (error) {
        this.logger.error('Error during shutdown', error);
      }
      process.exit(0);
    };

    this.addTrackedListener(process, 'SIGINT', () => shutdown('SIGINT'));
    this.addTrackedListener(process, 'SIGTERM', () => shutdown('SIGTERM'));

    this.addTrackedListener(process, 'uncaughtException', (error) => {
      this.logger.error('Uncaught exception:', error);
      return shutdown('uncaughtException');
    });

    this.addTrackedListener(process, 'unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection:', reason);
      return shutdown('unhandledRejection');
    });
  }

  /**
   * Get the logger instance
   */
  public getLogger(): Logger {
    return this.logger;
  }

  /**
   * Get the underlying MCP server instance
   */
  public getServer(): Server {
    return this.server;
  }

  /**
   * Clean up resources and event listeners (useful for tests)
   */
  public cleanup(): void {
    this.removeAllListeners();
  }
}
