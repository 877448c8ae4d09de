import { injectable, inject } from "inversify";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { ILogger } from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import type { IToolRegistry } from "../tools/tool-registry.js";

export const SERVER_NAME = "weather";
export const SERVER_VERSION = "1.0.0";

/**
 * MCP server exposing the weather tools.
 *
 * `tools/list` and `tools/call` are answered by the tool registry, not by
 * `McpServer.registerTool`. Argument decoding and the unknown-tool error
 * belong to the registry.
 */
@injectable()
export class MCPWeatherServer {
  private server: McpServer;

  constructor(
    @inject(TYPES.ToolRegistry) private toolRegistry: IToolRegistry,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {
    this.server = new McpServer(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
        instructions:
          "Weather data for the United States from the National Weather Service. " +
          "Use get_alerts with a two-letter state code, or get_forecast with coordinates.",
      },
    );

    this.setupTools();
  }

  private setupTools(): void {
    this.server.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.toolRegistry.describe(),
    }));

    this.server.server.setRequestHandler(
      CallToolRequestSchema,
      async (request, extra) => {
        this.logger.debug(`Tool call: ${request.params.name}`);
        return this.toolRegistry.dispatch(
          request.params.name,
          request.params.arguments,
          { sessionId: extra.sessionId },
        );
      },
    );

    this.logger.info(
      `MCP weather tools registered (${this.toolRegistry.getAll().length} tools)`,
    );
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  /**
   * Invoked once the transport closes, whichever side closed it.
   */
  onClose(handler: () => void): void {
    this.server.server.onclose = handler;
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  getServer(): McpServer {
    return this.server;
  }
}
