import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import {
  CallToolResultSchema,
  ToolListChangedNotificationSchema,
  type CallToolResult,
  type Implementation,
  type ListToolsResult,
  type ServerCapabilities,
} from "@modelcontextprotocol/sdk/types.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { ILogger, IToolSession } from "../types/interfaces.js";

/**
 * One handshake-established connection to a tool server.
 */
export class WeatherClientSession implements IToolSession {
  private cachedToolList: ListToolsResult | undefined;

  constructor(
    private client: Client,
    private serverName: string,
    private logger: ILogger,
  ) {
    this.setupNotificationHandlers();
  }

  private setupNotificationHandlers(): void {
    this.client.setNotificationHandler(
      ToolListChangedNotificationSchema,
      async () => {
        this.logger.info(
          `Server '${this.serverName}': Tool list changed, invalidating cache`,
        );
        this.cachedToolList = undefined;
      },
    );
  }

  getServerVersion(): Implementation | undefined {
    return this.client.getServerVersion();
  }

  getServerCapabilities(): ServerCapabilities | undefined {
    return this.client.getServerCapabilities();
  }

  async listTools(): Promise<ListToolsResult> {
    if (this.cachedToolList !== undefined) {
      this.logger.debug(
        `Server '${this.serverName}': Returning cached tool list`,
      );
      return this.cachedToolList;
    }

    const allTools: ListToolsResult["tools"] = [];
    let nextCursor: string | undefined = undefined;
    let response: ListToolsResult;

    do {
      response = await this.client.listTools(
        nextCursor ? { cursor: nextCursor } : undefined,
      );
      allTools.push(...response.tools);
      nextCursor = response.nextCursor;
    } while (nextCursor !== undefined);

    const finalResponse: ListToolsResult = {
      ...response, // Preserves _meta from last response
      tools: allTools,
      nextCursor: undefined,
    };

    this.cachedToolList = finalResponse;
    return finalResponse;
  }

  /**
   * Aborting `options.signal` cancels the request on the server and rejects
   * with the abort reason.
   */
  async callTool(
    name: string,
    args: Record<string, unknown>,
    options?: RequestOptions,
  ): Promise<CallToolResult> {
    this.logger.debug(`Server '${this.serverName}': Calling tool ${name}`);
    const response = await this.client.callTool(
      { name, arguments: args },
      CallToolResultSchema,
      options,
    );
    return CallToolResultSchema.parse(response);
  }

  async close(): Promise<void> {
    await this.client.close();
    this.logger.debug(`Server '${this.serverName}': Session closed`);
  }
}
