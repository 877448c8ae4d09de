import { injectable, inject } from "inversify";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type {
  ILogger,
  IMCPClientConnector,
  StdioLaunchParams,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import { WeatherClientSession } from "./client-session.js";

export const CLIENT_NAME = "weather-mcp-client";
export const CLIENT_VERSION = "1.0.0";

/**
 * Opens MCP sessions. `Client.connect` runs the initialize handshake, so a
 * returned session is ready for `tools/list` and `tools/call`.
 */
@injectable()
export class MCPClientConnector implements IMCPClientConnector {
  constructor(@inject(TYPES.Logger) private logger: ILogger) {}

  async connect(
    name: string,
    transport: Transport,
  ): Promise<WeatherClientSession> {
    const sdkClient = new Client(
      {
        name: CLIENT_NAME,
        version: CLIENT_VERSION,
      },
      {
        capabilities: {},
      },
    );

    try {
      await sdkClient.connect(transport);
    } catch (error) {
      this.logger.error(
        `Failed to connect MCP client ${name}`,
        error instanceof Error ? error : new Error(String(error)),
      );
      await transport.close();
      throw error;
    }

    const server = sdkClient.getServerVersion();
    this.logger.debug(
      `MCP client ${name} initialized with server ${server?.name ?? "unknown"} ${server?.version ?? ""}`,
    );

    return new WeatherClientSession(sdkClient, name, this.logger);
  }

  /**
   * Spawns the server process and connects to it over its stdin/stdout.
   */
  async connectStdio(
    name: string,
    params: StdioLaunchParams,
  ): Promise<WeatherClientSession> {
    const transport = new StdioClientTransport({
      command: params.command,
      args: params.args,
      env: params.env,
      cwd: params.cwd,
    });

    const session = await this.connect(name, transport);

    this.logger.info(
      `MCP client ${name} connected to stdio process: ${params.command} ${params.args?.join(" ") || ""}`,
    );
    return session;
  }
}
