import { injectable, inject } from "inversify";
import type { ILogger, IShutdownHandler } from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import type { MCPWeatherServer } from "../mcp/weather-server.js";

/**
 * Handler for graceful shutdown of the server process.
 *
 * Triggered by SIGINT/SIGTERM or by the client closing the stdio stream.
 * Closes the MCP server (and with it the transport), then exits. Repeated
 * triggers while a shutdown is in progress are ignored.
 */
@injectable()
export class ShutdownHandler implements IShutdownHandler {
  private shuttingDown = false;

  constructor(
    @inject(TYPES.MCPWeatherServer) private weatherServer: MCPWeatherServer,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async shutdown(exitCode = 0): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.logger.info("Shutting down...");

    try {
      await this.weatherServer.close();
    } catch (error) {
      this.logger.error(
        "Error while closing MCP server",
        error instanceof Error ? error : new Error(String(error)),
      );
      exitCode = exitCode || 1;
    }

    this.logger.info("Shutdown complete");
    process.exit(exitCode);
  }
}
