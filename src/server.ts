import "reflect-metadata";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServerContainer } from "./container/inversify.config.js";
import { TYPES } from "./types/index.js";
import type { ILogger, IShutdownHandler } from "./types/interfaces.js";
import type { MCPWeatherServer } from "./mcp/weather-server.js";
import { loadConfig, mergeEnvConfig } from "./utils/config-loader.js";
import { formatConfigPaths } from "./utils/config-paths.js";
import { parseArgs } from "./utils/cli-args.js";

/**
 * Print help information.
 *
 * console.log is safe here: the process exits before stdout becomes the
 * protocol channel.
 */
function printHelp(): void {
  console.log("Weather MCP server - NWS alerts and forecasts over stdio\n");
  console.log("Usage: weather-mcp-server [options]\n");
  console.log("Options:");
  console.log("  -c, --config-path    Show config file search paths and exit");
  console.log("  -h, --help           Show this help message and exit\n");
  console.log("Environment variables:");
  console.log("  CONFIG_PATH          Override config file location");
  console.log("  LOG_LEVEL            Override log level");
  console.log("  NWS_API_BASE         Override the NWS API base URL");
  console.log("  NWS_USER_AGENT       Override the User-Agent sent to NWS");
  console.log("  NWS_TIMEOUT_MS       Override the HTTP timeout (ms)");
}

async function main() {
  // Handle CLI arguments before loading config
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.showConfigPath) {
    console.log(formatConfigPaths());
    process.exit(0);
  }

  // Load configuration from file and merge with environment variables
  const config = mergeEnvConfig(loadConfig());
  const container = createServerContainer(config);

  const logger = container.get<ILogger>(TYPES.Logger);
  const weatherServer = container.get<MCPWeatherServer>(
    TYPES.MCPWeatherServer,
  );
  const shutdownHandler = container.get<IShutdownHandler>(
    TYPES.ShutdownHandler,
  );

  // Note: connect() automatically calls start() for us
  const transport = new StdioServerTransport();
  weatherServer.onClose(() => {
    void shutdownHandler.shutdown();
  });
  await weatherServer.connect(transport);

  logger.info("Weather MCP server running on stdio");

  // Graceful shutdown
  process.on("SIGINT", () => {
    void shutdownHandler.shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdownHandler.shutdown();
  });
  // The client closing our stdin ends the session
  process.stdin.on("end", () => {
    void shutdownHandler.shutdown();
  });
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
