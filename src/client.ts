import "reflect-metadata";
import { createClientContainer } from "./container/inversify.config.js";
import { TYPES } from "./types/index.js";
import type {
  ILogger,
  IMCPClientConnector,
  IToolSession,
} from "./types/interfaces.js";
import { loadConfig, mergeEnvConfig } from "./utils/config-loader.js";
import { formatConfigPaths } from "./utils/config-paths.js";
import { parseArgs } from "./utils/cli-args.js";
import { resolveServerLaunch } from "./utils/server-launch.js";
import { ReadlineLineReader } from "./cli/line-reader.js";
import { WeatherRepl } from "./cli/repl.js";

const USAGE = "Usage: weather-mcp-client [options] <path-to-server-script>";

function printHelp(): void {
  console.log("Weather MCP client - interactive REPL for the weather server\n");
  console.log(`${USAGE}\n`);
  console.log("Options:");
  console.log("  -c, --config-path    Show config file search paths and exit");
  console.log("  -h, --help           Show this help message and exit\n");
  console.log("Commands:");
  console.log("  alerts <STATE>           Active alerts for a US state, e.g. alerts CA");
  console.log("  forecast <LAT> <LON>     Short forecast, e.g. forecast 37.78 -122.42");
  console.log("  quit                     Exit");
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.showConfigPath) {
    console.log(formatConfigPaths());
    process.exit(0);
  }

  const [serverPath] = args.positionals;
  if (!serverPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const config = mergeEnvConfig(loadConfig());
  const container = createClientContainer(config);

  const logger = container.get<ILogger>(TYPES.Logger);
  const connector = container.get<IMCPClientConnector>(
    TYPES.MCPClientConnector,
  );

  const session: IToolSession = await connector.connectStdio(
    "weather",
    resolveServerLaunch(serverPath),
  );

  const reader = new ReadlineLineReader();
  // Piped input gets no readline SIGINT event. A second Ctrl+C skips the
  // graceful teardown.
  process.on("SIGINT", () => {
    if (reader.interrupted.aborted) {
      process.exit(130);
    }
    reader.interrupt();
  });

  const repl = new WeatherRepl(
    session,
    reader,
    { print: (text) => console.log(text) },
    logger,
  );

  try {
    await repl.run();
  } finally {
    reader.close();
    await session.close();
  }
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
