import "reflect-metadata";
import { ConsoleLogger } from "./logger.js";
import { DEFAULT_CONFIG } from "./config-loader.js";

// This script is run in a child process to test stdout/stderr separation
const logger = new ConsoleLogger({ ...DEFAULT_CONFIG, logLevel: "debug" });

logger.info("test info");
logger.warn("test warn");
logger.error("test error");
logger.debug("test debug");
logger.error(new Error("test error object"));
logger.error("test context", new Error("test error with context"));

// Wait for pino to flush before exiting
await new Promise((resolve) => setTimeout(resolve, 500));
