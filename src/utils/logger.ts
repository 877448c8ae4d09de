import { injectable, inject } from "inversify";
import pino, { type Logger } from "pino";
import type { AppConfig, ILogger } from "../types/interfaces.js";
import { TYPES } from "../types/index.js";

@injectable()
export class ConsoleLogger implements ILogger {
  private logger: Logger;

  constructor(@inject(TYPES.AppConfig) config: AppConfig) {
    this.logger = pino({
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2, // stdout carries MCP frames (server) and REPL output (client)
        },
      },
    });
  }

  info(message: string): void {
    this.logger.info(message);
  }

  warn(message: string): void {
    this.logger.warn(message);
  }

  error(msgOrErr: string | Error, error?: Error): void {
    if (typeof msgOrErr === "string") {
      if (error) {
        this.logger.error(error, msgOrErr);
      } else {
        this.logger.error(msgOrErr);
      }
    } else {
      this.logger.error(msgOrErr);
    }
  }

  debug(message: string): void {
    this.logger.debug(message);
  }
}
