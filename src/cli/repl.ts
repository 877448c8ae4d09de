import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ILogger, IToolSession } from "../types/interfaces.js";
import { parseDecimal } from "../utils/number.js";
import type { LineReader } from "./line-reader.js";
import {
  parseCommand,
  UNKNOWN_COMMAND,
  type ToolCommand,
} from "./command-parser.js";

export const PROMPT =
  "\nQuery (alerts <STATE> | forecast <LAT> <LON> | quit): ";

export type ReplState =
  | "connecting"
  | "ready"
  | "awaiting_input"
  | "dispatching"
  | "closed";

export interface ReplOutput {
  print(text: string): void;
}

function parseNumber(raw: string): number {
  const value = parseDecimal(raw);
  if (value === undefined) {
    throw new Error(`could not convert '${raw}' to a number`);
  }
  return value;
}

export function resultText(result: CallToolResult): string {
  const texts = result.content.flatMap((block) =>
    block.type === "text" ? [block.text] : [],
  );
  return texts.length > 0 ? texts.join("\n") : "(no text content)";
}

/**
 * Interactive loop that turns typed commands into tool calls.
 *
 * connecting → ready → (awaiting_input → dispatching → ready)* → closed
 *
 * Calls are strictly sequential. A failed command prints `Error: <message>`
 * and the loop carries on; only quit, end of input or Ctrl+C end it. Ctrl+C
 * also abandons a call in flight.
 */
export class WeatherRepl {
  private currentState: ReplState = "connecting";

  constructor(
    private session: IToolSession,
    private reader: LineReader,
    private output: ReplOutput,
    private logger: ILogger,
  ) {}

  get state(): ReplState {
    return this.currentState;
  }

  /**
   * Lists the server's tools once and prints them.
   */
  async start(): Promise<void> {
    const { tools } = await this.session.listTools();
    this.output.print(
      `Connected. Tools available: ${tools.map((tool) => tool.name).join(", ")}`,
    );
    this.transition("ready");
  }

  async run(): Promise<void> {
    try {
      if (this.currentState === "connecting") {
        await this.start();
      }
      let active = true;
      while (active) {
        active = await this.step();
      }
    } finally {
      this.transition("closed");
    }
  }

  /**
   * Reads and handles one line.
   *
   * @returns false once the loop should end
   */
  async step(): Promise<boolean> {
    this.transition("awaiting_input");
    const line = await this.reader.readLine(PROMPT);
    if (line === null) {
      this.transition("closed");
      return false;
    }

    const command = parseCommand(line);
    switch (command.type) {
      case "empty":
        return true;
      case "quit":
        this.transition("closed");
        return false;
      case "usage":
        this.output.print(command.message);
        return true;
      case "unknown":
        this.output.print(UNKNOWN_COMMAND);
        return true;
      case "alerts":
      case "forecast":
        return this.dispatch(command);
    }
  }

  /**
   * @returns false when an interrupt cut the call short
   */
  private async dispatch(command: ToolCommand): Promise<boolean> {
    this.transition("dispatching");
    try {
      const result = await this.untilInterrupted(this.callTool(command));
      this.output.print(resultText(result));
    } catch (error) {
      if (this.reader.interrupted.aborted) {
        this.logger.debug(`Command '${command.type}' interrupted`);
        this.transition("closed");
        return false;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Command '${command.type}' failed: ${message}`);
      this.output.print(`Error: ${message}`);
    }
    this.transition("ready");
    return true;
  }

  private callTool(command: ToolCommand): Promise<CallToolResult> {
    const options = { signal: this.reader.interrupted };
    switch (command.type) {
      case "alerts":
        return this.session.callTool(
          "get_alerts",
          { state: command.state },
          options,
        );
      case "forecast":
        return this.session.callTool(
          "get_forecast",
          {
            latitude: parseNumber(command.latitude),
            longitude: parseNumber(command.longitude),
          },
          options,
        );
    }
  }

  /**
   * Rejects as soon as the reader is interrupted, whether or not the session
   * honours the abort signal.
   */
  private untilInterrupted<T>(work: Promise<T>): Promise<T> {
    const signal = this.reader.interrupted;
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      void work.then(resolve, reject).finally(() => {
        signal.removeEventListener("abort", onAbort);
      });
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  private transition(next: ReplState): void {
    if (next !== this.currentState) {
      this.logger.debug(`REPL: ${this.currentState} -> ${next}`);
      this.currentState = next;
    }
  }
}
