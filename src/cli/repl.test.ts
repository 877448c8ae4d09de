import { describe, it, expect, vi, beforeEach } from "vitest";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { PROMPT, WeatherRepl, resultText } from "./repl.js";
import type { LineReader } from "./line-reader.js";
import type { ILogger, IToolSession } from "../types/interfaces.js";

const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

/**
 * Reader that replays a fixed script, then reports end of input.
 */
class ScriptedReader implements LineReader {
  prompts: string[] = [];
  closed = false;
  private controller = new AbortController();

  constructor(private lines: string[]) {}

  get interrupted(): AbortSignal {
    return this.controller.signal;
  }

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.closed ? null : (this.lines.shift() ?? null);
  }

  interrupt(): void {
    this.controller.abort(new Error("Interrupted"));
    this.close();
  }

  close(): void {
    this.closed = true;
  }
}

const text = (value: string, isError = false): CallToolResult =>
  isError
    ? { content: [{ type: "text", text: value }], isError: true }
    : { content: [{ type: "text", text: value }] };

describe("WeatherRepl", () => {
  let session: IToolSession;
  let printed: string[];
  let logger: ILogger;

  beforeEach(() => {
    session = {
      listTools: vi.fn().mockResolvedValue({
        tools: [
          { name: "get_alerts", inputSchema: { type: "object" } },
          { name: "get_forecast", inputSchema: { type: "object" } },
        ],
      }),
      callTool: vi.fn().mockResolvedValue(text("ok")),
      close: vi.fn(),
    };
    printed = [];
    logger = createMockLogger();
  });

  function createRepl(lines: string[]) {
    const reader = new ScriptedReader(lines);
    const repl = new WeatherRepl(
      session,
      reader,
      { print: (line) => printed.push(line) },
      logger,
    );
    return { repl, reader };
  }

  it("should list tools on start", async () => {
    const { repl } = createRepl([]);
    expect(repl.state).toBe("connecting");

    await repl.start();

    expect(printed).toEqual([
      "Connected. Tools available: get_alerts, get_forecast",
    ]);
    expect(repl.state).toBe("ready");
  });

  it("should send alerts commands to get_alerts and print the text verbatim", async () => {
    vi.mocked(session.callTool).mockResolvedValue(
      text("Event: Heat\n\n---\n\nEvent: Wind"),
    );
    const { repl } = createRepl(["alerts CA"]);

    await repl.run();

    expect(session.callTool).toHaveBeenCalledWith(
      "get_alerts",
      { state: "CA" },
      { signal: expect.any(AbortSignal) },
    );
    expect(printed[1]).toBe("Event: Heat\n\n---\n\nEvent: Wind");
  });

  it("should send forecast coordinates as numbers", async () => {
    const { repl } = createRepl(["forecast 37.78 -122.42"]);

    await repl.run();

    expect(session.callTool).toHaveBeenCalledWith(
      "get_forecast",
      { latitude: 37.78, longitude: -122.42 },
      { signal: expect.any(AbortSignal) },
    );
  });

  it("should print error results like any other text", async () => {
    vi.mocked(session.callTool).mockResolvedValue(
      text(
        "Please provide a 2-letter US state/territory code (e.g., CA, NY).",
        true,
      ),
    );
    const { repl } = createRepl(["alerts California"]);

    await repl.run();

    expect(printed[1]).toBe(
      "Please provide a 2-letter US state/territory code (e.g., CA, NY).",
    );
  });

  it("should print usage and unknown-command hints without calling tools", async () => {
    const { repl } = createRepl(["alerts", "forecast 1", "hello", "", "   "]);

    await repl.run();

    expect(printed.slice(1)).toEqual([
      "Usage: alerts <STATE>",
      "Usage: forecast <LAT> <LON>",
      "Unknown command. Try: alerts CA  |  forecast 37.78 -122.42",
    ]);
    expect(session.callTool).not.toHaveBeenCalled();
  });

  it("should report unparseable coordinates and keep going", async () => {
    const { repl } = createRepl(["forecast abc 1", "alerts CA"]);

    await repl.run();

    expect(printed[1]).toBe("Error: could not convert 'abc' to a number");
    expect(session.callTool).toHaveBeenCalledTimes(1);
    expect(printed[2]).toBe("ok");
  });

  it("should report a failed call and keep going", async () => {
    vi.mocked(session.callTool)
      .mockRejectedValueOnce(new Error("MCP error -32602: Unknown tool"))
      .mockResolvedValueOnce(text("second"));
    const { repl } = createRepl(["alerts CA", "alerts NY"]);

    await repl.run();

    expect(printed.slice(1)).toEqual([
      "Error: MCP error -32602: Unknown tool",
      "second",
    ]);
  });

  it("should stop on quit without reading further", async () => {
    const { repl, reader } = createRepl(["QUIT", "alerts CA"]);

    await repl.run();

    expect(repl.state).toBe("closed");
    expect(reader.prompts).toEqual([PROMPT]);
    expect(session.callTool).not.toHaveBeenCalled();
  });

  it("should stop at end of input", async () => {
    const { repl, reader } = createRepl(["alerts CA"]);

    await repl.run();

    expect(repl.state).toBe("closed");
    expect(reader.prompts).toHaveLength(2);
  });

  it("should walk through the dispatch states", async () => {
    let stateDuringCall: string | undefined;
    const { repl } = createRepl(["alerts CA"]);
    vi.mocked(session.callTool).mockImplementation(async () => {
      stateDuringCall = repl.state;
      return text("ok");
    });
    await repl.start();

    expect(await repl.step()).toBe(true);
    expect(stateDuringCall).toBe("dispatching");
    expect(repl.state).toBe("ready");

    expect(await repl.step()).toBe(false);
    expect(repl.state).toBe("closed");
  });

  it("should close if listing tools fails", async () => {
    vi.mocked(session.listTools).mockRejectedValue(new Error("broken pipe"));
    const { repl } = createRepl([]);

    await expect(repl.run()).rejects.toThrow("broken pipe");
    expect(repl.state).toBe("closed");
    expect(session.callTool).not.toHaveBeenCalled();
  });

  describe("interrupts", () => {
    it("should abandon a call that never settles", async () => {
      vi.mocked(session.callTool).mockReturnValue(new Promise(() => {}));
      const { repl, reader } = createRepl(["alerts CA", "alerts NY"]);

      const running = repl.run();
      await vi.waitFor(() => expect(repl.state).toBe("dispatching"));
      reader.interrupt();
      await running;

      expect(repl.state).toBe("closed");
      expect(printed).toEqual([
        "Connected. Tools available: get_alerts, get_forecast",
      ]);
      expect(session.callTool).toHaveBeenCalledTimes(1);
      expect(reader.prompts).toHaveLength(1);
    });

    it("should hand the interrupt signal to the session", async () => {
      let received: AbortSignal | undefined;
      vi.mocked(session.callTool).mockImplementation(
        (_name, _args, options) => {
          received = options?.signal;
          return new Promise(() => {});
        },
      );
      const { repl, reader } = createRepl(["forecast 1 2"]);

      const running = repl.run();
      await vi.waitFor(() => expect(received).toBeDefined());
      reader.interrupt();
      await running;

      expect(received?.aborted).toBe(true);
    });

    it("should close quietly when the session rejects on abort", async () => {
      vi.mocked(session.callTool).mockImplementation(
        (_name, _args, options) =>
          new Promise((_resolve, reject) => {
            options?.signal?.addEventListener("abort", () =>
              reject(new Error("Request cancelled")),
            );
          }),
      );
      const { repl, reader } = createRepl(["alerts CA"]);

      const running = repl.run();
      await vi.waitFor(() => expect(repl.state).toBe("dispatching"));
      reader.interrupt();
      await running;

      expect(repl.state).toBe("closed");
      expect(printed).toEqual([
        "Connected. Tools available: get_alerts, get_forecast",
      ]);
    });

    it("should not read again after an interrupt at the prompt", async () => {
      const { repl, reader } = createRepl(["alerts CA"]);
      reader.interrupt();

      await repl.run();

      expect(repl.state).toBe("closed");
      expect(session.callTool).not.toHaveBeenCalled();
    });
  });
});

describe("resultText", () => {
  it("should join text blocks with newlines", () => {
    expect(
      resultText({
        content: [
          { type: "text", text: "a" },
          { type: "image", data: "AAAA", mimeType: "image/png" },
          { type: "text", text: "b" },
        ],
      }),
    ).toBe("a\nb");
  });

  it("should say when there is no text", () => {
    expect(resultText({ content: [] })).toBe("(no text content)");
  });
});
