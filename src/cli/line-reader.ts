import { createInterface, type Interface } from "node:readline";

export interface LineReader {
  /**
   * Shows the prompt and resolves with the next line, or null once input has
   * ended or the reader was closed.
   */
  readLine(prompt: string): Promise<string | null>;

  /**
   * Aborted by a user interrupt (Ctrl+C), never by plain end of input.
   */
  readonly interrupted: AbortSignal;

  /**
   * Ends input and aborts {@link interrupted}.
   */
  interrupt(): void;

  close(): void;
}

/**
 * Line reader over a readline interface. Lines that arrive while nobody is
 * waiting (piped input) are buffered rather than dropped until an interrupt
 * discards them. Each read writes its prompt exactly once.
 */
export class ReadlineLineReader implements LineReader {
  private rl: Interface;
  private buffered: string[] = [];
  private waiters: Array<(line: string | null) => void> = [];
  private closed = false;
  private interruptController = new AbortController();

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output });

    this.rl.on("line", (line) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.buffered.push(line);
      }
    });

    this.rl.on("close", () => {
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter(null);
      }
    });

    this.rl.on("SIGINT", () => {
      this.interrupt();
    });
  }

  get interrupted(): AbortSignal {
    return this.interruptController.signal;
  }

  interrupt(): void {
    if (!this.interrupted.aborted) {
      this.interruptController.abort(new Error("Interrupted"));
    }
    this.buffered = [];
    this.close();
  }

  readLine(prompt: string): Promise<string | null> {
    if (this.interrupted.aborted) {
      return Promise.resolve(null);
    }
    const next = this.buffered.shift();
    if (next !== undefined || this.closed) {
      // Every read shows its prompt, even when the line is already here
      this.output.write(prompt);
      return Promise.resolve(next ?? null);
    }

    this.rl.setPrompt(prompt);
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
