import { spawn } from "child_process";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

export const projectRoot = resolve(
  dirname(fileURLToPath(import.meta.url)),
  "../../..",
);
export const serverEntrypoint = resolve(projectRoot, "src/server.ts");
export const clientEntrypoint = resolve(projectRoot, "src/client.ts");

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface RunOptions {
  /** Written to stdin, which is then closed. */
  input?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Runs a TypeScript entrypoint through tsx and collects its output.
 */
export function runTsEntrypoint(
  entrypoint: string,
  args: string[],
  options: RunOptions = {},
): Promise<ProcessResult> {
  return new Promise((resolveResult, reject) => {
    const child = spawn(
      process.execPath,
      ["--import", "tsx", entrypoint, ...args],
      {
        cwd: projectRoot,
        env: { ...process.env, LOG_LEVEL: "silent", ...options.env },
        stdio: ["pipe", "pipe", "pipe"],
      },
    );

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    const timeout = setTimeout(() => {
      child.kill();
      reject(
        new Error(`Child process timeout. stdout: ${stdout}, stderr: ${stderr}`),
      );
    }, options.timeoutMs ?? 20000);

    child.on("close", (code) => {
      clearTimeout(timeout);
      resolveResult({ stdout, stderr, exitCode: code });
    });

    child.on("error", (err) => {
      clearTimeout(timeout);
      reject(new Error(`Child process error: ${err.message}`));
    });

    child.stdin.end(options.input ?? "");
  });
}
