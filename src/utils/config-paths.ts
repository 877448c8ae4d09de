import envPaths from "env-paths";
import { existsSync } from "fs";
import { resolve } from "path";

const CONFIG_FILENAME = "config.json";

// No "-nodejs" suffix: the directory is just "weather-mcp"
const platformDir = envPaths("weather-mcp", { suffix: "" }).config;

export type ConfigSource = "env" | "platform";

export interface ConfigPathInfo {
  path: string;
  source: ConfigSource;
  exists: boolean;
}

const SOURCE_LABELS: Record<ConfigSource, string> = {
  env: "CONFIG_PATH",
  platform: "platform directory",
};

function candidate(source: ConfigSource, path: string): ConfigPathInfo {
  return { path, source, exists: existsSync(path) };
}

/**
 * Config file candidates, highest priority first: `CONFIG_PATH`, then
 * `config.json` in the platform config directory
 * (`$XDG_CONFIG_HOME/weather-mcp` on Linux, `~/Library/Application Support/weather-mcp`
 * on macOS, `%APPDATA%\weather-mcp` on Windows).
 */
export function getConfigPaths(
  env: NodeJS.ProcessEnv = process.env,
): ConfigPathInfo[] {
  const candidates: ConfigPathInfo[] = [];
  if (env.CONFIG_PATH) {
    candidates.push(candidate("env", env.CONFIG_PATH));
  }
  candidates.push(candidate("platform", resolve(platformDir, CONFIG_FILENAME)));
  return candidates;
}

/**
 * The first candidate that exists on disk, or null when none does.
 */
export function getActiveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
): ConfigPathInfo | null {
  return getConfigPaths(env).find((info) => info.exists) ?? null;
}

/**
 * Report printed by `--config-path`.
 */
export function formatConfigPaths(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const candidates = getConfigPaths(env);
  const active = candidates.find((info) => info.exists);

  const lines = candidates.map((info) => {
    const marker = info === active ? "*" : info.exists ? "+" : "-";
    return `${marker} ${SOURCE_LABELS[info.source]}: ${info.path}`;
  });
  lines.push(
    "",
    active ? `Using ${active.path}` : "No config file found; using defaults.",
  );
  return lines.join("\n");
}
