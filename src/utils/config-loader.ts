import { readFileSync } from "fs";
import * as z from "zod";
import type { AppConfig } from "../types/interfaces.js";
import { getActiveConfigPath } from "./config-paths.js";

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: "info",
  weather: {
    baseUrl: "https://api.weather.gov",
    userAgent: "weather-mcp/1.0 (example)",
    timeoutMs: 30_000,
    maxForecastPeriods: 4,
  },
};

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

const ConfigFileSchema = z.strictObject({
  logLevel: LogLevelSchema.optional(),
  weather: z
    .strictObject({
      baseUrl: z.url().optional(),
      userAgent: z.string().min(1).optional(),
      timeoutMs: z.number().int().positive().optional(),
      maxForecastPeriods: z.number().int().positive().optional(),
    })
    .optional(),
});

/**
 * Loads configuration, layering an optional JSON file over the defaults.
 *
 * When CONFIG_PATH is set the file must exist. Otherwise the platform config
 * directory is consulted and, if it holds no config file, the defaults are
 * returned unchanged.
 *
 * @throws Error if the file cannot be read, parsed or validated
 */
export function loadConfig(): AppConfig {
  const explicitPath = process.env.CONFIG_PATH;
  const configPath = explicitPath || getActiveConfigPath()?.path;

  if (!configPath) {
    return structuredClone(DEFAULT_CONFIG);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    if (
      error instanceof Error &&
      "code" in error &&
      error.code === "ENOENT"
    ) {
      throw new Error(
        `Configuration file not found at: ${configPath}\n` +
          `Create the file or unset the CONFIG_PATH environment variable.`,
      );
    }
    throw error;
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid configuration in ${configPath}:\n${z.prettifyError(parsed.error)}`,
    );
  }

  const weather = parsed.data.weather;
  const defaults = DEFAULT_CONFIG.weather;
  return {
    logLevel: parsed.data.logLevel ?? DEFAULT_CONFIG.logLevel,
    weather: {
      baseUrl: weather?.baseUrl ?? defaults.baseUrl,
      userAgent: weather?.userAgent ?? defaults.userAgent,
      timeoutMs: weather?.timeoutMs ?? defaults.timeoutMs,
      maxForecastPeriods:
        weather?.maxForecastPeriods ?? defaults.maxForecastPeriods,
    },
  };
}

/**
 * Merges environment variables into the config.
 * Environment variables take precedence over config file values.
 */
export function mergeEnvConfig(config: AppConfig): AppConfig {
  const env = process.env;
  const weather = { ...config.weather };

  if (env.NWS_API_BASE) {
    weather.baseUrl = env.NWS_API_BASE;
  }
  if (env.NWS_USER_AGENT) {
    weather.userAgent = env.NWS_USER_AGENT;
  }
  if (env.NWS_TIMEOUT_MS) {
    const timeoutMs = Number.parseInt(env.NWS_TIMEOUT_MS, 10);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new Error(
        `NWS_TIMEOUT_MS must be a positive integer, got '${env.NWS_TIMEOUT_MS}'`,
      );
    }
    weather.timeoutMs = timeoutMs;
  }

  let logLevel = config.logLevel;
  if (env.LOG_LEVEL) {
    const parsed = LogLevelSchema.safeParse(env.LOG_LEVEL);
    if (!parsed.success) {
      throw new Error(
        `LOG_LEVEL must be one of ${LogLevelSchema.options.join(", ")}, got '${env.LOG_LEVEL}'`,
      );
    }
    logLevel = parsed.data;
  }

  return { logLevel, weather };
}
