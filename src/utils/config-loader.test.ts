import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "fs";
import { resolve } from "path";
import { tmpdir } from "os";
import { DEFAULT_CONFIG, loadConfig, mergeEnvConfig } from "./config-loader.js";
import { getActiveConfigPath } from "./config-paths.js";

vi.mock("./config-paths.js", () => ({
  getActiveConfigPath: vi.fn(() => null),
}));

const ENV_KEYS = [
  "CONFIG_PATH",
  "LOG_LEVEL",
  "NWS_API_BASE",
  "NWS_USER_AGENT",
  "NWS_TIMEOUT_MS",
] as const;

describe("config-loader", () => {
  let tempDir: string;
  let savedEnv: Record<string, string | undefined>;

  beforeEach(() => {
    tempDir = mkdtempSync(resolve(tmpdir(), "weather-config-"));
    savedEnv = {};
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    rmSync(tempDir, { recursive: true, force: true });
    vi.mocked(getActiveConfigPath).mockReturnValue(null);
  });

  function writeConfig(content: unknown): string {
    const path = resolve(tempDir, "config.json");
    writeFileSync(
      path,
      typeof content === "string" ? content : JSON.stringify(content),
    );
    return path;
  }

  describe("loadConfig", () => {
    it("should return defaults when no config file exists", () => {
      const config = loadConfig();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config).not.toBe(DEFAULT_CONFIG);
    });

    it("should layer file values over defaults", () => {
      process.env.CONFIG_PATH = writeConfig({
        logLevel: "debug",
        weather: { userAgent: "test-agent/0.1", maxForecastPeriods: 2 },
      });

      expect(loadConfig()).toEqual({
        logLevel: "debug",
        weather: {
          baseUrl: "https://api.weather.gov",
          userAgent: "test-agent/0.1",
          timeoutMs: 30000,
          maxForecastPeriods: 2,
        },
      });
    });

    it("should read the platform config file when CONFIG_PATH is unset", () => {
      const path = writeConfig({ weather: { timeoutMs: 5000 } });
      vi.mocked(getActiveConfigPath).mockReturnValue({
        path,
        source: "platform",
        exists: true,
      });

      expect(loadConfig().weather.timeoutMs).toBe(5000);
    });

    it("should throw if CONFIG_PATH points at a missing file", () => {
      process.env.CONFIG_PATH = resolve(tempDir, "missing.json");

      expect(() => loadConfig()).toThrow(/Configuration file not found at: /);
    });

    it("should throw on malformed JSON", () => {
      process.env.CONFIG_PATH = writeConfig("{ not json");

      expect(() => loadConfig()).toThrow(SyntaxError);
    });

    it("should reject unknown keys", () => {
      const path = writeConfig({ port: 3000 });
      process.env.CONFIG_PATH = path;

      expect(() => loadConfig()).toThrow(`Invalid configuration in ${path}:`);
    });

    it("should reject a non-positive timeout", () => {
      process.env.CONFIG_PATH = writeConfig({ weather: { timeoutMs: 0 } });

      expect(() => loadConfig()).toThrow(/timeoutMs/);
    });

    it("should reject an unknown log level", () => {
      process.env.CONFIG_PATH = writeConfig({ logLevel: "verbose" });

      expect(() => loadConfig()).toThrow(/logLevel/);
    });
  });

  describe("mergeEnvConfig", () => {
    it("should return config unchanged without env overrides", () => {
      expect(mergeEnvConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
    });

    it("should apply env overrides", () => {
      process.env.NWS_API_BASE = "http://127.0.0.1:9999";
      process.env.NWS_USER_AGENT = "test-agent/0.2";
      process.env.NWS_TIMEOUT_MS = "1500";
      process.env.LOG_LEVEL = "silent";

      expect(mergeEnvConfig(DEFAULT_CONFIG)).toEqual({
        logLevel: "silent",
        weather: {
          baseUrl: "http://127.0.0.1:9999",
          userAgent: "test-agent/0.2",
          timeoutMs: 1500,
          maxForecastPeriods: 4,
        },
      });
    });

    it("should not mutate the input config", () => {
      process.env.NWS_TIMEOUT_MS = "1500";

      mergeEnvConfig(DEFAULT_CONFIG);

      expect(DEFAULT_CONFIG.weather.timeoutMs).toBe(30000);
    });

    it("should reject a non-numeric timeout", () => {
      process.env.NWS_TIMEOUT_MS = "soon";

      expect(() => mergeEnvConfig(DEFAULT_CONFIG)).toThrow(
        "NWS_TIMEOUT_MS must be a positive integer, got 'soon'",
      );
    });

    it("should reject an unknown log level", () => {
      process.env.LOG_LEVEL = "loud";

      expect(() => mergeEnvConfig(DEFAULT_CONFIG)).toThrow(
        /LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent, got 'loud'/,
      );
    });
  });
});
