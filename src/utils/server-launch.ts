import { resolve } from "path";
import { getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { StdioLaunchParams } from "../types/interfaces.js";

// Settings the server reads that the SDK's default child environment drops
const FORWARDED_ENV = [
  "LOG_LEVEL",
  "CONFIG_PATH",
  "NWS_API_BASE",
  "NWS_USER_AGENT",
  "NWS_TIMEOUT_MS",
];

export interface NodeRuntime {
  execPath: string;
  execArgv: string[];
  env: NodeJS.ProcessEnv;
}

/**
 * Launch parameters for a server entrypoint: the running Node executable with
 * its exec arguments, so a loader such as `--import tsx` carries over.
 */
export function resolveServerLaunch(
  entrypoint: string,
  runtime: NodeRuntime = {
    execPath: process.execPath,
    execArgv: process.execArgv,
    env: process.env,
  },
): StdioLaunchParams {
  const env: Record<string, string> = { ...getDefaultEnvironment() };
  for (const key of FORWARDED_ENV) {
    const value = runtime.env[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }

  return {
    command: runtime.execPath,
    args: [...runtime.execArgv, resolve(entrypoint)],
    env,
  };
}
