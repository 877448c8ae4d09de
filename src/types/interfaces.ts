import type {
  CallToolResult,
  ListToolsResult,
} from "@modelcontextprotocol/sdk/types.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { Result } from "../utils/result.js";

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface WeatherApiConfig {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  maxForecastPeriods: number;
}

export interface AppConfig {
  logLevel: LogLevel;
  weather: WeatherApiConfig;
}

export interface ILogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
  debug(message: string): void;
}

export type HttpErrorKind = "timeout" | "network" | "http_status" | "decode";

export interface HttpError {
  kind: HttpErrorKind;
  url: string;
  detail: string;
  status?: number;
}

/**
 * Raw access to the National Weather Service API. Each call issues exactly
 * one GET and resolves to the decoded JSON body or a typed failure.
 */
export interface IWeatherApi {
  getActiveAlerts(area: string): Promise<Result<unknown, HttpError>>;
  getPoint(
    latitude: number,
    longitude: number,
  ): Promise<Result<unknown, HttpError>>;
  getForecast(forecastUrl: string): Promise<Result<unknown, HttpError>>;
}

export type WeatherErrorKind =
  | "invalid_input"
  | "alerts_unavailable"
  | "location_unresolved"
  | "forecast_unavailable";

export interface WeatherError {
  kind: WeatherErrorKind;
  /** Fixed text shown to the user. */
  message: string;
  /** Underlying cause, kept for logs and tests. */
  detail?: string;
}

export interface IWeatherService {
  getAlerts(state: string): Promise<Result<string, WeatherError>>;
  getForecast(
    latitude: number | string,
    longitude: number | string,
  ): Promise<Result<string, WeatherError>>;
}

export interface IShutdownHandler {
  shutdown(exitCode?: number): Promise<void>;
}

/**
 * The subset of a client session the REPL needs.
 */
export interface IToolSession {
  listTools(): Promise<ListToolsResult>;
  callTool(
    name: string,
    args: Record<string, unknown>,
    options?: RequestOptions,
  ): Promise<CallToolResult>;
  close(): Promise<void>;
}

export interface StdioLaunchParams {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface IMCPClientConnector {
  connect(name: string, transport: Transport): Promise<IToolSession>;
  connectStdio(name: string, params: StdioLaunchParams): Promise<IToolSession>;
}
