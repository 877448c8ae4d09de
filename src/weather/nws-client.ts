import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";
import { injectable, inject } from "inversify";
import axios, { AxiosError, isAxiosError, type AxiosInstance } from "axios";
import type {
  AppConfig,
  HttpError,
  ILogger,
  IWeatherApi,
  WeatherApiConfig,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import { ok, err, type Result } from "../utils/result.js";

/**
 * Creates the axios instance used for every NWS request.
 *
 * Bodies arrive as text and are decoded by {@link NwsApiClient.getJson}.
 * Keep-alive is off: each request's socket is released once it settles.
 */
export function createHttpClient(config: WeatherApiConfig): AxiosInstance {
  return axios.create({
    timeout: config.timeoutMs,
    responseType: "text",
    headers: {
      "User-Agent": config.userAgent,
      Accept: "application/geo+json",
    },
    httpAgent: new HttpAgent({ keepAlive: false }),
    httpsAgent: new HttpsAgent({ keepAlive: false }),
  });
}

export function toHttpError(url: string, error: unknown): HttpError {
  if (isAxiosError(error)) {
    if (error.response) {
      return {
        kind: "http_status",
        url,
        status: error.response.status,
        detail: `HTTP ${error.response.status}`,
      };
    }
    if (
      error.code === AxiosError.ECONNABORTED ||
      error.code === AxiosError.ETIMEDOUT
    ) {
      return { kind: "timeout", url, detail: error.message };
    }
    return { kind: "network", url, detail: error.message };
  }
  return {
    kind: "network",
    url,
    detail: error instanceof Error ? error.message : String(error),
  };
}

@injectable()
export class NwsApiClient implements IWeatherApi {
  private readonly baseUrl: string;

  constructor(
    @inject(TYPES.HttpClient) private http: AxiosInstance,
    @inject(TYPES.AppConfig) config: AppConfig,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {
    this.baseUrl = config.weather.baseUrl.replace(/\/+$/, "");
  }

  getActiveAlerts(area: string): Promise<Result<unknown, HttpError>> {
    return this.getJson(
      `${this.baseUrl}/alerts/active/area/${encodeURIComponent(area)}`,
    );
  }

  getPoint(
    latitude: number,
    longitude: number,
  ): Promise<Result<unknown, HttpError>> {
    return this.getJson(`${this.baseUrl}/points/${latitude},${longitude}`);
  }

  getForecast(forecastUrl: string): Promise<Result<unknown, HttpError>> {
    return this.getJson(forecastUrl);
  }

  async getJson(url: string): Promise<Result<unknown, HttpError>> {
    this.logger.debug(`GET ${url}`);

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(url);
      body = response.data;
    } catch (error) {
      return this.fail(toHttpError(url, error));
    }

    if (typeof body !== "string") {
      return this.fail({
        kind: "decode",
        url,
        detail: `expected a text body, got ${typeof body}`,
      });
    }

    try {
      const value: unknown = JSON.parse(body);
      return ok(value);
    } catch (error) {
      return this.fail({
        kind: "decode",
        url,
        detail: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private fail(error: HttpError): Result<unknown, HttpError> {
    this.logger.debug(`GET ${error.url} failed (${error.kind}): ${error.detail}`);
    return err(error);
  }
}
