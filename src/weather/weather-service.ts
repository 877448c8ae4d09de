import { injectable, inject } from "inversify";
import * as z from "zod";
import type {
  AppConfig,
  HttpError,
  ILogger,
  IWeatherApi,
  IWeatherService,
  WeatherError,
  WeatherErrorKind,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import { ok, err, type Result } from "../utils/result.js";
import { parseDecimal } from "../utils/number.js";
import { AlertCollectionSchema, ForecastSchema, PointSchema } from "./schemas.js";
import { formatAlerts, formatPeriod } from "./formatters.js";

export const WEATHER_MESSAGES = {
  invalidState:
    "Please provide a 2-letter US state/territory code (e.g., CA, NY).",
  alertsUnavailable: "Unable to fetch alerts or invalid response.",
  noAlerts: "No active alerts for this state.",
  invalidCoordinates: "Invalid latitude/longitude.",
  locationUnresolved: "Unable to resolve grid forecast URL for this location.",
  forecastUnavailable: "Unable to fetch forecast periods.",
} as const;

function coordinate(value: number | string): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  return parseDecimal(value);
}

function describeHttpError(error: HttpError): string {
  return `${error.kind} error for ${error.url}: ${error.detail}`;
}

/**
 * Alert and forecast lookups against the NWS API, producing display text.
 *
 * Every failure is returned as a {@link WeatherError}: the fixed message is
 * what users see, the detail keeps the cause for the debug log.
 */
@injectable()
export class WeatherService implements IWeatherService {
  private readonly maxPeriods: number;

  constructor(
    @inject(TYPES.WeatherApi) private api: IWeatherApi,
    @inject(TYPES.AppConfig) config: AppConfig,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {
    this.maxPeriods = config.weather.maxForecastPeriods;
  }

  async getAlerts(state: string): Promise<Result<string, WeatherError>> {
    // Counted in code points, not UTF-16 units
    if ([...state].length !== 2) {
      return err({
        kind: "invalid_input",
        message: WEATHER_MESSAGES.invalidState,
        detail: `state code '${state}' is not 2 characters long`,
      });
    }

    const response = await this.api.getActiveAlerts(state.toUpperCase());
    if (!response.ok) {
      return this.fail(
        "alerts_unavailable",
        WEATHER_MESSAGES.alertsUnavailable,
        describeHttpError(response.error),
      );
    }

    const collection = AlertCollectionSchema.safeParse(response.value);
    if (!collection.success) {
      return this.fail(
        "alerts_unavailable",
        WEATHER_MESSAGES.alertsUnavailable,
        z.prettifyError(collection.error),
      );
    }

    const features = collection.data.features;
    if (features.length === 0) {
      return ok(WEATHER_MESSAGES.noAlerts);
    }
    return ok(formatAlerts(features.map((feature) => feature.properties)));
  }

  async getForecast(
    latitude: number | string,
    longitude: number | string,
  ): Promise<Result<string, WeatherError>> {
    const lat = coordinate(latitude);
    const lon = coordinate(longitude);
    if (lat === undefined || lon === undefined) {
      return err({
        kind: "invalid_input",
        message: WEATHER_MESSAGES.invalidCoordinates,
        detail: `cannot read '${latitude}', '${longitude}' as coordinates`,
      });
    }

    // Points lookup resolves the gridpoint forecast URL the second call needs
    const pointResponse = await this.api.getPoint(lat, lon);
    if (!pointResponse.ok) {
      return this.fail(
        "location_unresolved",
        WEATHER_MESSAGES.locationUnresolved,
        describeHttpError(pointResponse.error),
      );
    }
    const point = PointSchema.safeParse(pointResponse.value);
    if (!point.success) {
      return this.fail(
        "location_unresolved",
        WEATHER_MESSAGES.locationUnresolved,
        z.prettifyError(point.error),
      );
    }

    const forecastResponse = await this.api.getForecast(
      point.data.properties.forecast,
    );
    if (!forecastResponse.ok) {
      return this.fail(
        "forecast_unavailable",
        WEATHER_MESSAGES.forecastUnavailable,
        describeHttpError(forecastResponse.error),
      );
    }
    const forecast = ForecastSchema.safeParse(forecastResponse.value);
    if (!forecast.success) {
      return this.fail(
        "forecast_unavailable",
        WEATHER_MESSAGES.forecastUnavailable,
        z.prettifyError(forecast.error),
      );
    }

    return ok(
      forecast.data.properties.periods
        .slice(0, this.maxPeriods)
        .map((period) => formatPeriod(period))
        .join("\n"),
    );
  }

  private fail(
    kind: WeatherErrorKind,
    message: string,
    detail: string,
  ): Result<string, WeatherError> {
    this.logger.debug(`Weather lookup failed (${kind}): ${detail}`);
    return err({ kind, message, detail });
  }
}
