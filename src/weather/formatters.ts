export const ALERT_SEPARATOR = "\n\n---\n\n";

type DisplayValue = string | number | null | undefined;

export interface AlertProperties {
  event?: DisplayValue;
  areaDesc?: DisplayValue;
  severity?: DisplayValue;
  description?: DisplayValue;
  instruction?: DisplayValue;
}

export interface ForecastPeriod {
  name?: DisplayValue;
  shortForecast?: DisplayValue;
  temperature?: DisplayValue;
  temperatureUnit?: DisplayValue;
  windSpeed?: DisplayValue;
}

function display(value: DisplayValue, fallback: string): string {
  return value === null || value === undefined ? fallback : String(value);
}

/**
 * Five labelled lines, always in the same order.
 */
export function formatAlert(properties?: AlertProperties | null): string {
  const props = properties ?? {};
  return [
    `Event: ${display(props.event, "Unknown")}`,
    `Area: ${display(props.areaDesc, "Unknown")}`,
    `Severity: ${display(props.severity, "Unknown")}`,
    `Description: ${display(props.description, "No description available")}`,
    `Instructions: ${display(props.instruction, "No specific instructions provided")}`,
  ].join("\n");
}

export function formatAlerts(
  alerts: Array<AlertProperties | null | undefined>,
): string {
  return alerts.map((alert) => formatAlert(alert)).join(ALERT_SEPARATOR);
}

export function formatPeriod(period: ForecastPeriod): string {
  const name = display(period.name, "Period");
  const short = display(period.shortForecast, "n/a");
  const temperature = display(period.temperature, "n/a");
  const unit = display(period.temperatureUnit, "");
  const wind = display(period.windSpeed, "");
  return `${name}: ${short} (${temperature}°${unit}) Wind ${wind}`;
}
