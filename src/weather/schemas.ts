import * as z from "zod";

// The NWS API omits or nulls fields freely; anything unusable reads as absent
const displayValue = z
  .union([z.string(), z.number()])
  .nullable()
  .catch(null)
  .optional();

export const AlertPropertiesSchema = z.object({
  event: displayValue,
  areaDesc: displayValue,
  severity: displayValue,
  description: displayValue,
  instruction: displayValue,
});

export const AlertFeatureSchema = z.object({
  properties: AlertPropertiesSchema.nullable().catch(null).optional(),
});

export const AlertCollectionSchema = z.object({
  features: z
    .array(AlertFeatureSchema.catch({}))
    .nullable()
    .transform((features) => features ?? []),
});

export const PointSchema = z.object({
  properties: z.object({
    forecast: z.string().min(1),
  }),
});

export const ForecastPeriodSchema = z.object({
  name: displayValue,
  shortForecast: displayValue,
  temperature: displayValue,
  temperatureUnit: displayValue,
  windSpeed: displayValue,
});

export const ForecastSchema = z.object({
  properties: z.object({
    periods: z.array(ForecastPeriodSchema.catch({})),
  }),
});
