import { injectable, inject } from "inversify";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod";
import type { IWeatherService } from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import {
  toToolResult,
  type ITool,
  type ToolExecutionContext,
} from "./base-tool.js";

// Hosts sometimes send coordinates as strings; the service coerces them
const GetForecastArgsSchema = z.strictObject({
  latitude: z.union([z.number(), z.string()]),
  longitude: z.union([z.number(), z.string()]),
});

const AdvertisedForecastArgsSchema = z.strictObject({
  latitude: z.number().describe("Latitude in decimal degrees"),
  longitude: z.number().describe("Longitude in decimal degrees"),
});

export type GetForecastArgs = z.infer<typeof GetForecastArgsSchema>;

@injectable()
export class GetForecastTool implements ITool<GetForecastArgs> {
  readonly name = "get_forecast";
  readonly description =
    "Get a short forecast for a location by lat/lon (first ~4 periods).";
  readonly schema = GetForecastArgsSchema;
  readonly advertisedSchema = AdvertisedForecastArgsSchema;

  constructor(
    @inject(TYPES.WeatherService) private weather: IWeatherService,
  ) {}

  async execute(
    args: GetForecastArgs,
    _context: ToolExecutionContext,
  ): Promise<CallToolResult> {
    return toToolResult(
      await this.weather.getForecast(args.latitude, args.longitude),
    );
  }
}
