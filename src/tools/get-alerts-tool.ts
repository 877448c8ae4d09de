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

const GetAlertsArgsSchema = z.strictObject({
  state: z
    .string()
    .describe("Two-letter US state or territory code (e.g. CA, NY)"),
});

export type GetAlertsArgs = z.infer<typeof GetAlertsArgsSchema>;

/**
 * Tool that reports the active NWS alerts for a state or territory.
 */
@injectable()
export class GetAlertsTool implements ITool<GetAlertsArgs> {
  readonly name = "get_alerts";
  readonly description =
    "Get active weather alerts for a US state (e.g., CA, NY).";
  readonly schema = GetAlertsArgsSchema;

  constructor(
    @inject(TYPES.WeatherService) private weather: IWeatherService,
  ) {}

  async execute(
    args: GetAlertsArgs,
    _context: ToolExecutionContext,
  ): Promise<CallToolResult> {
    return toToolResult(await this.weather.getAlerts(args.state));
  }
}
