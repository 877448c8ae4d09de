export const ALERTS_USAGE = "Usage: alerts <STATE>";
export const FORECAST_USAGE = "Usage: forecast <LAT> <LON>";
export const UNKNOWN_COMMAND =
  "Unknown command. Try: alerts CA  |  forecast 37.78 -122.42";

export type ToolCommand =
  | { type: "alerts"; state: string }
  | { type: "forecast"; latitude: string; longitude: string };

export type ReplCommand =
  | ToolCommand
  | { type: "empty" }
  | { type: "quit" }
  | { type: "usage"; message: string }
  | { type: "unknown"; input: string };

/**
 * Turns one line of user input into a command. Never throws: malformed input
 * becomes a usage or unknown command. Numbers are left as typed; they are
 * parsed when the command is dispatched.
 */
export function parseCommand(line: string): ReplCommand {
  const input = line.trim();
  if (input === "") {
    return { type: "empty" };
  }
  if (input.toLowerCase() === "quit") {
    return { type: "quit" };
  }

  const [keyword = "", ...rest] = input.split(/\s+/);

  switch (keyword.toLowerCase()) {
    case "alerts": {
      const state = input.slice(keyword.length).trim();
      return state
        ? { type: "alerts", state }
        : { type: "usage", message: ALERTS_USAGE };
    }
    case "forecast": {
      const [latitude, longitude, ...extra] = rest;
      if (latitude === undefined || longitude === undefined || extra.length > 0) {
        return { type: "usage", message: FORECAST_USAGE };
      }
      return { type: "forecast", latitude, longitude };
    }
    default:
      return { type: "unknown", input };
  }
}
