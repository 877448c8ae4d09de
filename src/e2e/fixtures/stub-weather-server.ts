import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod";

export interface StubResponses {
  alerts: string;
  forecast: string;
}

/**
 * Creates an MCP server with the weather tool names that answers every call
 * with canned text, for exercising the client without the NWS.
 */
export function createStubWeatherServer(responses: StubResponses): McpServer {
  const server = new McpServer(
    {
      name: "stub-weather",
      version: "1.0.0",
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.registerTool(
    "get_alerts",
    {
      description: "Canned alerts",
      inputSchema: { state: z.string() },
    },
    async () => ({
      content: [{ type: "text", text: responses.alerts }],
    }),
  );

  server.registerTool(
    "get_forecast",
    {
      description: "Canned forecast",
      inputSchema: { latitude: z.number(), longitude: z.number() },
    },
    async ({ latitude, longitude }) => ({
      content: [
        {
          type: "text",
          text: `${responses.forecast} @ ${latitude},${longitude}`,
        },
      ],
    }),
  );

  return server;
}
