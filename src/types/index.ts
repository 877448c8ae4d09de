/**
 * Dependency injection identifiers for the container.
 * Using string literals instead of symbols so they read well in container errors.
 */
export const TYPES = {
  AppConfig: "AppConfig",
  Logger: "Logger",
  HttpClient: "HttpClient",
  WeatherApi: "WeatherApi",
  WeatherService: "WeatherService",
  Tool: "Tool",
  ToolRegistry: "ToolRegistry",
  MCPWeatherServer: "MCPWeatherServer",
  ShutdownHandler: "ShutdownHandler",
  MCPClientConnector: "MCPClientConnector",
} as const;
