import "reflect-metadata";
import { Container } from "inversify";
import type { AxiosInstance } from "axios";
import { TYPES } from "../types/index.js";
import type {
  AppConfig,
  ILogger,
  IMCPClientConnector,
  IShutdownHandler,
  IWeatherApi,
  IWeatherService,
} from "../types/interfaces.js";
import { ConsoleLogger } from "../utils/logger.js";
import { NwsApiClient, createHttpClient } from "../weather/nws-client.js";
import { WeatherService } from "../weather/weather-service.js";
import type { ITool } from "../tools/base-tool.js";
import { GetAlertsTool } from "../tools/get-alerts-tool.js";
import { GetForecastTool } from "../tools/get-forecast-tool.js";
import type { IToolRegistry } from "../tools/tool-registry.js";
import { ToolRegistry } from "../tools/tool-registry.js";
import { MCPWeatherServer } from "../mcp/weather-server.js";
import { MCPClientConnector } from "../mcp/client-connector.js";
import { ShutdownHandler } from "../handlers/shutdown-handler.js";

function bindCommon(container: Container, config: AppConfig): void {
  container.bind<AppConfig>(TYPES.AppConfig).toConstantValue(config);
  container.bind<ILogger>(TYPES.Logger).to(ConsoleLogger).inSingletonScope();
}

export function createServerContainer(config: AppConfig): Container {
  const container = new Container();
  bindCommon(container, config);

  // Bind weather data access
  container
    .bind<AxiosInstance>(TYPES.HttpClient)
    .toConstantValue(createHttpClient(config.weather));
  container
    .bind<IWeatherApi>(TYPES.WeatherApi)
    .to(NwsApiClient)
    .inSingletonScope();
  container
    .bind<IWeatherService>(TYPES.WeatherService)
    .to(WeatherService)
    .inSingletonScope();

  // Bind all tools
  container.bind<ITool>(TYPES.Tool).to(GetAlertsTool);
  container.bind<ITool>(TYPES.Tool).to(GetForecastTool);

  // The registry is built once from every bound tool and never changes after
  container
    .bind<IToolRegistry>(TYPES.ToolRegistry)
    .toDynamicValue(
      () =>
        new ToolRegistry(
          container.getAll<ITool>(TYPES.Tool),
          container.get<ILogger>(TYPES.Logger),
        ),
    )
    .inSingletonScope();

  container
    .bind<MCPWeatherServer>(TYPES.MCPWeatherServer)
    .to(MCPWeatherServer)
    .inSingletonScope();

  container
    .bind<IShutdownHandler>(TYPES.ShutdownHandler)
    .to(ShutdownHandler)
    .inSingletonScope();

  return container;
}

export function createClientContainer(config: AppConfig): Container {
  const container = new Container();
  bindCommon(container, config);

  container
    .bind<IMCPClientConnector>(TYPES.MCPClientConnector)
    .to(MCPClientConnector)
    .inSingletonScope();

  return container;
}
