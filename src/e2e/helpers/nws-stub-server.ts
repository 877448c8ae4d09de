import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import type { AddressInfo } from "net";
import { serve } from "@hono/node-server";
import { Hono } from "hono";

const fixturesDir = resolve(
  dirname(fileURLToPath(import.meta.url)),
  "../fixtures/nws",
);

function fixture(name: string): unknown {
  return JSON.parse(readFileSync(resolve(fixturesDir, name), "utf-8"));
}

export interface NwsStubServer {
  baseUrl: string;
  /** Request paths in arrival order. */
  requests: string[];
  close: () => Promise<void>;
}

/**
 * Starts a local stand-in for api.weather.gov on an ephemeral port.
 *
 * - alerts for CA come from fixtures, every other area has none
 * - points 0,0 answers 404, any other point resolves to one gridpoint
 * - the gridpoint forecast lists five periods
 */
export async function startNwsStubServer(): Promise<NwsStubServer> {
  const requests: string[] = [];
  const app = new Hono();
  let baseUrl = "";

  app.use("*", async (c, next) => {
    requests.push(c.req.path);
    await next();
  });

  app.get("/alerts/active/area/:area", (c) =>
    c.req.param("area") === "CA"
      ? c.json(fixture("alerts-ca.json"))
      : c.json({ type: "FeatureCollection", features: [] }),
  );

  app.get("/points/:coords", (c) =>
    c.req.param("coords") === "0,0"
      ? c.json({ title: "Invalid Point" }, 404)
      : c.json({
          properties: {
            forecast: `${baseUrl}/gridpoints/TST/10,20/forecast`,
          },
        }),
  );

  app.get("/gridpoints/TST/10,20/forecast", (c) =>
    c.json(fixture("forecast.json")),
  );

  let onListening: (port: number) => void = () => {};
  const listening = new Promise<number>((resolvePort) => {
    onListening = resolvePort;
  });
  const httpServer = serve(
    { fetch: app.fetch, port: 0, hostname: "127.0.0.1" },
    (info: AddressInfo) => onListening(info.port),
  );
  const port = await listening;
  baseUrl = `http://127.0.0.1:${port}`;

  return {
    baseUrl,
    requests,
    close: () =>
      new Promise<void>((resolveClose, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolveClose()));
      }),
  };
}
