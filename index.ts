import { Hono } from "hono";
import { logger } from "hono/logger";
import { createServer } from "node:http";
import { CoordinatorAgent } from "./agents/coordinator-agent";
import { loadSettings, Settings } from "./config/settings";
import { createCorsMiddleware } from "./middleware/cors-middleware";
import { createAirQualityRoutes } from "./routes/air-quality";
import { GiosClient } from "./services/gios-client";
import { syntheticDataService } from "./services/synthetic-data-service";

export function createCoordinator(settings: Settings): CoordinatorAgent {
  const provider = new GiosClient({
    baseUrl: settings.providerBaseUrl,
    timeoutMs: settings.requestTimeoutMs,
    maxRetries: settings.maxRetries,
  });

  return new CoordinatorAgent(provider, syntheticDataService, {
    allowSyntheticFallback: settings.allowSyntheticFallback,
    useSyntheticData: settings.useSyntheticData,
    cacheTtlMs: settings.cacheTtlMs,
    cityDeadlineMs: settings.cityDeadlineMs,
    boundaryMode: settings.boundaryMode,
  });
}

export function createApp(
  settings: Settings,
  coordinator: Pick<CoordinatorAgent, "run" | "refresh"> = createCoordinator(settings)
): Hono {
  const app = new Hono();

  app.use("*", createCorsMiddleware(settings.corsOrigins));
  app.use(logger());

  app.route(
    "/api/air-quality",
    createAirQualityRoutes({ coordinator, cities: settings.cities })
  );

  app.get("/", (c) => {
    return c.json({
      message: "Air quality agent pipeline",
      cities: settings.cities,
      mode: settings.useSyntheticData ? "synthetic" : "live",
    });
  });

  app.onError((error, c) => {
    console.error("Server error:", error);
    return c.json({ error: "Internal Server Error", message: error.message }, 500);
  });

  return app;
}

// Only start the server if this file is executed directly
if (require.main === module) {
  const settings = loadSettings();
  const app = createApp(settings);

  console.log(`Server is starting on port ${settings.port}...`);
  console.log("Configuration:", {
    cities: settings.cities,
    provider: settings.providerBaseUrl,
    cacheTtlSeconds: settings.cacheTtlMs / 1000,
    syntheticFallback: settings.allowSyntheticFallback,
    mode: settings.useSyntheticData ? "synthetic" : "live",
  });

  // Bridge Node's req/res to the Fetch API Request/Response Hono works with
  const server = createServer(async (req, res) => {
    try {
      const url = new URL(req.url || "/", `http://${req.headers.host || "localhost"}`);
      const method = req.method || "GET";
      const headers = new Headers();

      Object.entries(req.headers).forEach(([key, value]) => {
        if (value) headers.set(key, Array.isArray(value) ? value.join(", ") : value);
      });

      const requestInit: RequestInit = { method, headers };

      if (!["GET", "HEAD"].includes(method)) {
        const chunks: Buffer[] = [];
        for await (const chunk of req) {
          chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
        }
        requestInit.body = Buffer.concat(chunks).toString("utf8");
      }

      const response = await app.fetch(new Request(url.toString(), requestInit));

      res.statusCode = response.status;
      response.headers.forEach((value, key) => {
        res.setHeader(key, value);
      });
      res.end(await response.text());
    } catch (error) {
      console.error("Server error:", error);

      res.statusCode = 500;
      res.setHeader("Content-Type", "application/json");
      res.end(
        JSON.stringify({
          error: "Internal Server Error",
          message: error instanceof Error ? error.message : String(error),
        })
      );
    }
  });

  server.listen(settings.port, () => {
    console.log(`Server is running on http://localhost:${settings.port}`);
  });
}
