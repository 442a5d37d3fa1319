import { Context, Hono } from "hono";
import { CoordinatorAgent } from "../agents/coordinator-agent";
import { describeError } from "../agents/errors";
import { formatReport } from "../services/report-service";

export interface AirQualityRouteDeps {
  coordinator: Pick<CoordinatorAgent, "run" | "refresh">;
  cities: readonly string[];
}

function unknownCity(c: Context, city: string, cities: readonly string[]) {
  return c.json(
    { error: "Unknown city", message: `${city} is not a configured city`, cities },
    404
  );
}

export function createAirQualityRoutes({ coordinator, cities }: AirQualityRouteDeps) {
  const app = new Hono();

  // Aggregated result for every configured city
  app.get("/", async (c) => {
    try {
      console.log(`API request received for ${cities.length} cities`);
      const run = await coordinator.run(cities);
      console.log(
        `Returning air quality: ${run.doneCount} done, ${run.failedCount} failed`
      );
      return c.json(run);
    } catch (error) {
      console.error("Error running air quality pipeline:", error);
      return c.json(
        { error: "Failed to fetch air quality data", message: describeError(error) },
        500
      );
    }
  });

  // Plain-text report, same data as above
  app.get("/report", async (c) => {
    try {
      const run = await coordinator.run(cities);
      return c.text(formatReport(run, cities));
    } catch (error) {
      console.error("Error building air quality report:", error);
      return c.json({ error: "Failed to build report", message: describeError(error) }, 500);
    }
  });

  // Drop cached results (all cities, or ?city=) and fetch them again
  app.post("/refresh", async (c) => {
    const city = c.req.query("city");
    if (city !== undefined && !cities.includes(city)) {
      return unknownCity(c, city, cities);
    }

    try {
      const dropped = coordinator.refresh(city);
      const run = await coordinator.run(city === undefined ? cities : [city]);
      return c.json({ dropped, run });
    } catch (error) {
      console.error("Error refreshing air quality data:", error);
      return c.json(
        { error: "Failed to refresh air quality data", message: describeError(error) },
        500
      );
    }
  });

  // Single city; only configured cities are known to the pipeline
  app.get("/:city", async (c) => {
    const city = c.req.param("city");
    if (!cities.includes(city)) {
      return unknownCity(c, city, cities);
    }

    try {
      const run = await coordinator.run([city]);
      const outcome = run.cities[city];
      return c.json(outcome, outcome.status === "Done" ? 200 : 502);
    } catch (error) {
      console.error(`Error fetching air quality for ${city}:`, error);
      return c.json(
        { error: "Failed to fetch air quality data", message: describeError(error) },
        500
      );
    }
  });

  return app;
}
