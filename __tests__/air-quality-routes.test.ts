import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { enrichedResult } from "./helpers";
import { AggregatedRun, CityOutcome } from "../agents/coordinator-agent";
import { parseSettings } from "../config/settings";
import { createApp } from "../index";

const settings = parseSettings({ AQ_CITIES: "Warszawa,Gdansk" });

const outcomes: Record<string, CityOutcome> = {
  Warszawa: {
    status: "Done",
    city: "Warszawa",
    fromCache: false,
    result: enrichedResult("Warszawa", "Moderate", { pollutant: "PM10", value: 60 }),
  },
  Gdansk: {
    status: "Failed",
    city: "Gdansk",
    failure: {
      kind: "InsufficientData",
      message: "No pollutant readings available for Gdansk",
      stage: "Classifying",
    },
  },
};

class FakeCoordinator {
  requested: string[][] = [];
  refreshed: (string | undefined)[] = [];
  failWith: Error | null = null;

  refresh(city?: string): number {
    this.refreshed.push(city);
    return city === undefined ? 2 : 1;
  }

  async run(cities: readonly string[]): Promise<AggregatedRun> {
    this.requested.push([...cities]);
    if (this.failWith) throw this.failWith;

    const selected = cities.map((city) => outcomes[city]);
    return {
      startedAt: "2024-03-01T12:00:00.000Z",
      completedAt: "2024-03-01T12:00:01.000Z",
      durationMs: 1000,
      doneCount: selected.filter((outcome) => outcome.status === "Done").length,
      failedCount: selected.filter((outcome) => outcome.status === "Failed").length,
      cities: Object.fromEntries(
        selected.map((outcome): [string, CityOutcome] => [outcome.city, outcome])
      ),
    };
  }
}

// Response bodies come back as parsed JSON, so compare against the same shape
function asJson(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

function setup() {
  const coordinator = new FakeCoordinator();
  return { coordinator, app: createApp(settings, coordinator) };
}

describe("air quality routes", () => {
  it("describes the service at the root", async () => {
    const { app } = setup();
    const res = await app.request("/");

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      message: "Air quality agent pipeline",
      cities: ["Warszawa", "Gdansk"],
      mode: "live",
    });
  });

  it("runs every configured city", async () => {
    const { app, coordinator } = setup();
    const res = await app.request("/api/air-quality");

    assert.equal(res.status, 200);
    assert.deepEqual(coordinator.requested, [["Warszawa", "Gdansk"]]);
    const expected = await new FakeCoordinator().run(["Warszawa", "Gdansk"]);
    assert.deepEqual(await res.json(), asJson(expected));
  });

  it("returns a single city's outcome", async () => {
    const { app, coordinator } = setup();
    const res = await app.request("/api/air-quality/Warszawa");

    assert.equal(res.status, 200);
    assert.deepEqual(coordinator.requested, [["Warszawa"]]);
    assert.deepEqual(await res.json(), asJson(outcomes.Warszawa));
  });

  it("answers 502 for a city whose pipeline failed", async () => {
    const { app } = setup();
    const res = await app.request("/api/air-quality/Gdansk");

    assert.equal(res.status, 502);
    assert.deepEqual(await res.json(), outcomes.Gdansk);
  });

  it("answers 404 for a city that is not configured", async () => {
    const { app, coordinator } = setup();
    const res = await app.request("/api/air-quality/Atlantis");

    assert.equal(res.status, 404);
    assert.deepEqual(coordinator.requested, []);
    assert.deepEqual(await res.json(), {
      error: "Unknown city",
      message: "Atlantis is not a configured city",
      cities: ["Warszawa", "Gdansk"],
    });
  });

  it("renders the plain-text report", async () => {
    const { app } = setup();
    const res = await app.request("/api/air-quality/report");

    assert.equal(res.status, 200);
    assert.ok(res.headers.get("Content-Type")?.startsWith("text/plain"));
    const lines = (await res.text()).split("\n");
    assert.equal(lines[1], "AIR QUALITY REPORT");
    assert.equal(lines[4], "📍 Warszawa");
    assert.equal(lines[9], "📍 Gdansk");
  });

  it("answers 500 when the run itself blows up", async () => {
    const { app, coordinator } = setup();
    coordinator.failWith = new Error("cache corrupted");
    const res = await app.request("/api/air-quality");

    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), {
      error: "Failed to fetch air quality data",
      message: "cache corrupted",
    });
  });

  it("refreshes every city and runs them again", async () => {
    const { app, coordinator } = setup();
    const res = await app.request("/api/air-quality/refresh", { method: "POST" });

    assert.equal(res.status, 200);
    assert.deepEqual(coordinator.refreshed, [undefined]);
    assert.deepEqual(coordinator.requested, [["Warszawa", "Gdansk"]]);
    const run = await new FakeCoordinator().run(["Warszawa", "Gdansk"]);
    assert.deepEqual(await res.json(), asJson({ dropped: 2, run }));
  });

  it("refreshes a single city when one is named", async () => {
    const { app, coordinator } = setup();
    const res = await app.request("/api/air-quality/refresh?city=Warszawa", { method: "POST" });

    assert.equal(res.status, 200);
    assert.deepEqual(coordinator.refreshed, ["Warszawa"]);
    assert.deepEqual(coordinator.requested, [["Warszawa"]]);
    const run = await new FakeCoordinator().run(["Warszawa"]);
    assert.deepEqual(await res.json(), asJson({ dropped: 1, run }));
  });

  it("refuses to refresh a city that is not configured", async () => {
    const { app, coordinator } = setup();
    const res = await app.request("/api/air-quality/refresh?city=Atlantis", { method: "POST" });

    assert.equal(res.status, 404);
    assert.deepEqual(coordinator.refreshed, []);
    assert.deepEqual(coordinator.requested, []);
    assert.deepEqual(await res.json(), {
      error: "Unknown city",
      message: "Atlantis is not a configured city",
      cities: ["Warszawa", "Gdansk"],
    });
  });

  it("answers 500 when the refreshed run blows up", async () => {
    const { app, coordinator } = setup();
    coordinator.failWith = new Error("provider exploded");
    const res = await app.request("/api/air-quality/refresh", { method: "POST" });

    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), {
      error: "Failed to refresh air quality data",
      message: "provider exploded",
    });
  });

  it("answers preflight requests from allowed origins", async () => {
    const { app } = setup();
    const res = await app.request("/api/air-quality", {
      method: "OPTIONS",
      headers: { Origin: "http://localhost:3000" },
    });

    assert.equal(res.status, 204);
    assert.equal(res.headers.get("Access-Control-Allow-Origin"), "http://localhost:3000");
    assert.equal(res.headers.get("Access-Control-Allow-Methods"), "GET, POST, OPTIONS");
  });

  it("does not echo origins that are not allowed", async () => {
    const { app } = setup();
    const res = await app.request("/", { headers: { Origin: "http://evil.test" } });

    assert.equal(res.status, 200);
    assert.equal(res.headers.get("Access-Control-Allow-Origin"), null);
  });
});
