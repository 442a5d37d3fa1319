import { adviceFor } from "../agents/advisor-agent";
import { AirQualityProvider } from "../agents/collector-agent";
import { ProviderError } from "../agents/errors";
import { CATEGORY_INFO } from "../config/aqi-standards";
import {
  Category,
  EnrichedResult,
  PollutantCode,
  PollutantRecord,
  Reading,
  Provenance,
  Sensor,
  Station,
} from "../agents/types";

process.env.LOG_LEVEL = "silent";

export const READING_TIME = "2024-03-01 12:00:00";

export interface FakeSensor {
  id: string;
  pollutant: PollutantCode;
  value: number | null | Error;
  timestamp?: string;
  unit?: Reading["unit"];
}

export interface FakeStation {
  id: string;
  sensors: FakeSensor[] | Error;
}

export type FakeLayout = Record<string, FakeStation[]>;

/**
 * In-process provider backed by a fixed layout. Counts every upstream call.
 */
export class FakeProvider implements AirQualityProvider {
  calls = { listStations: 0, listSensors: 0, latestReading: 0 };
  failStationsWith: Error | null = null;
  stationDelayMs = 0;

  constructor(private readonly layout: FakeLayout) {}

  get totalCalls(): number {
    return this.calls.listStations + this.calls.listSensors + this.calls.latestReading;
  }

  async listStations(city: string): Promise<Station[]> {
    this.calls.listStations++;
    if (this.stationDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.stationDelayMs));
    }
    if (this.failStationsWith) throw this.failStationsWith;

    const stations = this.layout[city];
    if (!stations) {
      throw new ProviderError("NotFound", `No stations found for city ${city}`);
    }
    return stations.map((station) => ({
      id: station.id,
      name: `${city} station ${station.id}`,
      city,
      latitude: 52,
      longitude: 21,
    }));
  }

  async listSensors(stationId: string): Promise<Sensor[]> {
    this.calls.listSensors++;
    const station = this.findStation(stationId);
    if (station.sensors instanceof Error) throw station.sensors;
    return station.sensors.map((sensor) => ({
      id: sensor.id,
      stationId,
      pollutant: sensor.pollutant,
    }));
  }

  async latestReading(sensorId: string): Promise<Reading> {
    this.calls.latestReading++;
    for (const stations of Object.values(this.layout)) {
      for (const station of stations) {
        if (station.sensors instanceof Error) continue;
        const sensor = station.sensors.find((entry) => entry.id === sensorId);
        if (!sensor) continue;
        if (sensor.value instanceof Error) throw sensor.value;
        return {
          sensorId,
          timestamp: sensor.timestamp ?? READING_TIME,
          value: sensor.value,
          ...(sensor.unit ? { unit: sensor.unit } : {}),
        };
      }
    }
    throw new ProviderError("NotFound", `Unknown sensor ${sensorId}`);
  }

  private findStation(stationId: string): FakeStation {
    for (const stations of Object.values(this.layout)) {
      const station = stations.find((entry) => entry.id === stationId);
      if (station) return station;
    }
    throw new ProviderError("NotFound", `Unknown station ${stationId}`);
  }
}

export function networkError(message = "connect ECONNREFUSED"): ProviderError {
  return new ProviderError("NetworkError", message);
}

/** PM2.5=15 and PM10=60 measured; every other pollutant has a silent sensor. */
export function warszawaLayout(): FakeStation[] {
  return [
    {
      id: "114",
      sensors: [
        { id: "672", pollutant: "PM2.5", value: 15 },
        { id: "673", pollutant: "PM10", value: 60 },
        { id: "674", pollutant: "NO2", value: null },
      ],
    },
    {
      id: "115",
      sensors: [
        { id: "680", pollutant: "SO2", value: null },
        { id: "681", pollutant: "O3", value: null },
        { id: "682", pollutant: "CO", value: null },
      ],
    },
  ];
}

/** Stations exist but every sensor reports null. */
export function gdanskLayout(): FakeStation[] {
  return [
    {
      id: "729",
      sensors: [
        { id: "4727", pollutant: "PM10", value: null },
        { id: "4728", pollutant: "NO2", value: null },
      ],
    },
    {
      id: "733",
      sensors: [{ id: "4760", pollutant: "PM2.5", value: null }],
    },
  ];
}

export function availableRecord(
  pollutant: PollutantCode,
  value: number,
  city = "Testville"
): PollutantRecord {
  return {
    city,
    pollutant,
    available: true,
    value,
    unit: "µg/m³",
    timestamp: "2024-03-01T12:00:00.000Z",
    stationId: "1",
    sensorId: `${pollutant}-1`,
  };
}

export function unavailableRecord(
  pollutant: PollutantCode,
  city = "Testville"
): PollutantRecord {
  return {
    city,
    pollutant,
    available: false,
    value: null,
    unit: "µg/m³",
    timestamp: null,
    stationId: null,
    sensorId: null,
    reason: "no-reading",
  };
}

export function enrichedResult(
  city: string,
  category: Category,
  driving: { pollutant: PollutantCode; value: number },
  provenance: Provenance = "live"
): EnrichedResult {
  const info = CATEGORY_INFO[category];
  return {
    city,
    records: [availableRecord(driving.pollutant, driving.value, city)],
    classification: {
      kind: "classification",
      city,
      category,
      level: info.level,
      label: info.label,
      color: info.color,
      drivingPollutant: driving.pollutant,
      drivingValue: driving.value,
      subIndices: [{ ...driving, category, level: info.level }],
    },
    advisory: adviceFor(city, category),
    provenance,
    fetchedAt: "2024-03-01T12:00:00.000Z",
    stationCount: 1,
    notes: [],
  };
}
