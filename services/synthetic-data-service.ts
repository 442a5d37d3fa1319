import { z } from "zod";
import {
  POLLUTANT_CODES,
  RawCityData,
  Reading,
  Sensor,
  Station,
} from "../agents/types";
import stationLayout from "../data/synthetic-stations.json";

const layoutSchema = z.object({
  ranges: z.record(
    z.enum(POLLUTANT_CODES),
    z.tuple([z.number().nonnegative(), z.number().nonnegative()])
  ),
  cities: z.record(
    z.string(),
    z.array(
      z.object({
        id: z.string(),
        name: z.string(),
        latitude: z.number(),
        longitude: z.number(),
        street: z.string().optional(),
        sensors: z.array(
          z.object({ id: z.string(), pollutant: z.enum(POLLUTANT_CODES) })
        ),
      })
    )
  ),
});

const layout = layoutSchema.parse(stationLayout);

type StationLayout = z.infer<typeof layoutSchema>["cities"][string][number];

const HOUR_MS = 60 * 60 * 1000;

export interface SyntheticDataSource {
  generate(city: string): RawCityData;
}

export interface SyntheticDataOptions {
  random?: () => number;
  now?: () => number;
}

/**
 * Small deterministic PRNG (mulberry32), so generated data can be replayed.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function fallbackLayout(city: string): StationLayout[] {
  const slug = city.toLowerCase().replace(/\s+/g, "-");
  return [
    {
      id: `synthetic-${slug}`,
      name: `${city} (synthetic)`,
      latitude: 0,
      longitude: 0,
      sensors: [
        { id: `synthetic-${slug}-pm25`, pollutant: "PM2.5" },
        { id: `synthetic-${slug}-pm10`, pollutant: "PM10" },
      ],
    },
  ];
}

export function createSyntheticDataService(
  options: SyntheticDataOptions = {}
): SyntheticDataSource {
  const random = options.random ?? Math.random;
  const now = options.now ?? Date.now;

  return {
    generate(city: string): RawCityData {
      const stationsLayout = layout.cities[city] ?? fallbackLayout(city);
      const collectedAt = now();
      // Readings are hourly, stamped at the top of the current hour
      const readingTime = new Date(
        Math.floor(collectedAt / HOUR_MS) * HOUR_MS
      ).toISOString();

      const stations: Station[] = [];
      const sensors: Sensor[] = [];
      const readings: Reading[] = [];

      for (const entry of stationsLayout) {
        stations.push({
          id: entry.id,
          name: entry.name,
          city,
          latitude: entry.latitude,
          longitude: entry.longitude,
          ...(entry.street ? { street: entry.street } : {}),
        });

        for (const sensor of entry.sensors) {
          sensors.push({
            id: sensor.id,
            stationId: entry.id,
            pollutant: sensor.pollutant,
          });

          const [min, max] = layout.ranges[sensor.pollutant] ?? [10, 100];
          const base = min + random() * ((min + max) / 2 - min);
          const variation = (random() * 0.4 - 0.2) * base;
          readings.push({
            sensorId: sensor.id,
            timestamp: readingTime,
            value: Math.round(Math.max(0, base + variation) * 100) / 100,
          });
        }
      }

      return {
        kind: "raw-city-data",
        city,
        stations,
        sensors,
        readings,
        failedSensors: [],
        collectedAt: new Date(collectedAt).toISOString(),
      };
    },
  };
}

export const syntheticDataService = createSyntheticDataService();
