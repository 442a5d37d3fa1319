import { Agent, createAgentLogger } from "./agent";
import { Envelope, wrap, wrapError, wrapPartial } from "./envelope";
import { PipelineError } from "./errors";
import {
  POLLUTANT_CODES,
  PollutantCode,
  PollutantRecord,
  PollutantRecordSet,
  RawCityData,
  Reading,
  Sensor,
} from "./types";

interface Candidate {
  value: number;
  time: number;
  stationId: string;
  sensorId: string;
}

// GIOŚ reports "YYYY-MM-DD HH:mm:ss" in Polish local time without a zone.
const ZONELESS_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?$/;

export const PROVIDER_TIME_ZONE = "Europe/Warsaw";

const providerClock = new Intl.DateTimeFormat("en-US", {
  timeZone: PROVIDER_TIME_ZONE,
  hourCycle: "h23",
  year: "numeric",
  month: "2-digit",
  day: "2-digit",
  hour: "2-digit",
  minute: "2-digit",
  second: "2-digit",
});

// Offset of the provider's wall clock from UTC at the given instant.
function providerOffsetMs(instant: number): number {
  const wholeSeconds = instant - (((instant % 1000) + 1000) % 1000);
  const parts = Object.fromEntries(
    providerClock
      .formatToParts(new Date(wholeSeconds))
      .map((part): [string, string] => [part.type, part.value])
  );
  const wallClock = Date.UTC(
    Number(parts.year),
    Number(parts.month) - 1,
    Number(parts.day),
    Number(parts.hour),
    Number(parts.minute),
    Number(parts.second)
  );
  return wallClock - wholeSeconds;
}

function fromProviderWallClock(match: RegExpExecArray): number {
  const [, year, month, day, hour, minute, second = "0", fraction = "0"] = match;
  const wallClock = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    Math.round(Number(`0.${fraction}`) * 1000)
  );
  // Two passes settle the offset on either side of a DST change
  const guess = wallClock - providerOffsetMs(wallClock);
  return wallClock - providerOffsetMs(guess);
}

export function normalizeTimestamp(raw: string | null): number | null {
  if (raw === null) return null;
  const trimmed = raw.trim();
  const zoneless = ZONELESS_TIMESTAMP.exec(trimmed);
  const time = zoneless ? fromProviderWallClock(zoneless) : Date.parse(trimmed);
  return Number.isFinite(time) ? time : null;
}

export function normalizeValue(reading: Reading): number {
  const value = reading.value ?? Number.NaN;
  const scaled = reading.unit === "mg/m³" ? value * 1000 : value;
  return Math.round(scaled * 100) / 100;
}

// Newest first; equal timestamps go to the smaller station id, then sensor id.
function isPreferred(candidate: Candidate, current: Candidate): boolean {
  if (candidate.time !== current.time) return candidate.time > current.time;
  if (candidate.stationId !== current.stationId) {
    return candidate.stationId < current.stationId;
  }
  return candidate.sensorId < current.sensorId;
}

function selectRecord(
  city: string,
  pollutant: PollutantCode,
  sensors: Sensor[],
  readingsBySensor: Map<string, Reading>
): PollutantRecord {
  let best: Candidate | null = null;
  let sawCorrupt = false;

  for (const sensor of sensors) {
    const reading = readingsBySensor.get(sensor.id);
    if (!reading || reading.value === null) continue;

    const time = normalizeTimestamp(reading.timestamp);
    const value = normalizeValue(reading);
    if (time === null || !Number.isFinite(value) || value < 0) {
      sawCorrupt = true;
      continue;
    }

    const candidate: Candidate = {
      value,
      time,
      stationId: sensor.stationId,
      sensorId: sensor.id,
    };
    if (best === null || isPreferred(candidate, best)) {
      best = candidate;
    }
  }

  if (best === null) {
    return {
      city,
      pollutant,
      available: false,
      value: null,
      unit: "µg/m³",
      timestamp: null,
      stationId: null,
      sensorId: null,
      reason: sawCorrupt ? "corrupt-reading" : "no-reading",
    };
  }

  return {
    city,
    pollutant,
    available: true,
    value: best.value,
    unit: "µg/m³",
    timestamp: new Date(best.time).toISOString(),
    stationId: best.stationId,
    sensorId: best.sensorId,
  };
}

export function createProcessorAgent(): Agent<RawCityData, PollutantRecordSet> {
  const name = "ProcessorAgent";
  const log = createAgentLogger(name);

  return {
    name,
    async run(raw: RawCityData): Promise<Envelope<PollutantRecordSet>> {
      if (raw.stations.length === 0) {
        return wrapError(
          name,
          new PipelineError(
            "InvalidInput",
            `Raw data for ${raw.city} contains no stations`
          )
        );
      }

      const readingsBySensor = new Map(
        raw.readings.map((reading): [string, Reading] => [reading.sensorId, reading])
      );
      const records: PollutantRecord[] = [];

      for (const pollutant of POLLUTANT_CODES) {
        const sensors = raw.sensors.filter(
          (sensor) => sensor.pollutant === pollutant
        );
        if (sensors.length === 0) continue;
        records.push(selectRecord(raw.city, pollutant, sensors, readingsBySensor));
      }

      const notes: string[] = [];
      if (records.length === 0) {
        notes.push(`No tracked pollutant sensors in ${raw.city}`);
      }
      for (const record of records) {
        if (record.available) continue;
        notes.push(
          record.reason === "corrupt-reading"
            ? `${record.pollutant} unavailable: corrupt reading discarded`
            : `${record.pollutant} unavailable: no reading`
        );
      }

      const payload: PollutantRecordSet = {
        kind: "pollutant-records",
        city: raw.city,
        records,
      };

      const unavailable = records.filter((record) => !record.available).length;
      log.info(
        `Processed ${records.length} pollutants for ${raw.city} (${unavailable} unavailable)`
      );

      return notes.length > 0 ? wrapPartial(name, payload, notes) : wrap(name, payload);
    },
  };
}
