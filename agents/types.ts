// Pollutants tracked by the index, in canonical order. Tie-breaks between
// pollutants always follow this order.
export const POLLUTANT_CODES = ["PM2.5", "PM10", "NO2", "SO2", "O3", "CO"] as const;

export type PollutantCode = (typeof POLLUTANT_CODES)[number];

export function isPollutantCode(value: string): value is PollutantCode {
  return POLLUTANT_CODES.some((code) => code === value);
}

export type ConcentrationUnit = "µg/m³" | "mg/m³";

export interface Station {
  id: string;
  name: string;
  city: string;
  latitude: number;
  longitude: number;
  street?: string;
}

export interface Sensor {
  id: string;
  stationId: string;
  pollutant: PollutantCode;
}

export interface Reading {
  sensorId: string;
  timestamp: string | null;
  value: number | null;
  unit?: ConcentrationUnit;
}

export type Provenance = "live" | "synthetic";

export interface RawCityData {
  kind: "raw-city-data";
  city: string;
  stations: Station[];
  sensors: Sensor[];
  readings: Reading[];
  failedSensors: string[];
  collectedAt: string;
}

export type UnavailableReason = "no-reading" | "corrupt-reading";

export type PollutantRecord =
  | {
      city: string;
      pollutant: PollutantCode;
      available: true;
      value: number;
      unit: "µg/m³";
      timestamp: string;
      stationId: string;
      sensorId: string;
    }
  | {
      city: string;
      pollutant: PollutantCode;
      available: false;
      value: null;
      unit: "µg/m³";
      timestamp: null;
      stationId: null;
      sensorId: null;
      reason: UnavailableReason;
    };

export interface PollutantRecordSet {
  kind: "pollutant-records";
  city: string;
  records: PollutantRecord[];
}

// Ordered from best to worst; the array index is the category level.
export const CATEGORIES = [
  "VeryGood",
  "Good",
  "Moderate",
  "Sufficient",
  "Bad",
  "VeryBad",
] as const;

export type Category = (typeof CATEGORIES)[number];

export interface SubIndex {
  pollutant: PollutantCode;
  value: number;
  category: Category;
  level: number;
}

export interface Classification {
  kind: "classification";
  city: string;
  category: Category;
  level: number;
  label: string;
  color: string;
  drivingPollutant: PollutantCode;
  drivingValue: number;
  subIndices: SubIndex[];
}

export interface Advisory {
  kind: "advisory";
  city: string;
  category: Category;
  recommendation: string;
  sensitiveGroups: string;
  activityEmoji: string;
  suggestedActivities: string[];
  discouragedActivities: string[];
}

export type StagePayload =
  | RawCityData
  | PollutantRecordSet
  | Classification
  | Advisory;

export interface EnrichedResult {
  city: string;
  records: PollutantRecord[];
  classification: Classification;
  advisory: Advisory;
  provenance: Provenance;
  fetchedAt: string;
  stationCount: number;
  notes: string[];
}
