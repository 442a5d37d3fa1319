import { Category, PollutantCode } from "../agents/types";

/**
 * Polish air quality index (GIOŚ).
 *
 * Every pollutant has five upper bounds in µg/m³, one per category from
 * VeryGood to Bad. Anything above the last bound is VeryBad.
 */

export interface CategoryInfo {
  label: string;
  color: string;
  level: number;
}

export const CATEGORY_INFO: Record<Category, CategoryInfo> = {
  VeryGood: { label: "Very Good", color: "#00FF00", level: 0 },
  Good: { label: "Good", color: "#00CC00", level: 1 },
  Moderate: { label: "Moderate", color: "#FFFF00", level: 2 },
  Sufficient: { label: "Sufficient", color: "#FF9900", level: 3 },
  Bad: { label: "Bad", color: "#FF0000", level: 4 },
  VeryBad: { label: "Very Bad", color: "#990000", level: 5 },
};

export type BandBounds = readonly [number, number, number, number, number];

export const AQI_THRESHOLDS: Record<PollutantCode, BandBounds> = {
  "PM2.5": [13, 35, 55, 75, 110],
  PM10: [20, 50, 80, 110, 150],
  NO2: [40, 100, 150, 200, 400],
  SO2: [50, 100, 200, 350, 500],
  O3: [70, 120, 150, 180, 240],
  CO: [3000, 7000, 11000, 15000, 21000],
};

/**
 * inclusive: a concentration equal to an upper bound stays in that band.
 * exclusive: it is pushed into the next, worse band.
 */
export type BoundaryMode = "inclusive" | "exclusive";

export const DEFAULT_BOUNDARY_MODE: BoundaryMode = "inclusive";

export interface HealthRecommendation {
  general: string;
  sensitive: string;
  /** Shown next to the category in the text report. */
  activityEmoji: string;
  suggested: string[];
  discouraged: string[];
}

export const HEALTH_RECOMMENDATIONS: Record<Category, HealthRecommendation> = {
  VeryGood: {
    general: "Air quality is excellent. Perfect for outdoor activities!",
    sensitive: "No restrictions for any group.",
    activityEmoji: "🏃‍♂️",
    suggested: ["running", "cycling", "outdoor sports", "airing the home"],
    discouraged: [],
  },
  Good: {
    general: "Air quality is good. Enjoy outdoor activities.",
    sensitive: "No restrictions for any group.",
    activityEmoji: "🏃‍♂️",
    suggested: ["running", "cycling", "outdoor sports", "airing the home"],
    discouraged: [],
  },
  Moderate: {
    general:
      "Air quality is acceptable. Consider reducing intense outdoor exercise.",
    sensitive: "Sensitive groups should limit prolonged outdoor exertion.",
    activityEmoji: "🚶",
    suggested: ["walking", "light outdoor activity"],
    discouraged: ["prolonged outdoor exertion"],
  },
  Sufficient: {
    general: "Air quality is sufficient. Reduce outdoor activities.",
    sensitive: "Sensitive groups should avoid outdoor exertion.",
    activityEmoji: "🏠",
    suggested: ["indoor exercise", "short walks"],
    discouraged: ["running", "cycling", "outdoor sports"],
  },
  Bad: {
    general:
      "Air quality is bad. Avoid outdoor activities. Keep windows closed.",
    sensitive: "Sensitive groups should stay indoors.",
    activityEmoji: "⚠️",
    suggested: ["indoor activities"],
    discouraged: ["outdoor activities", "airing the home"],
  },
  VeryBad: {
    general:
      "Air quality is very bad. Stay indoors. Use air purifier if available.",
    sensitive: "Everyone should stay indoors and avoid exertion.",
    activityEmoji: "🚫",
    suggested: ["remaining indoors", "using an air purifier"],
    discouraged: ["outdoor activities", "airing the home", "any exertion"],
  },
};
