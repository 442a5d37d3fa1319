import {
  AQI_THRESHOLDS,
  BoundaryMode,
  CATEGORY_INFO,
  DEFAULT_BOUNDARY_MODE,
} from "../config/aqi-standards";
import { Agent, createAgentLogger } from "./agent";
import { Envelope, wrap, wrapError, wrapPartial } from "./envelope";
import { PipelineError } from "./errors";
import {
  CATEGORIES,
  Category,
  Classification,
  POLLUTANT_CODES,
  PollutantCode,
  PollutantRecordSet,
  SubIndex,
} from "./types";

export function categoryColor(category: Category): string {
  return CATEGORY_INFO[category].color;
}

/**
 * Sub-index category of a single concentration (µg/m³). Values beyond the
 * last upper bound are VeryBad.
 */
export function classifyConcentration(
  pollutant: PollutantCode,
  value: number,
  mode: BoundaryMode = DEFAULT_BOUNDARY_MODE
): Category {
  const bounds = AQI_THRESHOLDS[pollutant];
  for (let level = 0; level < bounds.length; level++) {
    const bound = bounds[level];
    const inBand = mode === "inclusive" ? value <= bound : value < bound;
    if (inBand) return CATEGORIES[level];
  }
  return "VeryBad";
}

export function createClassifierAgent(
  mode: BoundaryMode = DEFAULT_BOUNDARY_MODE
): Agent<PollutantRecordSet, Classification> {
  const name = "ClassifierAgent";
  const log = createAgentLogger(name);

  return {
    name,
    async run(input: PollutantRecordSet): Promise<Envelope<Classification>> {
      const subIndices: SubIndex[] = [];
      const missing: PollutantCode[] = [];

      for (const record of input.records) {
        if (!record.available) {
          missing.push(record.pollutant);
          continue;
        }
        const category = classifyConcentration(record.pollutant, record.value, mode);
        subIndices.push({
          pollutant: record.pollutant,
          value: record.value,
          category,
          level: CATEGORY_INFO[category].level,
        });
      }

      if (subIndices.length === 0) {
        log.warn(`No pollutant data to classify for ${input.city}`);
        return wrapError(
          name,
          new PipelineError(
            "InsufficientData",
            `No pollutant readings available for ${input.city}`,
            { details: { unavailable: missing } }
          )
        );
      }

      subIndices.sort(
        (a, b) =>
          POLLUTANT_CODES.indexOf(a.pollutant) - POLLUTANT_CODES.indexOf(b.pollutant)
      );

      // Strict comparison keeps the first pollutant among equally bad ones.
      let worst = subIndices[0];
      for (const subIndex of subIndices.slice(1)) {
        if (subIndex.level > worst.level) worst = subIndex;
      }

      const info = CATEGORY_INFO[worst.category];
      const classification: Classification = {
        kind: "classification",
        city: input.city,
        category: worst.category,
        level: info.level,
        label: info.label,
        color: info.color,
        drivingPollutant: worst.pollutant,
        drivingValue: worst.value,
        subIndices,
      };

      log.info(
        `${input.city}: ${info.label} (driven by ${worst.pollutant} at ${worst.value} µg/m³)`
      );

      return missing.length > 0
        ? wrapPartial(name, classification, [
            `Classified without ${missing.join(", ")}`,
          ])
        : wrap(name, classification);
    },
  };
}
