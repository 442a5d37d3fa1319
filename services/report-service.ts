import { AggregatedRun, CityOutcome } from "../agents/coordinator-agent";

const RULE = "=".repeat(50);

function formatOutcome(outcome: CityOutcome): string[] {
  if (outcome.status === "Failed") {
    const { failure } = outcome;
    return [
      `📍 ${outcome.city}`,
      `   Status: unavailable (${failure.kind} at ${failure.stage})`,
      `   ${failure.message}`,
    ];
  }

  const { classification, advisory, provenance } = outcome.result;
  const lines = [
    `📍 ${outcome.city}`,
    `   Status: ${classification.label} ${advisory.activityEmoji}`,
    `   Main concern: ${classification.drivingPollutant} (${classification.drivingValue.toFixed(1)} µg/m³)`,
    `   💡 ${advisory.recommendation}`,
  ];
  if (provenance === "synthetic") {
    lines.push("   ⚠️ Based on synthetic data");
  }
  return lines;
}

/**
 * Plain-text summary of a run, one block per city in the order given.
 */
export function formatReport(
  run: AggregatedRun,
  cityOrder: readonly string[] = Object.keys(run.cities)
): string {
  const lines = [RULE, "AIR QUALITY REPORT", RULE, ""];

  for (const city of cityOrder) {
    const outcome = run.cities[city];
    if (!outcome) continue;
    lines.push(...formatOutcome(outcome), "");
  }

  lines.push(RULE);
  return lines.join("\n");
}
