import { HEALTH_RECOMMENDATIONS } from "../config/aqi-standards";
import { Agent, createAgentLogger } from "./agent";
import { Envelope, wrap } from "./envelope";
import { Advisory, Category, Classification } from "./types";

export function adviceFor(city: string, category: Category): Advisory {
  const template = HEALTH_RECOMMENDATIONS[category];
  return {
    kind: "advisory",
    city,
    category,
    recommendation: template.general,
    sensitiveGroups: template.sensitive,
    activityEmoji: template.activityEmoji,
    suggestedActivities: [...template.suggested],
    discouragedActivities: [...template.discouraged],
  };
}

export function createAdvisorAgent(): Agent<Classification, Advisory> {
  const name = "AdvisorAgent";
  const log = createAgentLogger(name);

  return {
    name,
    async run(classification: Classification): Promise<Envelope<Advisory>> {
      const advisory = adviceFor(classification.city, classification.category);
      log.info(`${classification.city}: ${advisory.recommendation}`);
      return wrap(name, advisory);
    },
  };
}
