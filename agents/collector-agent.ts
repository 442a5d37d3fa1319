import { Agent, createAgentLogger } from "./agent";
import { Envelope, wrap, wrapError, wrapPartial } from "./envelope";
import { describeError, PipelineError, ProviderError } from "./errors";
import { RawCityData, Reading, Sensor, Station } from "./types";

/**
 * Upstream data provider. Implementations throw ProviderError with kind
 * NotFound (unknown city) or NetworkError (transport failure).
 */
export interface AirQualityProvider {
  listStations(city: string): Promise<Station[]>;
  listSensors(stationId: string): Promise<Sensor[]>;
  latestReading(sensorId: string): Promise<Reading>;
}

function asProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  return new ProviderError("NetworkError", describeError(error), {
    cause: error,
  });
}

export function createCollectorAgent(
  provider: AirQualityProvider
): Agent<string, RawCityData> {
  const name = "CollectorAgent";
  const log = createAgentLogger(name);

  return {
    name,
    async run(city: string): Promise<Envelope<RawCityData>> {
      log.info(`Collecting data for ${city}`);

      let stations: Station[];
      try {
        stations = await provider.listStations(city);
      } catch (error) {
        const cause = asProviderError(error);
        log.error(`Station lookup failed for ${city}: ${cause.message}`);
        return wrapError(name, cause);
      }

      if (stations.length === 0) {
        return wrapError(
          name,
          new PipelineError("NotFound", `No stations found for city ${city}`)
        );
      }

      const notes: string[] = [];
      const sensors: Sensor[] = [];
      let sensorListFailures = 0;

      for (const station of stations) {
        try {
          sensors.push(...(await provider.listSensors(station.id)));
        } catch (error) {
          sensorListFailures++;
          notes.push(
            `Sensor list unavailable for station ${station.id}: ${describeError(error)}`
          );
        }
      }

      if (sensorListFailures === stations.length) {
        return wrapError(
          name,
          new ProviderError(
            "NetworkError",
            `Sensor lists could not be fetched for any station in ${city}`,
            { details: { stations: stations.map((station) => station.id) } }
          )
        );
      }

      const readings: Reading[] = [];
      const failedSensors: string[] = [];

      for (const sensor of sensors) {
        try {
          readings.push(await provider.latestReading(sensor.id));
        } catch (error) {
          failedSensors.push(sensor.id);
          readings.push({ sensorId: sensor.id, timestamp: null, value: null });
          log.warn(
            `Reading unavailable for sensor ${sensor.id}: ${describeError(error)}`
          );
        }
      }

      if (failedSensors.length > 0) {
        notes.push(`Readings unavailable for sensors: ${failedSensors.join(", ")}`);
      }

      const payload: RawCityData = {
        kind: "raw-city-data",
        city,
        stations,
        sensors,
        readings,
        failedSensors,
        collectedAt: new Date().toISOString(),
      };

      log.info(
        `Collected ${stations.length} stations and ${sensors.length} sensors for ${city}`
      );

      return notes.length > 0 ? wrapPartial(name, payload, notes) : wrap(name, payload);
    },
  };
}
