import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { AgentLogger, createAgentLogger } from "../agents/agent";
import { AirQualityProvider } from "../agents/collector-agent";
import { describeError, ProviderError } from "../agents/errors";
import { isPollutantCode, Reading, Sensor, Station } from "../agents/types";
import { DEFAULT_PROVIDER_BASE_URL } from "../config/settings";

// GIOŚ v1 answers with Polish field names; only the fields we use are parsed.
const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());
const identifier = z.union([z.number(), z.string()]).transform(String);

const stationPageSchema = z.object({
  "Lista stacji pomiarowych": z.array(
    z.object({
      "Identyfikator stacji": identifier,
      "Nazwa stacji": z.string(),
      "WGS84 φ N": numeric,
      "WGS84 λ E": numeric,
      "Nazwa miasta": z.string().nullish(),
      Ulica: z.string().nullish(),
    })
  ),
  totalPages: z.number().int().positive().optional(),
});

const sensorListSchema = z.object({
  "Lista stanowisk pomiarowych dla podanej stacji": z.array(
    z.object({
      "Identyfikator stanowiska": identifier,
      "Identyfikator stacji": identifier,
      "Wskaźnik - kod": z.string(),
    })
  ),
});

const sensorDataSchema = z.object({
  "Lista danych pomiarowych": z.array(
    z.object({
      Data: z.string(),
      Wartość: z.number().nullable(),
    })
  ),
});

const STATION_DIRECTORY_TTL = 60 * 60 * 1000; // 1 hour, same cadence as the provider
const MAX_PAGES = 50;

export interface GiosClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Upper bound on station directory pages fetched. */
  maxPages?: number;
  http?: AxiosInstance;
  logger?: AgentLogger;
  now?: () => number;
}

export class GiosClient implements AirQualityProvider {
  private readonly http: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxPages: number;
  private readonly log: AgentLogger;
  private readonly now: () => number;
  private directory: { stations: Station[]; fetchedAt: number } | null = null;
  private directoryRequest: Promise<Station[]> | null = null;

  constructor(options: GiosClientOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_PROVIDER_BASE_URL,
        timeout: options.timeoutMs ?? 30000,
        headers: {
          Accept: "application/json",
          "User-Agent": "air-quality-agents/1.0",
        },
      });
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.maxPages = options.maxPages ?? MAX_PAGES;
    this.log = options.logger ?? createAgentLogger("GiosClient");
    this.now = options.now ?? Date.now;
  }

  async listStations(city: string): Promise<Station[]> {
    const stations = (await this.stationDirectory()).filter(
      (station) => station.city === city
    );
    if (stations.length === 0) {
      throw new ProviderError("NotFound", `No stations found for city ${city}`);
    }
    return stations;
  }

  async listSensors(stationId: string): Promise<Sensor[]> {
    const body = await this.getJson(
      `/station/sensors/${encodeURIComponent(stationId)}`,
      sensorListSchema
    );

    const sensors: Sensor[] = [];
    for (const raw of body["Lista stanowisk pomiarowych dla podanej stacji"]) {
      const code = raw["Wskaźnik - kod"];
      if (!isPollutantCode(code)) {
        this.log.info(`Skipping untracked parameter ${code} at station ${stationId}`);
        continue;
      }
      sensors.push({
        id: raw["Identyfikator stanowiska"],
        stationId: raw["Identyfikator stacji"],
        pollutant: code,
      });
    }
    return sensors;
  }

  async latestReading(sensorId: string): Promise<Reading> {
    const body = await this.getJson(
      `/data/getData/${encodeURIComponent(sensorId)}`,
      sensorDataSchema
    );
    const entries = body["Lista danych pomiarowych"];

    // "YYYY-MM-DD HH:mm:ss" sorts lexicographically in time order
    const newest = (candidates: typeof entries) =>
      candidates.reduce<(typeof entries)[number] | null>(
        (latest, entry) => (latest === null || entry.Data > latest.Data ? entry : latest),
        null
      );

    const measured = newest(entries.filter((entry) => entry.Wartość !== null));
    const latest = measured ?? newest(entries);

    return {
      sensorId,
      timestamp: latest?.Data ?? null,
      value: latest?.Wartość ?? null,
    };
  }

  private async stationDirectory(): Promise<Station[]> {
    if (
      this.directory &&
      this.now() - this.directory.fetchedAt < STATION_DIRECTORY_TTL
    ) {
      return this.directory.stations;
    }

    if (!this.directoryRequest) {
      this.directoryRequest = this.fetchAllStations()
        .then((stations) => {
          this.directory = { stations, fetchedAt: this.now() };
          return stations;
        })
        .finally(() => {
          this.directoryRequest = null;
        });
    }
    return this.directoryRequest;
  }

  private async fetchAllStations(): Promise<Station[]> {
    const stations: Station[] = [];
    let page = 1;
    let totalPages = 1;

    do {
      const body = await this.getJson("/station/findAll", stationPageSchema, {
        page,
      });
      const reported = body.totalPages ?? 1;
      if (page === 1 && reported > this.maxPages) {
        this.log.warn(
          `Station directory has ${reported} pages; only the first ${this.maxPages} are loaded`
        );
      }
      totalPages = Math.min(reported, this.maxPages);

      for (const raw of body["Lista stacji pomiarowych"]) {
        stations.push({
          id: raw["Identyfikator stacji"],
          name: raw["Nazwa stacji"],
          city: raw["Nazwa miasta"] ?? "",
          latitude: raw["WGS84 φ N"],
          longitude: raw["WGS84 λ E"],
          ...(raw.Ulica ? { street: raw.Ulica } : {}),
        });
      }
      page++;
    } while (page <= totalPages);

    this.log.info(`Loaded ${stations.length} stations from GIOŚ`);
    return stations;
  }

  private async getJson<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    params?: Record<string, string | number>
  ): Promise<z.output<T>> {
    let lastError: ProviderError | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.http.get<unknown>(path, { params });
        const parsed = schema.safeParse(response.data);
        if (!parsed.success) {
          throw new ProviderError(
            "NetworkError",
            `Unexpected response structure from ${path}`,
            { details: { issues: parsed.error.issues.map((issue) => issue.message) } }
          );
        }
        return parsed.data;
      } catch (error) {
        lastError = toProviderError(path, error);
        if (lastError.kind === "NotFound") break;

        this.log.error(
          `GIOŚ request ${path} failed (Attempt ${attempt}/${this.maxRetries}): ${lastError.message}`
        );
        if (attempt < this.maxRetries && this.retryDelayMs > 0) {
          const delay = attempt * this.retryDelayMs;
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    throw lastError ?? new ProviderError("NetworkError", `Request to ${path} failed`);
  }
}

function toProviderError(path: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 404) {
      return new ProviderError("NotFound", `${path} was not found`, {
        cause: error,
      });
    }
    return new ProviderError(
      "NetworkError",
      status
        ? `${path} answered with HTTP ${status}`
        : `${path} unreachable: ${error.code ?? error.message}`,
      { cause: error, details: status ? { status } : undefined }
    );
  }

  return new ProviderError("NetworkError", describeError(error), { cause: error });
}
