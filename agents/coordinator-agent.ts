import { BoundaryMode } from "../config/aqi-standards";
import { SyntheticDataSource } from "../services/synthetic-data-service";
import { createAdvisorAgent } from "./advisor-agent";
import { Agent, AgentLogger, createAgentLogger } from "./agent";
import { createClassifierAgent } from "./classifier-agent";
import { AirQualityProvider, createCollectorAgent } from "./collector-agent";
import { Envelope, envelopeNotes, wrap, wrapPartial } from "./envelope";
import { describeError, PipelineErrorDetail } from "./errors";
import { deepFreeze } from "./freeze";
import { createProcessorAgent } from "./processor-agent";
import { ResultCache } from "./result-cache";
import {
  Advisory,
  Classification,
  EnrichedResult,
  PollutantRecordSet,
  Provenance,
  RawCityData,
  StagePayload,
} from "./types";

export type CityRunState =
  | "Pending"
  | "Fetching"
  | "Processing"
  | "Classifying"
  | "Advising"
  | "Done"
  | "Failed";

export type FailedStage = Exclude<CityRunState, "Done" | "Failed">;

export interface CityFailure {
  kind: PipelineErrorDetail["kind"];
  message: string;
  stage: FailedStage;
  details?: Record<string, unknown>;
}

export type CityOutcome =
  | { status: "Done"; city: string; fromCache: boolean; result: EnrichedResult }
  | { status: "Failed"; city: string; failure: CityFailure };

export interface AggregatedRun {
  startedAt: string;
  completedAt: string;
  durationMs: number;
  doneCount: number;
  failedCount: number;
  /** Unordered: consumers look cities up by name. */
  cities: Record<string, CityOutcome>;
}

export interface CoordinatorOptions {
  allowSyntheticFallback: boolean;
  /** Skip the provider entirely and feed every city from the generator. */
  useSyntheticData?: boolean;
  cacheTtlMs: number;
  /** 0 or unset disables the per-city deadline. */
  cityDeadlineMs?: number;
  boundaryMode?: BoundaryMode;
  now?: () => number;
}

export interface CoordinatorStages {
  collector: Agent<string, RawCityData>;
  processor: Agent<RawCityData, PollutantRecordSet>;
  classifier: Agent<PollutantRecordSet, Classification>;
  advisor: Agent<Classification, Advisory>;
}

class StageFailure extends Error {
  constructor(
    readonly stage: FailedStage,
    readonly detail: PipelineErrorDetail
  ) {
    super(detail.message);
    this.name = "StageFailure";
  }
}

class CityRun {
  state: CityRunState = "Pending";

  constructor(
    private readonly city: string,
    private readonly log: AgentLogger
  ) {}

  enter(next: CityRunState): void {
    this.log.info(`${this.city}: ${this.state} -> ${next}`);
    this.state = next;
  }

  /** Stage to blame if the run stops now. */
  get stage(): FailedStage {
    const current = this.state;
    return current === "Done" || current === "Failed" ? "Pending" : current;
  }
}

export class CoordinatorAgent {
  readonly name = "CoordinatorAgent";
  private readonly log = createAgentLogger(this.name);
  private readonly cache: ResultCache;
  private readonly stages: CoordinatorStages;
  private readonly inFlight = new Map<string, Promise<CityOutcome>>();
  private readonly now: () => number;

  constructor(
    provider: AirQualityProvider,
    private readonly synthetic: SyntheticDataSource,
    private readonly options: CoordinatorOptions,
    stages?: Partial<CoordinatorStages>
  ) {
    this.now = options.now ?? Date.now;
    this.cache = new ResultCache(options.cacheTtlMs, this.now);
    this.stages = {
      collector: stages?.collector ?? createCollectorAgent(provider),
      processor: stages?.processor ?? createProcessorAgent(),
      classifier: stages?.classifier ?? createClassifierAgent(options.boundaryMode),
      advisor: stages?.advisor ?? createAdvisorAgent(),
    };
  }

  /**
   * Drops cached results for one city, or for all of them, so the next run
   * fetches fresh data. Returns how many entries were dropped.
   */
  refresh(city?: string): number {
    if (city !== undefined) {
      const dropped = this.cache.invalidate(city) ? 1 : 0;
      this.log.info(`Refresh requested for ${city}; ${dropped} cached result dropped`);
      return dropped;
    }

    const dropped = this.cache.size;
    this.cache.clear();
    this.log.info(`Refresh requested; ${dropped} cached results dropped`);
    return dropped;
  }

  async run(cities: readonly string[]): Promise<AggregatedRun> {
    const started = this.now();
    const unique = [...new Set(cities)];
    this.log.info(`Starting pipeline for ${unique.length} cities`);

    const outcomes = await Promise.all(unique.map((city) => this.runCity(city)));

    const completed = this.now();
    const aggregated: AggregatedRun = {
      startedAt: new Date(started).toISOString(),
      completedAt: new Date(completed).toISOString(),
      durationMs: completed - started,
      doneCount: outcomes.filter((outcome) => outcome.status === "Done").length,
      failedCount: outcomes.filter((outcome) => outcome.status === "Failed").length,
      cities: Object.fromEntries(
        outcomes.map((outcome): [string, CityOutcome] => [outcome.city, outcome])
      ),
    };

    this.log.info(
      `Pipeline finished in ${aggregated.durationMs}ms: ${aggregated.doneCount} done, ${aggregated.failedCount} failed`
    );
    return aggregated;
  }

  /**
   * Cache lookup and in-flight registration happen synchronously, so two
   * concurrent runs for the same city share one upstream fetch.
   */
  runCity(city: string): Promise<CityOutcome> {
    const cached = this.cache.get(city);
    if (cached) {
      this.log.info(`Using cached result for ${city}`);
      const outcome: CityOutcome = { status: "Done", city, fromCache: true, result: cached };
      return Promise.resolve(outcome);
    }

    const pending = this.inFlight.get(city);
    if (pending) return pending;

    const promise = this.runWithDeadline(city).finally(() => {
      this.inFlight.delete(city);
    });
    this.inFlight.set(city, promise);
    return promise;
  }

  private async runWithDeadline(city: string): Promise<CityOutcome> {
    const deadline = this.options.cityDeadlineMs ?? 0;
    const controller = new AbortController();
    const tracker = new CityRun(city, this.log);
    const pipeline = this.runPipeline(city, tracker, controller.signal);
    if (deadline <= 0) return pipeline;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<CityOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        this.log.warn(`${city} exceeded the ${deadline}ms deadline`);
        resolve({
          status: "Failed",
          city,
          failure: {
            kind: "Timeout",
            message: `Pipeline for ${city} did not finish within ${deadline}ms`,
            stage: tracker.stage,
          },
        });
      }, deadline);
    });

    try {
      return await Promise.race([pipeline, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runPipeline(
    city: string,
    tracker: CityRun,
    signal: AbortSignal
  ): Promise<CityOutcome> {
    try {
      tracker.enter("Fetching");
      const { envelope: collected, provenance } = await this.collect(city);
      const raw = this.unwrap("Fetching", collected);

      tracker.enter("Processing");
      const processed = await this.stages.processor.run(raw);
      const records = this.unwrap("Processing", processed);

      tracker.enter("Classifying");
      const classified = await this.stages.classifier.run(records);
      const classification = this.unwrap("Classifying", classified);

      tracker.enter("Advising");
      const advised = await this.stages.advisor.run(classification);
      const advisory = this.unwrap("Advising", advised);

      const envelopes: Envelope<StagePayload>[] = [collected, processed, classified, advised];
      const result: EnrichedResult = deepFreeze({
        city,
        records: records.records,
        classification,
        advisory,
        provenance,
        fetchedAt: raw.collectedAt,
        stationCount: raw.stations.length,
        notes: envelopes.flatMap((envelope) => envelopeNotes(envelope)),
      });

      if (signal.aborted) {
        this.log.warn(`${city} finished after its deadline; result discarded`);
      } else {
        this.cache.set(city, result);
      }
      tracker.enter("Done");
      return { status: "Done", city, fromCache: false, result };
    } catch (error) {
      const failure: CityFailure =
        error instanceof StageFailure
          ? {
              kind: error.detail.kind,
              message: error.detail.message,
              stage: error.stage,
              ...(error.detail.details ? { details: error.detail.details } : {}),
            }
          : { kind: "Unexpected", message: describeError(error), stage: tracker.stage };

      tracker.enter("Failed");
      this.log.error(`${city} failed at ${failure.stage}: ${failure.message}`);
      return { status: "Failed", city, failure };
    }
  }

  private async collect(
    city: string
  ): Promise<{ envelope: Envelope<RawCityData>; provenance: Provenance }> {
    if (this.options.useSyntheticData) {
      return {
        envelope: wrap("SyntheticDataService", this.synthetic.generate(city)),
        provenance: "synthetic",
      };
    }

    const envelope = await this.stages.collector.run(city);
    if (
      envelope.status === "error" &&
      envelope.error.kind === "NetworkError" &&
      this.options.allowSyntheticFallback
    ) {
      this.log.warn(`Provider unreachable for ${city}; using synthetic data`);
      return {
        envelope: wrapPartial("SyntheticDataService", this.synthetic.generate(city), [
          `Live data unavailable (${envelope.error.message}); synthetic data used`,
        ]),
        provenance: "synthetic",
      };
    }
    return { envelope, provenance: "live" };
  }

  private unwrap<T extends StagePayload>(stage: FailedStage, envelope: Envelope<T>): T {
    if (envelope.status === "error") {
      throw new StageFailure(stage, envelope.error);
    }
    return envelope.payload;
  }
}
