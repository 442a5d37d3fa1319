import { EnrichedResult } from "./types";

interface CacheEntry {
  result: EnrichedResult;
  storedAt: number;
}

/**
 * City → last enriched result. The provider publishes hourly, so anything
 * younger than the TTL is served as is.
 */
export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(city: string): EnrichedResult | undefined {
    const entry = this.entries.get(city);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(city);
      return undefined;
    }
    return entry.result;
  }

  set(city: string, result: EnrichedResult): void {
    this.entries.set(city, { result, storedAt: this.now() });
  }

  invalidate(city: string): boolean {
    return this.entries.delete(city);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
